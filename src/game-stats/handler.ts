import type { AxiosInstance } from 'axios';
import { createRouter, ok, type ApiHandler } from '../shared/http';
import { errorMessage, log } from '../shared/log';
import { parseRequest } from '../shared/validation';
import { createFavoritesService } from './favorites';
import { createFfxivService } from './ffxiv';
import { createOsrsService } from './osrs';
import { favoriteSchema, favoritesQuerySchema, ffxivSearchSchema, osrsSearchSchema } from './schemas';
import { createSearchLogger } from './search-log';
import type { GameStatsStore } from './types';

export interface GameStatsDeps {
  store: GameStatsStore;
  http: Pick<AxiosInstance, 'get'>;
  osrsHiscoreUrl: string;
  xivApiUrl: string;
}

const SERVICE = 'game-stats';

export function createGameStatsHandler(deps: GameStatsDeps): ApiHandler {
  const { store, http } = deps;
  const searchLog = createSearchLogger(store);
  const osrs = createOsrsService({ http, hiscoreUrl: deps.osrsHiscoreUrl, searchLog });
  const ffxiv = createFfxivService({ http, xivApiUrl: deps.xivApiUrl, searchLog });
  const favorites = createFavoritesService(store);

  return createRouter(SERVICE, [
    {
      method: 'GET',
      path: '/',
      handle: async () => ok({ message: 'MMORPG Helper API is running' }),
    },
    {
      method: 'GET',
      path: '/test',
      handle: async () => {
        try {
          await store.ping();
          return ok({ backend: 'running', database: 'connected' });
        } catch (err) {
          log({ level: 'warn', action: `${SERVICE}.ping.failed`, error: errorMessage(err) });
          return ok({ backend: 'running', database: 'unavailable' });
        }
      },
    },
    {
      method: 'POST',
      path: '/api/osrs/stats',
      handle: async (req) => ok(await osrs.fetchStats(parseRequest(osrsSearchSchema, req.body).username)),
    },
    {
      method: 'POST',
      path: '/api/ffxiv/character',
      handle: async (req) => {
        const payload = parseRequest(ffxivSearchSchema, req.body);
        return ok(await ffxiv.searchCharacters(payload.name, payload.world));
      },
    },
    {
      method: 'POST',
      path: '/api/favorites',
      handle: async (req) => ok(await favorites.addFavorite(parseRequest(favoriteSchema, req.body))),
    },
    {
      method: 'GET',
      path: '/api/favorites',
      handle: async (req) => ok(await favorites.listFavorites(parseRequest(favoritesQuerySchema, req.query).limit)),
    },
  ]);
}
