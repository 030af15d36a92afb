import { log } from '../shared/log';
import type { FavoriteProfile, GameStatsStore } from './types';

export function createFavoritesService(store: GameStatsStore) {
  async function addFavorite(input: Omit<FavoriteProfile, 'id' | 'created_at'>): Promise<{ ok: true; id: string }> {
    const id = await store.create('favoriteprofile', { ...input, created_at: new Date().toISOString() });
    log({ level: 'info', action: 'favorites.add', game: input.game, favoriteId: id });
    return { ok: true, id };
  }

  async function listFavorites(limit: number): Promise<{ ok: true; items: FavoriteProfile[] }> {
    const items = await store.find('favoriteprofile', [], limit);
    return { ok: true, items };
  }

  return { addFavorite, listFavorites };
}

export type FavoritesService = ReturnType<typeof createFavoritesService>;
