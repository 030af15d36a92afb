import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { BadRequestError, InternalError } from '../shared/errors';
import { errorMessage, log } from '../shared/log';
import type { SearchLogger } from './search-log';
import type { FfxivCharacter, FfxivSearchResult } from './types';

const MAX_RESULTS = 10;

const searchResponseSchema = z.object({
  Results: z
    .array(
      z
        .object({
          ID: z.number().nullish(),
          Name: z.string().nullish(),
          Server: z.string().nullish(),
          Avatar: z.string().nullish(),
          DC: z.string().nullish(),
        })
        .passthrough()
    )
    .default([]),
});

export interface FfxivDeps {
  http: Pick<AxiosInstance, 'get'>;
  xivApiUrl: string;
  searchLog: SearchLogger;
}

export function createFfxivService({ http, xivApiUrl, searchLog }: FfxivDeps) {
  async function searchCharacters(rawName: string, rawWorld?: string): Promise<FfxivSearchResult> {
    const name = rawName.trim();
    const world = (rawWorld ?? '').trim();
    if (!name) {
      throw new BadRequestError('Name required');
    }

    const params: Record<string, string> = { name };
    if (world) {
      params['server'] = world;
    }

    let results: FfxivCharacter[];
    try {
      const response = await http.get<unknown>(`${xivApiUrl}/character/search`, { params });
      const parsed = searchResponseSchema.parse(response.data);
      results = parsed.Results.slice(0, MAX_RESULTS).map((item) => ({
        id: item.ID ?? null,
        name: item.Name ?? null,
        server: item.Server ?? null,
        avatar: item.Avatar ?? null,
        data_center: item.DC ?? null,
      }));
    } catch (err) {
      log({ level: 'error', action: 'ffxiv.search.failed', name, world, error: errorMessage(err) });
      await searchLog.record('ffxiv', params, false, errorMessage(err));
      throw new InternalError('Failed to search FFXIV characters');
    }

    await searchLog.record('ffxiv', params, true);
    return { game: 'ffxiv', results };
  }

  return { searchCharacters };
}

export type FfxivService = ReturnType<typeof createFfxivService>;
