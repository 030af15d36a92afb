import { errorMessage, log } from '../shared/log';
import type { GameId, GameStatsStore } from './types';

const NOTE_MAX_LENGTH = 200;

export interface SearchLogger {
  /** Best effort: a failed write is logged and never reaches the caller. */
  record(game: GameId, query: Record<string, string>, resultOk: boolean, note?: string): Promise<void>;
}

export function createSearchLogger(store: GameStatsStore): SearchLogger {
  return {
    async record(game, query, resultOk, note) {
      try {
        await store.create('searchlog', {
          game,
          query,
          result_ok: resultOk,
          note: note === undefined ? null : note.slice(0, NOTE_MAX_LENGTH),
          created_at: new Date().toISOString(),
        });
      } catch (err) {
        log({ level: 'warn', action: 'searchlog.write_failed', game, error: errorMessage(err) });
      }
    },
  };
}
