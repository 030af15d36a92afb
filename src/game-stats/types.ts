import type { DocumentStore } from '../shared/document-store';

export type GameId = 'osrs' | 'ffxiv';

export interface SkillStats {
  rank: number;
  level: number;
  xp: number;
}

export interface OsrsStats {
  game: 'osrs';
  username: string;
  skills: Record<string, SkillStats>;
}

export interface FfxivCharacter {
  id: number | null;
  name: string | null;
  server: string | null;
  avatar: string | null;
  data_center: string | null;
}

export interface FfxivSearchResult {
  game: 'ffxiv';
  results: FfxivCharacter[];
}

/** A profile the user bookmarked, with the raw stats payload for quick rendering. */
export interface FavoriteProfile {
  id: string;
  game: string;
  label: string;
  identifier: string;
  payload: Record<string, unknown>;
  created_at: string;
}

export interface SearchLog {
  id: string;
  game: GameId;
  query: Record<string, string>;
  result_ok: boolean;
  note: string | null;
  created_at: string;
}

export type GameStatsCollections = {
  favoriteprofile: FavoriteProfile;
  searchlog: SearchLog;
};

export type GameStatsStore = DocumentStore<GameStatsCollections>;
