import { isAxiosError, type AxiosInstance } from 'axios';
import { BadRequestError, InternalError, NotFoundError } from '../shared/errors';
import { errorMessage, log } from '../shared/log';
import type { SearchLogger } from './search-log';
import type { OsrsStats, SkillStats } from './types';

/** Hiscore feed order: one `rank,level,xp` line per skill. */
export const OSRS_SKILLS = [
  'Overall', 'Attack', 'Defence', 'Strength', 'Hitpoints', 'Ranged', 'Prayer', 'Magic',
  'Cooking', 'Woodcutting', 'Fletching', 'Fishing', 'Firemaking', 'Crafting', 'Smithing', 'Mining',
  'Herblore', 'Agility', 'Thieving', 'Slayer', 'Farming', 'Runecraft', 'Hunter', 'Construction',
] as const;

const UNRANKED: SkillStats = { rank: -1, level: 1, xp: 0 };

const INTEGER_RE = /^-?\d+$/;

function parseSkillLine(line: string | undefined): SkillStats {
  const fields = (line ?? '').trim().split(',');
  if (fields.length !== 3 || !fields.every(field => INTEGER_RE.test(field))) {
    return { ...UNRANKED };
  }
  const [rank, level, xp] = fields.map(Number);
  return { rank: rank ?? -1, level: level ?? 1, xp: xp ?? 0 };
}

/** Parses the skill section of the feed; a malformed line only defaults that skill. */
export function parseHiscores(text: string): Record<string, SkillStats> {
  const lines = text.trim().split('\n');
  const skills: Record<string, SkillStats> = {};
  OSRS_SKILLS.forEach((skill, index) => {
    skills[skill] = parseSkillLine(lines[index]);
  });
  return skills;
}

export interface OsrsDeps {
  http: Pick<AxiosInstance, 'get'>;
  hiscoreUrl: string;
  searchLog: SearchLogger;
}

export function createOsrsService({ http, hiscoreUrl, searchLog }: OsrsDeps) {
  async function fetchStats(rawUsername: string): Promise<OsrsStats> {
    const username = rawUsername.trim();
    if (!username) {
      throw new BadRequestError('Username required');
    }
    const query = { username };

    let text: string;
    try {
      const response = await http.get<unknown>(hiscoreUrl, { params: { player: username }, responseType: 'text' });
      if (typeof response.data !== 'string') {
        throw new Error('Unexpected hiscore response body');
      }
      text = response.data;
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) {
        await searchLog.record('osrs', query, false, 'Player not found');
        throw new NotFoundError('Player not found');
      }
      log({ level: 'error', action: 'osrs.fetch.failed', username, error: errorMessage(err) });
      await searchLog.record('osrs', query, false, errorMessage(err));
      throw new InternalError('Failed to fetch OSRS stats');
    }

    const skills = parseHiscores(text);
    await searchLog.record('osrs', query, true);
    return { game: 'osrs', username, skills };
  }

  return { fetchStats };
}

export type OsrsService = ReturnType<typeof createOsrsService>;
