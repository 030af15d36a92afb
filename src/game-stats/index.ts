import axios from 'axios';
import { loadGameStatsConfig } from '../shared/config';
import { openDynamoStore } from '../shared/dynamo-store';
import { createGameStatsHandler } from './handler';
import type { GameStatsCollections } from './types';

const UPSTREAM_TIMEOUT_MS = 10_000;

const config = loadGameStatsConfig();

export const store = openDynamoStore<GameStatsCollections>(config.database);

export const handler = createGameStatsHandler({
  store,
  http: axios.create({ timeout: UPSTREAM_TIMEOUT_MS }),
  osrsHiscoreUrl: config.osrsHiscoreUrl,
  xivApiUrl: config.xivApiUrl,
});
