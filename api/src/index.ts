import path from 'path';
import { createApp } from './app';
import { config } from './config';
import { logger } from './logger';
import { JsonFileRankingPersistence } from './rankings/persistence';
import { LinterScorer } from './scoring/linterScorer';
import { BattleService } from './services/battleService';

const rankingFile = path.resolve(config.rankingFile);

const battleService = new BattleService({
  scorer: new LinterScorer({ bin: config.linterBin, timeoutMs: config.linterTimeoutMs }),
  persistence: new JsonFileRankingPersistence(rankingFile),
});

const app = createApp({ battleService, corsOrigin: config.corsOrigin });

const server = app.listen(config.port, () => {
  logger.info({
    module: 'index',
    port: config.port,
    ranking_file: rankingFile,
    linter: config.linterBin,
    node_version: process.version,
  }, 'API server started');
});

const shutdown = () => {
  logger.info({ module: 'index' }, 'Shutting down...');
  server.close(() => process.exit(0));
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
