import dotenv from 'dotenv';
import { createApp } from './server.js';
import { loadConfig, ConfigError } from './config/index.js';
import { PipelineExecutor } from './pipeline/executor.js';
import { createDefaultDependencies } from './pipeline/dependencies.js';
import { createRunHistory } from './runs/history.js';
import { createIdempotencyGuard } from './idempotency/guard.js';
import { RedisConnection } from './persistence/redis-client.js';
import { logger, errorMessage } from './observability/logger.js';
import type { PipelineConfig } from './types.js';

dotenv.config();

let config: PipelineConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`FATAL: ${error.message}`);
    process.exit(1);
  }
  throw error;
}

const redis = process.env.REDIS_URL ? RedisConnection.connect(process.env.REDIS_URL) : null;

const history = createRunHistory(redis);
const executor = new PipelineExecutor(config, createDefaultDependencies(config, history));

const app = createApp({
  secret: process.env.GITHUB_WEBHOOK_SECRET,
  executor,
  idempotency: createIdempotencyGuard(redis),
  history,
  redis,
  runLock: executor.runLock,
});

const PORT = Number(process.env.PORT) || 3000;

const server = app.listen(PORT, () => {
  logger.info('startup', 'release-conductor listening', {
    port: PORT,
    mode: redis ? 'distributed (Redis)' : 'single-instance (in-memory)',
    workDir: config.workDir,
    service: config.serviceName,
    targetBranch: config.targetBranch,
    registries: config.registries.map(r => `${r.environment}/${r.region}`),
    pushParallel: config.pushParallel,
  });
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info('shutdown', `${signal} received, graceful shutdown`);
  server.close(() => {
    (redis ? redis.close() : Promise.resolve())
      .catch(error => logger.error('shutdown', 'Redis shutdown failed', { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
