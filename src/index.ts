import { createServer } from './server.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createRuntime } from './runtime.js';
import { startPipelineWorker } from './worker.js';

const config = loadConfig();
const runtime = createRuntime(config);
const worker = startPipelineWorker(config, runtime);

const app = createServer(runtime.service, config);

const server = app.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      apiPrefix: config.apiPrefix,
      queue: config.queueDriver,
      logLevel: config.logLevel,
      projectFileDir: config.projectFileDir,
    },
    'Pipeline API listening',
  );
});

const shutdown = (signal: string) => {
  logger.info({ signal }, 'Shutting down');
  server.close();
  Promise.all([worker?.close(), runtime.close()])
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
