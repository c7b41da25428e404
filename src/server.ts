import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './utils/logger';

const config = loadConfig();
const logger = createLogger('iges-to-obj', { level: config.logLevel });
const app = createApp({ config, logger });

const server = app.listen(config.port, () => {
  logger.info(`Server listening on http://localhost:${config.port}`, {
    containerRuntime: config.containerRuntime,
    toolImage: config.toolImage,
    stagingRoot: config.stagingRoot,
  });
});

function shutdown(signal: NodeJS.Signals) {
  logger.info('Shutting down', { signal });
  server.close((err) => {
    if (err) {
      logger.error('Error while closing server', {}, err);
      process.exitCode = 1;
    }
  });
}

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);
