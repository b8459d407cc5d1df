import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { logger, setLogLevel } from './logger.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const app = createApp({
  paginationPolicy: config.pagination,
  strictPagination: config.strictPagination,
});

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  app.listen(config.port, () => {
    logger.info(`pagewise-api listening on http://localhost:${config.port}`);
  });
}

export default app;
