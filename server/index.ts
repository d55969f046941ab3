import 'dotenv/config';
import { loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  articleTimeoutMs: config.analysis.articleTimeoutMs,
  maxUrls: config.server.maxUrls,
  chargedDictDir: config.analysis.chargedDictDir,
});

const app = createApp({ config, logger });
const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
