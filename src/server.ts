import dotenv from 'dotenv'
import { createApp } from './app';
import { AppConfig, loadConfig } from './config/app.config';
import { logger } from './utils/logger';
import { toImageEditError } from './utils/imageErrors';
dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  const error = toImageEditError(err);
  logger(`Failed to load configuration: ${error.message}${error.details ? ` (${error.details})` : ''}`, 'error');
  process.exit(1);
}

if (!config.hosting.apiKey) {
  logger('IMGBB_API_KEY environment variable is not set. Image uploads will fail until it is configured.', 'error');
}

const app = createApp(config);

app.listen(config.port, () => {
  logger(`Server running on port ${config.port}`);
});
