import 'dotenv/config';
import { config } from '../config.js';
import { storage } from '../storage/index.js';
import { logger } from '../utils/logger.js';
import { createApp } from './app.js';

const port = config.api.port;
const app = createApp();

app.listen(port, () => {
    logger.info(`🚀 API listening on http://localhost:${port} (${config.network_mode})`);
    logger.info(`📁 State file: ${storage.path}`);
});
