// src/index.ts
import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createConfiguredChatClient, createEnvironmentClients } from './services/index.js';

const config = loadConfig();
const logger = createLogger(config);

if (config.earthObservationKey.kind === 'demo') {
  logger.warn('NASA_API_KEY not set, earth observation uses the public demo key');
}

const app = createApp({
  config,
  logger,
  clients: createEnvironmentClients(config),
  chat: createConfiguredChatClient(config),
});

app.listen(config.port, () => logger.info(`API on http://localhost:${config.port}`));
