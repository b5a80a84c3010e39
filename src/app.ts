import express from 'express';
import morgan from 'morgan';
import cors from 'cors';
import helmet from 'helmet';

import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { SessionStore } from './logic/sessions.js';
import type { ChatClient, EnvironmentClients } from './types.js';
import { toHttpError } from './utils/httpError.js';

import healthRouter from './routes/health.js';
import stakeholdersRouter from './routes/stakeholders.js';
import dashboardRouter from './routes/dashboard.js';
import chatRouter from './routes/chat.js';

export interface AppDeps {
  config: AppConfig;
  clients: EnvironmentClients;
  chat: ChatClient;
  logger: Logger;
  sessions?: SessionStore;
  requestLog?: boolean;
}

export function createApp(deps: AppDeps) {
  const { config, clients, chat, logger } = deps;
  const sessions = deps.sessions ?? new SessionStore(config.sessionTtlMs);

  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins }));
  app.use(express.json());
  if (deps.requestLog ?? true) app.use(morgan('dev'));

  app.use('/health', healthRouter);
  app.use('/stakeholders', stakeholdersRouter);
  app.use('/dashboard', dashboardRouter({ config, clients, logger }));
  app.use('/chat', chatRouter({ config, clients, chat, sessions, logger }));

  // 404
  app.use((_req, res) => res.status(404).json({ error: 'Not Found' }));

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const normalized = toHttpError(err);
    if (normalized.status >= 500) logger.error({ err, path: req.path }, 'request failed');
    res.status(normalized.status).json(normalized.body);
  });

  return app;
}
