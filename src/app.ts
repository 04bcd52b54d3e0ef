import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import type { ChatDeps } from './ai/orchestrator.js';
import { createChatRouter } from './routes/chat.js';
import { createHealthRouter } from './routes/health.js';

export interface AppDeps extends ChatDeps {
  completionReady: () => boolean;
}

export function createApp(config: Pick<AppConfig, 'allowOrigins' | 'allowOriginRegex'>, deps: AppDeps): Express {
  const app = express();
  app.use(
    cors({
      origin: config.allowOrigins.length ? config.allowOrigins : config.allowOriginRegex,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createChatRouter(deps));
  app.use(
    '/health',
    createHealthRouter({ backend: deps.completion.backend, completionReady: deps.completionReady }),
  );

  app.get('/', (_req, res) => res.type('text/plain').send('Market Chat Orchestrator v1'));

  return app;
}
