// Express application, separate from the listener so tests can drive it in process.
import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from '@/config/app.config';
import type { SessionStore } from '@/memory/SessionStore';
import type { EventAssistant } from '@/services/event-assistant';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorMiddleware, notFoundHandler } from '@/middleware/error.middleware';
import { createApiRouter } from '@/routes';
import { logger } from '@/utils/logger';

export interface AppDeps {
  assistant: EventAssistant;
  sessions: SessionStore;
  config: Pick<AppConfig, 'nodeEnv' | 'http'> & { session: Pick<AppConfig['session'], 'historyLimit'> };
}

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const app = express();

  app.use(helmet());
  app.use(cors(config.http.corsOrigins?.length ? { origin: config.http.corsOrigins } : {}));
  app.use(attachCorrelationId);

  if (config.nodeEnv !== 'test') {
    app.use(
      morgan('tiny', {
        stream: { write: (line: string) => logger.info(line.trim()) },
      }),
    );
  }

  if (config.nodeEnv === 'production') {
    // Every query costs several model calls.
    app.use(
      '/api/query',
      rateLimit({
        windowMs: 60 * 1000,
        limit: config.http.rateLimitPerMinute,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: deps.sessions.isAvailable() ? 'ok' : 'unavailable' });
  });

  app.use(
    '/api',
    createApiRouter({
      assistant: deps.assistant,
      sessions: deps.sessions,
      historyLimit: config.session.historyLimit,
    }),
  );

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
