// Load environment variables FIRST: the logger reads LOG_LEVEL when its module loads.
import 'dotenv/config';

import { createApp } from './app';
import { loadConfig } from '@/config/app.config';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import { getPipelineDeps } from '@/services/pipeline-deps';
import { logger } from '@/utils/logger';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();

const config = loadConfig();
const { assistant, store } = getPipelineDeps(config);
const sessions = new InMemorySessionStore({
  ttlMinutes: config.session.ttlMinutes,
  maxSessions: config.session.maxSessions,
});

const app = createApp({ assistant, sessions, config });

const server = app.listen(config.port, () => {
  logger.info('server:listening', {
    port: config.port,
    env: config.nodeEnv,
    provider: config.models.provider,
    graph: config.catalog.graphName,
  });
});

setServerInstance(server);
onShutdown('sessions', () => sessions.destroy());
onShutdown('catalog', () => store.close());
setupGracefulShutdown();
