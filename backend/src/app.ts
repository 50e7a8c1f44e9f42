import express, { Express } from 'express';
import { AppConfig } from './config';
import { Services } from './services';
import {
  createChatRateLimiter,
  createCorsMiddleware,
  errorHandler,
  requestLogger,
  securityHeaders,
} from './api/middleware';
import { createChatHandler } from './api/chat';
import { createHistoryRouter } from './api/history';
import { createHealthCheck } from './api/health';

export function createApp(
  config: Pick<AppConfig, 'nodeEnv' | 'frontendUrl' | 'chatRequestsPerMinute'>,
  services: Pick<Services, 'assistant' | 'history'>
): Express {
  const app = express();

  // Trust only the first proxy so rate limiting sees the client address
  if (config.nodeEnv === 'production') {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json({ limit: '32kb' }));
  app.use(createCorsMiddleware(config.frontendUrl, config.nodeEnv));
  app.use(requestLogger);

  app.get('/health', createHealthCheck(services.history));
  app.post('/chat', createChatRateLimiter(config.chatRequestsPerMinute), createChatHandler(services.assistant));
  app.use('/api/history', createHistoryRouter(services.history));

  app.use(errorHandler);

  return app;
}
