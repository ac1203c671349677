import express from 'express';
import cookieParser from 'cookie-parser';
import type { AppServices } from './composition.js';
import { createChatRouter } from './routes/chat.js';
import { createProfileRouter } from './routes/profile.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { AppError, errorHandler } from './middleware/error-handler.js';
import { ErrorCodes } from './middleware/error-codes.js';

export function createApp(services: AppServices) {
  const app = express();
  app.use(requestIdMiddleware);
  app.use(express.json());
  app.use(cookieParser());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // routes
  app.use('/chat', createChatRouter(services));
  app.use('/profile', createProfileRouter(services));

  app.use((req, _res, next) => {
    next(new AppError(404, ErrorCodes.NOT_FOUND, `No route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler);
  return app;
}
