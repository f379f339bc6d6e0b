/**
 * Express Application
 * Operations API for the trading pipeline
 */

import express, { type Express } from 'express';
import { metricsMiddleware } from '../monitoring/middleware';
import { errorHandler, notFoundHandler, validateContentType } from './middleware';
import { type ApiServices, createRoutes } from './routes';

export const API_PREFIX = '/api/v1';

export function createApp(services: ApiServices): Express {
  const app = express();

  app.use(express.json());
  app.use(metricsMiddleware);
  app.use(validateContentType);

  app.use(API_PREFIX, createRoutes(services));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
