import express from 'express';
import cookieParser from 'cookie-parser';
import type { Services } from './services.js';
import { errorHandler, httpLogger, notFound } from './middleware.js';
import oauthRouter from './oauth.js';
import webhookRouter from './webhooks.js';
import integrationRouter from './integrationRoutes.js';
import apiRouter from './apiRoutes.js';

export function createApp(services: Services) {
  const app = express();
  app.disable('x-powered-by');
  app.use(httpLogger());

  // Webhook reads its own RAW body (signature check), so it goes before the JSON parser
  app.use(webhookRouter(services));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));
  // Cookies for OAuth state
  app.use(cookieParser());

  app.get('/', (_req, res) => res.status(200).send('API is running'));
  app.get('/healthz', (_req, res) => res.json({ ok: true }));

  app.use(oauthRouter(services));
  app.use(integrationRouter(services));
  app.use('/app/api', apiRouter(services));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
