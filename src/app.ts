import path from 'path';
import express, { Express } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { config, RateLimitConfig } from './config';
import { initDatabase } from './controllers/databaseController';
import { errorHandler, notFound } from './middleware/errorHandler';
import { withStore } from './middleware/withStore';
import { createAttendeeRoutes } from './routes/attendeeRoutes';
import { createEventRoutes } from './routes/eventRoutes';
import { createExportRoutes } from './routes/exportRoutes';
import { StoreProvider } from './store/eventStore';
import { Branding } from './types';

export interface AppOptions {
  storeProvider: StoreProvider;
  branding?: Branding;
  rateLimit?: RateLimitConfig;
}

const ROOT_DIR = path.join(__dirname, '..');

export const createApp = ({
  storeProvider,
  branding = config.branding,
  rateLimit: rateLimitConfig = config.rateLimit,
}: AppOptions): Express => {
  const app = express();

  app.set('view engine', 'ejs');
  app.set('views', path.join(ROOT_DIR, 'views'));
  app.locals.branding = branding;

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
          fontSrc: ["'self'", 'data:'],
          objectSrc: ["'none'"],
          mediaSrc: ["'self'"],
          frameSrc: ["'none'"],
          baseUri: ["'self'"],
          formAction: ["'self'"],
          upgradeInsecureRequests: config.nodeEnv === 'production' ? [] : null,
        },
      },
      frameguard: { action: 'deny' },
      crossOriginEmbedderPolicy: false,
    })
  );

  // Static assets are not counted against the request limit.
  app.use('/static', express.static(path.join(ROOT_DIR, 'static')));

  app.use(express.urlencoded({ extended: false, limit: '10kb' }));
  app.use(express.json({ limit: '10kb' }));
  app.use(
    rateLimit({
      windowMs: rateLimitConfig.windowMs,
      limit: rateLimitConfig.max,
      message: 'Too many requests from this IP',
    })
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.get('/init_db', withStore(storeProvider, initDatabase));

  app.use(createEventRoutes(storeProvider));
  app.use(createAttendeeRoutes(storeProvider));
  app.use(createExportRoutes(storeProvider));

  app.use(notFound);
  app.use(errorHandler);

  return app;
};
