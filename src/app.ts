import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { createActivitiesRouter } from './routes/activities.js';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { ActivityRegistry } from './services/activities.js';
import { AppConfig } from './config/env.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  registry: ActivityRegistry;
  config: Pick<AppConfig, 'nodeEnv' | 'corsOrigins' | 'httpLogFormat' | 'staticDir'>;
}

export function createApp({ registry, config }: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(cors(config.corsOrigins.length > 0 ? { origin: config.corsOrigins } : undefined));
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.httpLogFormat, {
      stream: { write: (line: string) => logger.http(line.trim(), { tags: ['http', 'access'] }) }
    }));
  }

  app.get('/', (req, res) => {
    res.redirect(307, '/static/index.html');
  });

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      activities: registry.size,
      timestamp: new Date().toISOString()
    });
  });

  // Routes
  app.use('/static', express.static(config.staticDir));
  app.use('/activities', createActivitiesRouter(registry));

  logger.info('Routes mounted', {
    activities: true,
    static: config.staticDir
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler());

  return app;
}

export default createApp;
