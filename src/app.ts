import cors from 'cors';
import express from 'express';

import { CorsConfig, HttpStatus, ServerConfig } from './config';
import { requestLogger } from './middleware/requestLogger';
import { requestTimeout } from './middleware/requestTimeout';
import workoutsRouter from './routes/workouts';

/**
 * Build the Express application.
 * Kept separate from `listen` so tests can mount it on an ephemeral port.
 */
export function createApp(): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  const corsOptions = {
    allowedHeaders: CorsConfig.allowedHeaders,
    methods: CorsConfig.allowedMethods,
    origin: CorsConfig.origins,
  };

  app.use(cors(corsOptions));
  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  // Request logging runs first so later middleware can use req.log
  app.use(requestLogger);
  app.use(requestTimeout);

  app.use('/api/workouts', workoutsRouter);

  // Health check endpoint
  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  return app;
}
