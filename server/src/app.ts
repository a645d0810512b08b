import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import healthRouter from './routes/health';
import { gamesRouter } from './routes/games';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import type { GameService } from './services/gameService';

export function createApp(service: GameService) {
  const app = express();

  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json());

  app.use('/', healthRouter);
  app.use('/', gamesRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
