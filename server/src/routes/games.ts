import { Router, type NextFunction, type Response } from 'express';
import { z } from 'zod';
import { currentUser, requireAuth } from '../middleware/auth';
import type { GameService, ServiceResult } from '../services/gameService';
import { GameStatus } from '../types/game';

const createSchema = z.object({
  player2: z.string().min(1).optional(),
});

const moveSchema = z.object({
  position: z.number().int(),
});

const listQuerySchema = z.object({
  status: z.enum([GameStatus.Waiting, GameStatus.InProgress, GameStatus.Finished, GameStatus.Draw]).optional(),
  limit: z.coerce.number().int().default(20),
  offset: z.coerce.number().int().default(0),
});

function reply<T>(res: Response, next: NextFunction, result: ServiceResult<T>, status = 200) {
  if (!result.ok) return next(result.error);
  return res.status(status).json(result.value);
}

export function gamesRouter(service: GameService) {
  const router = Router();
  router.use('/games', requireAuth);

  // POST /games { player2? } -> caller plays X
  router.post('/games', async (req, res, next) => {
    try {
      const body = createSchema.parse(req.body ?? {});
      const result = await service.createGame(currentUser(req).id, body.player2 ?? null);
      reply(res, next, result, 201);
    } catch (err) {
      next(err);
    }
  });

  // GET /games?status=in_progress&limit=10
  router.get('/games', async (req, res, next) => {
    try {
      const q = listQuerySchema.parse(req.query);
      reply(res, next, await service.listGames({ status: q.status, limit: q.limit, offset: q.offset }));
    } catch (err) {
      next(err);
    }
  });

  router.get('/games/waiting', async (req, res, next) => {
    try {
      const q = listQuerySchema.omit({ status: true }).parse(req.query);
      reply(res, next, await service.listGames({ status: GameStatus.Waiting, limit: q.limit, offset: q.offset }));
    } catch (err) {
      next(err);
    }
  });

  router.get('/games/mine', async (req, res, next) => {
    try {
      const q = listQuerySchema.parse(req.query);
      const participant = currentUser(req).id;
      reply(res, next, await service.listGames({ status: q.status, participant, limit: q.limit, offset: q.offset }));
    } catch (err) {
      next(err);
    }
  });

  router.get('/games/:id', async (req, res, next) => {
    try {
      reply(res, next, await service.getGame(req.params.id));
    } catch (err) {
      next(err);
    }
  });

  router.get('/games/:id/moves', async (req, res, next) => {
    try {
      const result = await service.getMoves(req.params.id);
      if (!result.ok) return next(result.error);
      res.json({ gameId: req.params.id, moves: result.value });
    } catch (err) {
      next(err);
    }
  });

  router.post('/games/:id/join', async (req, res, next) => {
    try {
      reply(res, next, await service.joinGame(req.params.id, currentUser(req).id));
    } catch (err) {
      next(err);
    }
  });

  router.post('/games/:id/move', async (req, res, next) => {
    try {
      const body = moveSchema.parse(req.body);
      reply(res, next, await service.applyMove(req.params.id, currentUser(req).id, body.position));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
