import { Router } from 'express';
import { env } from '../config/env';

const router = Router();

// Liveness only; the game store is not probed here
router.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'ttt-live-server', version: '0.2.0', store: env.gameStore });
});

export default router;
