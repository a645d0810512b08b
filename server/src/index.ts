import http from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { closeDb, ensureDb } from './lib/db';
import { errorMeta, logger } from './lib/logger';
import { closeRedis, createRedis, ensureRedis } from './lib/redis';
import { ensureSchema } from './lib/schema';
import { RealtimeHub } from './realtime/hub';
import { RedisHubBridge } from './realtime/redisBridge';
import type { GameRepository } from './repositories/gamesRepo';
import { InMemoryGameRepository } from './repositories/memoryGamesRepo';
import { PgGameRepository } from './repositories/pgGamesRepo';
import { GameService } from './services/gameService';
import { createSocketServer } from './socket/index';

async function createRepository(): Promise<GameRepository> {
  if (env.gameStore === 'memory') {
    logger.warn('[store] using in-memory game store; games are lost on restart');
    return new InMemoryGameRepository();
  }
  const db = await ensureDb();
  await ensureSchema(db);
  return new PgGameRepository(db);
}

async function startBridge(hub: RealtimeHub): Promise<RedisHubBridge | null> {
  if (!env.redisHubBridge) return null;
  const pub = await ensureRedis(createRedis('publisher'));
  const sub = await ensureRedis(createRedis('subscriber'));
  const bridge = new RedisHubBridge(hub, pub, sub);
  await bridge.start();
  return bridge;
}

async function start() {
  const hub = new RealtimeHub({ deliveryTimeoutMs: env.broadcastTimeoutMs });
  const repo = await createRepository();
  const bridge = await startBridge(hub);
  const service = new GameService(repo, hub, { repositoryTimeoutMs: env.repositoryTimeoutMs });

  const app = createApp(service);
  const server = http.createServer(app);
  const io = createSocketServer(server, { service, hub });

  server.listen(env.port, () => {
    logger.info(`[server] listening on http://localhost:${env.port}`, { store: env.gameStore });
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('[server] shutting down', { signal });
    await new Promise<void>((resolve) => io.close(() => resolve()));
    await hub.flush();
    if (bridge) await bridge.stop();
    await closeRedis();
    await closeDb();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('[server] shutdown failed', errorMeta(err));
        process.exit(1);
      });
    });
  }
}

start().catch((err: unknown) => {
  logger.error('[server] failed to start', errorMeta(err));
  process.exit(1);
});
