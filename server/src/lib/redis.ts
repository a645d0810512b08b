import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from './logger';

const clients: Redis[] = [];

// Each role gets its own connection: a client in subscriber mode cannot publish
export function createRedis(role: 'publisher' | 'subscriber') {
  let errorLoggedOnce = false;
  const client = new Redis(env.redisUrl, {
    lazyConnect: true,
    // Fail fast instead of queueing commands while disconnected
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });

  client.on('error', (err) => {
    if (!errorLoggedOnce) {
      logger.warn('[redis] connection error', { role, error: err?.message || String(err) });
      errorLoggedOnce = true;
    }
  });
  client.on('ready', () => {
    errorLoggedOnce = false;
  });

  clients.push(client);
  return client;
}

export async function ensureRedis(client: Redis) {
  if (client.status === 'wait' || client.status === 'end') {
    await client.connect();
  }
  return client;
}

export async function closeRedis() {
  const open = clients.splice(0, clients.length);
  await Promise.all(open.map((c) => c.quit().catch(() => c.disconnect())));
}
