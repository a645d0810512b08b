import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { errorMeta, logger } from '../lib/logger';
import { serverMessageSchema, type ServerMessage } from '../types/messages';
import { gameChannel, type HubRelay, type RealtimeHub } from './hub';

const CHANNEL_PATTERN = gameChannel('*');

// Narrow views of the ioredis client; a publisher and a dedicated subscriber connection.
export interface Publisher {
  publish(channel: string, message: string): Promise<number>;
}

export interface PatternSubscriber {
  psubscribe(pattern: string): Promise<unknown>;
  punsubscribe(pattern: string): Promise<unknown>;
  on(event: 'pmessage', listener: (pattern: string, channel: string, message: string) => void): unknown;
  off(event: 'pmessage', listener: (pattern: string, channel: string, message: string) => void): unknown;
}

const envelopeSchema = z.object({
  origin: z.string(),
  gameId: z.string(),
  message: serverMessageSchema,
});

/**
 * Relays hub traffic between server instances over Redis pub/sub so that
 * two participants connected to different processes still see each other's
 * moves. Each instance ignores what it published itself.
 */
export class RedisHubBridge implements HubRelay {
  readonly origin: string;

  constructor(
    private readonly hub: RealtimeHub,
    private readonly pub: Publisher,
    private readonly sub: PatternSubscriber,
    origin: string = uuid()
  ) {
    this.origin = origin;
  }

  async start() {
    this.sub.on('pmessage', this.onMessage);
    await this.sub.psubscribe(CHANNEL_PATTERN);
    this.hub.setRelay(this);
    logger.info('[bridge] relaying hub traffic over redis', { origin: this.origin });
  }

  async stop() {
    this.hub.setRelay(null);
    this.sub.off('pmessage', this.onMessage);
    await this.sub.punsubscribe(CHANNEL_PATTERN);
  }

  async forward(gameId: string, message: ServerMessage): Promise<void> {
    await this.pub.publish(gameChannel(gameId), JSON.stringify({ origin: this.origin, gameId, message }));
  }

  private readonly onMessage = (_pattern: string, channel: string, raw: string) => {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      logger.warn('[bridge] dropping non-JSON message', { channel, ...errorMeta(err) });
      return;
    }
    const parsed = envelopeSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('[bridge] dropping malformed envelope', { channel, issues: parsed.error.issues.length });
      return;
    }
    const { origin, gameId, message } = parsed.data;
    if (origin === this.origin) return;
    if (channel !== gameChannel(gameId)) {
      logger.warn('[bridge] envelope game does not match channel', { channel, gameId });
      return;
    }
    this.hub.deliverLocal(gameId, message);
  };
}
