import { errorMeta, logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { ServerMessage } from '../types/messages';

export interface HubSubscriber {
  readonly id: string;
  deliver(message: ServerMessage): void | Promise<void>;
}

/** Forwards published messages beyond this process (see redisBridge). */
export interface HubRelay {
  forward(gameId: string, message: ServerMessage): Promise<void>;
}

export interface HubOptions {
  deliveryTimeoutMs: number;
}

export function gameChannel(gameId: string) {
  return `game:${gameId}`;
}

/**
 * Per-game subscriber registry and fan-out. Holds no game logic.
 *
 * Every publish for a game is appended to that game's delivery chain, so
 * subscribers see a game's messages in publish order while other games are
 * delivered independently. A slow or broken subscriber is cut off by the
 * delivery timeout and logged; it never fails the publisher.
 */
export class RealtimeHub {
  private readonly games = new Map<string, Map<string, HubSubscriber>>();
  private readonly chains = new Map<string, Promise<void>>();
  private relay: HubRelay | null = null;

  constructor(private readonly options: HubOptions) {}

  setRelay(relay: HubRelay | null) {
    this.relay = relay;
  }

  /** Returns false when the subscriber was already registered. */
  subscribe(gameId: string, subscriber: HubSubscriber): boolean {
    let subs = this.games.get(gameId);
    if (!subs) {
      subs = new Map();
      this.games.set(gameId, subs);
    }
    if (subs.has(subscriber.id)) return false;
    subs.set(subscriber.id, subscriber);
    return true;
  }

  unsubscribe(gameId: string, subscriberId: string): boolean {
    const subs = this.games.get(gameId);
    if (!subs) return false;
    const removed = subs.delete(subscriberId);
    if (subs.size === 0) this.games.delete(gameId);
    return removed;
  }

  subscriberCount(gameId: string): number {
    return this.games.get(gameId)?.size ?? 0;
  }

  publish(gameId: string, message: ServerMessage): void {
    this.enqueue(gameId, async () => {
      await this.fanOut(gameId, message);
      if (this.relay) await this.forward(this.relay, gameId, message);
    });
  }

  /** Fan out a message that came in through the relay; it is not forwarded again. */
  deliverLocal(gameId: string, message: ServerMessage): void {
    this.enqueue(gameId, () => this.fanOut(gameId, message));
  }

  /** Resolves once everything published so far (for one game, or all) is delivered. */
  async flush(gameId?: string): Promise<void> {
    if (gameId !== undefined) {
      await this.chains.get(gameId);
      return;
    }
    await Promise.all(Array.from(this.chains.values()));
  }

  private enqueue(gameId: string, step: () => Promise<void>) {
    const previous = this.chains.get(gameId) ?? Promise.resolve();
    const next = previous.then(step).catch((err) => {
      logger.error('[hub] delivery step failed', { gameId, ...errorMeta(err) });
    });
    this.chains.set(gameId, next);
    void next.then(
      () => {
        if (this.chains.get(gameId) === next) this.chains.delete(gameId);
      },
      () => undefined
    );
  }

  private async fanOut(gameId: string, message: ServerMessage) {
    const subs = Array.from(this.games.get(gameId)?.values() ?? []);
    if (subs.length === 0) return;
    const results = await Promise.allSettled(
      subs.map((s) =>
        withTimeout(
          async () => {
            await s.deliver(message);
          },
          this.options.deliveryTimeoutMs,
          () => new Error(`delivery to ${s.id} timed out`)
        )
      )
    );
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        logger.warn('[hub] dropped message for subscriber', {
          gameId,
          subscriberId: subs[i].id,
          type: message.type,
          ...errorMeta(r.reason),
        });
      }
    });
  }

  private async forward(relay: HubRelay, gameId: string, message: ServerMessage) {
    try {
      await withTimeout(
        () => relay.forward(gameId, message),
        this.options.deliveryTimeoutMs,
        () => new Error('relay forward timed out')
      );
    } catch (err) {
      logger.warn('[hub] relay forward failed', { gameId, ...errorMeta(err) });
    }
  }
}
