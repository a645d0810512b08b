import { z } from 'zod';
import { NotFoundError } from '../lib/errors';
import { errorMeta, logger } from '../lib/logger';
import type { HubSubscriber, RealtimeHub } from '../realtime/hub';
import type { GameService } from '../services/gameService';
import type { GameStateSnapshot } from '../types/game';
import {
  clientMessageSchemas,
  CloseCodes,
  isClientMessageType,
  type ClientMessageMap,
  type ClientMessageType,
  type CloseCode,
  type ServerMessage,
} from '../types/messages';

export interface Identity {
  id: string;
  username?: string;
}

export type Authenticator = (token: string | undefined) => Identity | null;

/** What the handler needs from the underlying socket. */
export interface ClientTransport {
  readonly id: string;
  send(message: ServerMessage): void | Promise<void>;
  close(code: CloseCode, reason: string): void;
}

export interface ConnectionDeps {
  service: GameService;
  hub: RealtimeHub;
  authenticate: Authenticator;
}

type MessageHandlers = { [K in ClientMessageType]: (message: ClientMessageMap[K]) => Promise<void> };

const envelopeSchema = z.object({ type: z.string() }).passthrough();

/**
 * Protocol endpoint for one client connection bound to one game.
 *
 * Inbound messages are handled one at a time, after `open` has finished.
 * Moves are answered through the hub (every subscriber, sender included,
 * gets the `game_update`); failures go back to the sender only.
 */
export class GameConnection {
  private identity: Identity | null = null;
  private subscribed = false;
  private closed = false;
  private inbox: Promise<void> = Promise.resolve();
  private latest: GameStateSnapshot | null = null;

  private readonly subscriber: HubSubscriber;

  private readonly handlers: MessageHandlers = {
    move: (message) => this.handleMove(message.position),
    get_state: () => this.handleGetState(),
  };

  constructor(
    readonly gameId: string,
    private readonly transport: ClientTransport,
    private readonly deps: ConnectionDeps
  ) {
    this.subscriber = { id: transport.id, deliver: (message) => this.push(message) };
  }

  get user(): Identity | null {
    return this.identity;
  }

  /** Resolves true when the connection was accepted and the first snapshot sent. */
  open(token: string | undefined): Promise<boolean> {
    const opened = this.inbox.then(() => this.accept(token));
    this.inbox = opened.then(
      () => undefined,
      () => undefined
    );
    return opened;
  }

  /** Queue one inbound payload (parsed object or raw JSON text). Never rejects. */
  receive(raw: unknown): Promise<void> {
    const handled = this.inbox.then(() => this.dispatch(raw));
    this.inbox = handled;
    return handled;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.subscribed) {
      this.deps.hub.unsubscribe(this.gameId, this.transport.id);
      this.subscribed = false;
    }
  }

  get isOpen(): boolean {
    return this.identity !== null && !this.closed;
  }

  // ---- lifecycle ----

  private async accept(token: string | undefined): Promise<boolean> {
    if (this.closed) return false;
    const identity = this.deps.authenticate(token);
    if (!identity) return this.reject(CloseCodes.Unauthenticated, 'not authenticated');

    const current = await this.deps.service.getSnapshot(this.gameId);
    if (!current.ok) {
      if (current.error instanceof NotFoundError) return this.reject(CloseCodes.GameNotFound, 'game not found');
      return this.reject(CloseCodes.InternalError, current.error.message);
    }
    const { player1, player2 } = current.value;
    if (identity.id !== player1 && identity.id !== player2) {
      return this.reject(CloseCodes.NotAParticipant, 'not a participant');
    }
    if (this.closed) return false;

    this.identity = identity;
    this.subscribed = true;
    this.deps.hub.subscribe(this.gameId, this.subscriber);

    // Re-read after subscribing so an update committed in between is not missed
    const fresh = await this.deps.service.getSnapshot(this.gameId);
    await this.push({ type: 'game_state', data: fresh.ok ? fresh.value : current.value });
    logger.info('[socket] participant connected', { gameId: this.gameId, userId: identity.id, socketId: this.transport.id });
    return true;
  }

  private reject(code: CloseCode, reason: string): false {
    logger.warn('[socket] rejecting connection', { gameId: this.gameId, socketId: this.transport.id, code, reason });
    this.closed = true;
    this.transport.close(code, reason);
    return false;
  }

  // ---- inbound ----

  private async dispatch(raw: unknown): Promise<void> {
    if (!this.isOpen) return;
    try {
      let payload = raw;
      if (typeof raw === 'string') {
        try {
          payload = JSON.parse(raw);
        } catch {
          return await this.sendError('Invalid JSON');
        }
      }
      const envelope = envelopeSchema.safeParse(payload);
      if (!envelope.success) return await this.sendError('Message must be an object with a type');
      const { type } = envelope.data;
      if (!isClientMessageType(type)) return await this.sendError(`Unknown message type: ${type}`);

      const parsed = clientMessageSchemas[type].safeParse(payload);
      if (!parsed.success) {
        return await this.sendError(parsed.error.issues[0]?.message ?? 'Malformed message');
      }
      await this.route(type, parsed.data);
    } catch (err) {
      logger.error('[socket] message handling failed', { gameId: this.gameId, ...errorMeta(err) });
      await this.sendError('Internal error');
    }
  }

  private route<K extends ClientMessageType>(type: K, message: ClientMessageMap[K]): Promise<void> {
    const handler: (message: ClientMessageMap[K]) => Promise<void> = this.handlers[type];
    return handler(message);
  }

  private async handleMove(position: number) {
    if (!this.identity) return;
    const result = await this.deps.service.applyMove(this.gameId, this.identity.id, position);
    // success is broadcast by the service through the hub
    if (!result.ok) await this.sendError(result.error.message);
  }

  private async handleGetState() {
    const result = await this.deps.service.getSnapshot(this.gameId);
    if (!result.ok) return this.sendError(result.error.message);
    // an update may have been pushed while the read was in flight
    const { latest } = this;
    const data = latest && latest.version > result.value.version ? latest : result.value;
    await this.push({ type: 'game_state', data });
  }

  // ---- outbound ----

  private sendError(message: string) {
    return this.push({ type: 'error', message });
  }

  private async push(message: ServerMessage) {
    if (this.closed) return;
    if (message.type !== 'error') {
      if (!this.isNewer(message.data)) return;
      this.latest = message.data;
    }
    try {
      await this.transport.send(message);
    } catch (err) {
      logger.warn('[socket] send failed', { gameId: this.gameId, socketId: this.transport.id, ...errorMeta(err) });
    }
  }

  // snapshots older than what this client already has are dropped; equal ones
  // are answers to get_state and still go out
  private isNewer(snapshot: GameStateSnapshot) {
    return this.latest === null || snapshot.version >= this.latest.version;
  }
}
