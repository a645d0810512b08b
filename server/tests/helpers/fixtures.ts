import type { TransitionContext } from '../../src/game/stateMachine';
import type { ClientTransport } from '../../src/socket/connection';
import type { CloseCode, ServerMessage } from '../../src/types/messages';

/** Deterministic ids and a clock that ticks one second per transition. */
export function fixedContext(start = Date.UTC(2024, 0, 1, 12, 0, 0)) {
  let tick = 0;
  let id = 0;
  return (): TransitionContext => {
    const now = new Date(start + 1000 * tick++);
    return { now, newId: () => `id-${++id}` };
  };
}

export class RecordingTransport implements ClientTransport {
  readonly sent: ServerMessage[] = [];
  closedWith: { code: CloseCode; reason: string } | null = null;

  constructor(readonly id: string) {}

  send(message: ServerMessage) {
    this.sent.push(message);
  }

  close(code: CloseCode, reason: string) {
    this.closedWith = { code, reason };
  }

  types() {
    return this.sent.map((m) => m.type);
  }

  last(): ServerMessage | undefined {
    return this.sent[this.sent.length - 1];
  }
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
