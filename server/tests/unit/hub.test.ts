import { createGame } from '../../src/game/stateMachine';
import { toSnapshot } from '../../src/game/snapshot';
import { RealtimeHub, type HubRelay, type HubSubscriber } from '../../src/realtime/hub';
import type { ServerMessage } from '../../src/types/messages';
import { deferred, fixedContext, sleep } from '../helpers/fixtures';

const created = createGame('alice', 'bob', fixedContext()());
if (!created.ok) throw created.error;
const base = toSnapshot(created.game);

function update(version: number): ServerMessage {
  return { type: 'game_update', data: { ...base, version } };
}

function versionOf(message: ServerMessage) {
  return message.type === 'error' ? -1 : message.data.version;
}

function recorder(id: string, delayFirstMs = 0) {
  const seen: number[] = [];
  let calls = 0;
  const subscriber: HubSubscriber = {
    id,
    deliver: async (message) => {
      if (calls++ === 0 && delayFirstMs > 0) await sleep(delayFirstMs);
      seen.push(versionOf(message));
    },
  };
  return { subscriber, seen };
}

describe('RealtimeHub', () => {
  it('treats a second subscribe of the same id as a no-op', () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 50 });
    const { subscriber } = recorder('s1');
    expect(hub.subscribe('g1', subscriber)).toBe(true);
    expect(hub.subscribe('g1', subscriber)).toBe(false);
    expect(hub.subscriberCount('g1')).toBe(1);
  });

  it('stops delivering after unsubscribe and forgets empty games', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 50 });
    const { subscriber, seen } = recorder('s1');
    hub.subscribe('g1', subscriber);
    hub.publish('g1', update(1));
    await hub.flush('g1');
    expect(hub.unsubscribe('g1', 's1')).toBe(true);
    expect(hub.unsubscribe('g1', 's1')).toBe(false);
    hub.publish('g1', update(2));
    await hub.flush();
    expect(seen).toEqual([1]);
    expect(hub.subscriberCount('g1')).toBe(0);
  });

  it('delivers one game in publish order even when a subscriber is slow', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 200 });
    const slow = recorder('slow', 30);
    const fast = recorder('fast');
    hub.subscribe('g1', slow.subscriber);
    hub.subscribe('g1', fast.subscriber);

    hub.publish('g1', update(1));
    hub.publish('g1', update(2));
    hub.publish('g1', update(3));
    await hub.flush('g1');

    expect(slow.seen).toEqual([1, 2, 3]);
    expect(fast.seen).toEqual([1, 2, 3]);
  });

  it('does not hold one game behind another', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 500 });
    const gate = deferred();
    hub.subscribe('g1', { id: 'stuck', deliver: () => gate.promise });
    const other = recorder('other');
    hub.subscribe('g2', other.subscriber);

    hub.publish('g1', update(1));
    hub.publish('g2', update(7));
    await hub.flush('g2');
    expect(other.seen).toEqual([7]);

    gate.resolve();
    await hub.flush();
  });

  it('keeps delivering to the others when one subscriber throws', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 50 });
    hub.subscribe('g1', {
      id: 'broken',
      deliver: () => {
        throw new Error('socket gone');
      },
    });
    const good = recorder('good');
    hub.subscribe('g1', good.subscriber);

    hub.publish('g1', update(1));
    hub.publish('g1', update(2));
    await hub.flush('g1');
    expect(good.seen).toEqual([1, 2]);
  });

  it('cuts off a subscriber that never finishes', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 10 });
    hub.subscribe('g1', { id: 'hung', deliver: () => new Promise<void>(() => undefined) });
    const good = recorder('good');
    hub.subscribe('g1', good.subscriber);

    hub.publish('g1', update(1));
    hub.publish('g1', update(2));
    await hub.flush('g1');
    expect(good.seen).toEqual([1, 2]);
  });

  it('forwards published messages to the relay but not local deliveries', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 50 });
    const forwarded: Array<[string, number]> = [];
    const relay: HubRelay = {
      forward: async (gameId, message) => {
        forwarded.push([gameId, versionOf(message)]);
      },
    };
    hub.setRelay(relay);
    const local = recorder('local');
    hub.subscribe('g1', local.subscriber);

    hub.publish('g1', update(1));
    hub.deliverLocal('g1', update(2));
    await hub.flush();

    expect(local.seen).toEqual([1, 2]);
    expect(forwarded).toEqual([['g1', 1]]);
  });

  it('survives a failing relay', async () => {
    const hub = new RealtimeHub({ deliveryTimeoutMs: 50 });
    hub.setRelay({
      forward: async () => {
        throw new Error('redis down');
      },
    });
    const local = recorder('local');
    hub.subscribe('g1', local.subscriber);
    hub.publish('g1', update(1));
    hub.publish('g1', update(2));
    await hub.flush();
    expect(local.seen).toEqual([1, 2]);
  });
});
