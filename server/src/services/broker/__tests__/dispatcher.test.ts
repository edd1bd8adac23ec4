/**
 * Dispatcher Tests
 *
 * Fan-out to subscribers, isolation of slow or closed sessions.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { Dispatcher } from '../dispatcher.js';
import { Session } from '../session.js';
import { SubscriptionRegistry } from '../subscription-registry.js';
import type { OutboundMessage, OverflowPolicy } from '../broker.types.js';

async function drain(session: Session): Promise<OutboundMessage[]> {
  const messages: OutboundMessage[] = [];
  while (session.pendingCount > 0) {
    const next = await session.nextOutbound();
    if (next) messages.push(next);
  }
  return messages;
}

describe('Dispatcher', () => {
  let registry: SubscriptionRegistry;
  let sessions: Map<string, Session>;
  let dispatcher: Dispatcher;

  const addSession = (id: string, queueCapacity = 8, overflowPolicy: OverflowPolicy = 'drop_oldest'): Session => {
    const session = new Session(id, { queueCapacity, overflowPolicy });
    sessions.set(id, session);
    return session;
  };

  beforeEach(() => {
    registry = new SubscriptionRegistry();
    sessions = new Map();
    dispatcher = new Dispatcher(registry, sessions);
  });

  it('delivers only to sessions subscribed to the uri', async () => {
    const a = addSession('A');
    const b = addSession('B');
    const c = addSession('C');
    registry.subscribe('A', 'doc:1');
    registry.subscribe('B', 'doc:1');
    registry.subscribe('C', 'doc:2');

    const summary = dispatcher.dispatch({ uri: 'doc:1', payload: 'rev-7' });

    assert.deepEqual(summary, { uri: 'doc:1', matched: 2, enqueued: 2, dropped: 0, skipped: 0, failed: 0 });
    const expected: OutboundMessage[] = [{ type: 'invalidated', uri: 'doc:1', payload: 'rev-7' }];
    assert.deepEqual(await drain(a), expected);
    assert.deepEqual(await drain(b), expected);
    assert.equal(c.pendingCount, 0);
    assert.equal(dispatcher.dispatchCount, 1);
  });

  it('omits the payload field when the change carries none', async () => {
    const a = addSession('A');
    registry.subscribe('A', 'doc:1');

    dispatcher.dispatch({ uri: 'doc:1' });

    assert.deepEqual(await drain(a), [{ type: 'invalidated', uri: 'doc:1' }]);
  });

  it('matches nothing for a uri without subscribers', () => {
    addSession('A');
    const summary = dispatcher.dispatch({ uri: 'doc:none' });
    assert.equal(summary.matched, 0);
    assert.equal(summary.enqueued, 0);
  });

  it('skips closed and unknown sessions', async () => {
    const a = addSession('A');
    const b = addSession('B');
    registry.subscribe('A', 'doc:1');
    registry.subscribe('B', 'doc:1');
    registry.subscribe('ghost', 'doc:1');
    b.close();

    const summary = dispatcher.dispatch({ uri: 'doc:1' });

    assert.equal(summary.matched, 3);
    assert.equal(summary.enqueued, 1);
    assert.equal(summary.skipped, 2);
    assert.equal((await drain(a)).length, 1);
  });

  it('a full queue does not hold back other subscribers', async () => {
    const slow = addSession('slow', 1, 'disconnect');
    const fast = addSession('fast', 8);
    registry.subscribe('slow', 'doc:1');
    registry.subscribe('fast', 'doc:1');

    dispatcher.dispatch({ uri: 'doc:1', payload: '1' });
    const second = dispatcher.dispatch({ uri: 'doc:1', payload: '2' });

    assert.equal(second.dropped, 1);
    assert.equal(second.enqueued, 1);
    assert.equal(slow.pendingCount, 1);
    assert.deepEqual(await drain(fast), [
      { type: 'invalidated', uri: 'doc:1', payload: '1' },
      { type: 'invalidated', uri: 'doc:1', payload: '2' }
    ]);
  });

  it('counts evictions under drop_oldest and keeps the newest message', async () => {
    const a = addSession('A', 1, 'drop_oldest');
    registry.subscribe('A', 'doc:1');

    dispatcher.dispatch({ uri: 'doc:1', payload: 'old' });
    const summary = dispatcher.dispatch({ uri: 'doc:1', payload: 'new' });

    assert.equal(summary.enqueued, 1);
    assert.equal(summary.dropped, 1);
    assert.equal(a.droppedCount, 1);
    assert.deepEqual(await drain(a), [{ type: 'invalidated', uri: 'doc:1', payload: 'new' }]);
  });

  it('counts a throwing overflow hook as a failure and continues', () => {
    const broken = new Session('broken', {
      queueCapacity: 1,
      overflowPolicy: 'drop_oldest',
      onOverflow: () => { throw new Error('hook exploded'); }
    });
    sessions.set('broken', broken);
    const ok = addSession('ok');
    registry.subscribe('broken', 'doc:1');
    registry.subscribe('ok', 'doc:1');

    dispatcher.dispatch({ uri: 'doc:1' });
    const summary = dispatcher.dispatch({ uri: 'doc:1' });

    assert.equal(summary.failed, 1);
    assert.equal(summary.enqueued, 1);
    assert.equal(ok.pendingCount, 2);
  });
});
