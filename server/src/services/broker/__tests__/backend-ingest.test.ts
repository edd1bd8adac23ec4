/**
 * Backend Ingest Tests
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { BackendIngest } from '../backend-ingest.js';
import { Dispatcher } from '../dispatcher.js';
import { Session } from '../session.js';
import { SubscriptionRegistry } from '../subscription-registry.js';
import { BackendUnavailableError, InvalidChangeError } from '../../../lib/errors/broker-errors.js';
import type { OutboundMessage } from '../broker.types.js';

function setup(coalesceWindowMs: number) {
  const registry = new SubscriptionRegistry();
  const sessions = new Map<string, Session>();
  const session = new Session('A', { queueCapacity: 16, overflowPolicy: 'drop_oldest' });
  sessions.set('A', session);
  registry.subscribe('A', 'doc:1');
  const dispatcher = new Dispatcher(registry, sessions);
  const ingest = new BackendIngest(dispatcher, { coalesceWindowMs });
  return { session, dispatcher, ingest };
}

async function drain(session: Session): Promise<OutboundMessage[]> {
  const messages: OutboundMessage[] = [];
  while (session.pendingCount > 0) {
    const next = await session.nextOutbound();
    if (next) messages.push(next);
  }
  return messages;
}

describe('BackendIngest', () => {
  let active: BackendIngest | null = null;

  afterEach(() => {
    active?.stop();
    active = null;
  });

  it('dispatches immediately without a coalescing window', async () => {
    const { session, ingest } = setup(0);
    active = ingest;

    const ack = await ingest.reportChange('doc:1', 'v2');

    assert.equal(ack.coalesced, false);
    assert.equal(ack.summary?.enqueued, 1);
    assert.equal(ingest.receivedCount, 1);
    assert.deepEqual(await drain(session), [{ type: 'invalidated', uri: 'doc:1', payload: 'v2' }]);
  });

  it('dispatches every change in order when coalescing is off', async () => {
    const { session, ingest } = setup(0);
    active = ingest;

    await ingest.reportChange('doc:1', 'a');
    await ingest.reportChange('doc:1', 'b');

    const payloads = (await drain(session)).map((m) => (m.type === 'invalidated' ? m.payload : undefined));
    assert.deepEqual(payloads, ['a', 'b']);
  });

  it('folds changes inside the window into one dispatch with the latest payload', async () => {
    const { session, dispatcher, ingest } = setup(20);
    active = ingest;

    const first = await ingest.reportChange('doc:1', 'a');
    const second = await ingest.reportChange('doc:1', 'b');
    const third = await ingest.reportChange('doc:1', 'c');

    assert.equal(first.coalesced, false);
    assert.equal(second.coalesced, true);
    assert.equal(third.coalesced, true);
    assert.equal(ingest.pendingCount, 1);
    assert.equal(dispatcher.dispatchCount, 0);

    await sleep(60);

    assert.equal(ingest.pendingCount, 0);
    assert.equal(dispatcher.dispatchCount, 1);
    assert.deepEqual(await drain(session), [{ type: 'invalidated', uri: 'doc:1', payload: 'c' }]);
  });

  it('flush() dispatches a pending change early', async () => {
    const { session, ingest } = setup(10_000);
    active = ingest;

    await ingest.reportChange('doc:1');
    const summary = ingest.flush('doc:1');

    assert.equal(summary?.enqueued, 1);
    assert.equal(ingest.flush('doc:1'), null);
    assert.deepEqual(await drain(session), [{ type: 'invalidated', uri: 'doc:1' }]);
  });

  it('stop() flushes pending changes and then refuses new ones', async () => {
    const { session, ingest } = setup(10_000);

    await ingest.reportChange('doc:1', 'last');
    ingest.stop();

    assert.equal(ingest.isAccepting, false);
    assert.deepEqual(await drain(session), [{ type: 'invalidated', uri: 'doc:1', payload: 'last' }]);
    await assert.rejects(ingest.reportChange('doc:1'), BackendUnavailableError);
  });

  it('rejects an empty or oversized uri', async () => {
    const { ingest } = setup(0);
    active = ingest;

    await assert.rejects(ingest.reportChange(''), InvalidChangeError);
    await assert.rejects(ingest.reportChange('x'.repeat(2049)), InvalidChangeError);
    assert.equal(ingest.receivedCount, 0);
  });
});
