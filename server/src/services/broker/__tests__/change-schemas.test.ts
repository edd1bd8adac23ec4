/**
 * Change Request Parsing Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MAX_BATCH_SIZE, parseChangeMessage, parseChangeRequest } from '../protocol/change-schemas.js';
import { InvalidChangeError } from '../../../lib/errors/broker-errors.js';

describe('parseChangeRequest', () => {
  it('accepts a single change with and without payload', () => {
    assert.deepEqual(parseChangeRequest({ uri: '/orders/42', payload: 'rev-2' }), {
      ok: true,
      changes: [{ uri: '/orders/42', payload: 'rev-2' }]
    });
    assert.deepEqual(parseChangeRequest({ uri: '/orders/42' }), {
      ok: true,
      changes: [{ uri: '/orders/42' }]
    });
  });

  it('accepts a batch in order', () => {
    assert.deepEqual(parseChangeRequest({ changes: [{ uri: 'a' }, { uri: 'b', payload: 'x' }] }), {
      ok: true,
      changes: [{ uri: 'a' }, { uri: 'b', payload: 'x' }]
    });
  });

  it('accepts the first-generation update message', () => {
    assert.deepEqual(parseChangeRequest({ message: 'update', data: { uri: '/orders/42' } }), {
      ok: true,
      changes: [{ uri: '/orders/42' }]
    });
  });

  it('rejects bodies that are not objects', () => {
    for (const body of [null, 'text', 7, [{ uri: 'a' }]]) {
      const result = parseChangeRequest(body);
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.message, 'Change request must be a JSON object');
      }
    }
  });

  it('rejects empty and oversized batches', () => {
    assert.equal(parseChangeRequest({ changes: [] }).ok, false);
    const tooMany = Array.from({ length: MAX_BATCH_SIZE + 1 }, (_, i) => ({ uri: `r${i}` }));
    assert.equal(parseChangeRequest({ changes: tooMany }).ok, false);
  });

  it('reports the offending field as a validation error', () => {
    const result = parseChangeRequest({ uri: '' });
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof InvalidChangeError);
      assert.equal(result.error.code, 'VALIDATION_ERROR');
      assert.equal(result.error.message, 'uri: uri must not be empty');
    }
  });

  it('rejects a non-string payload', () => {
    assert.equal(parseChangeRequest({ uri: 'a', payload: { rev: 2 } }).ok, false);
  });
});

describe('parseChangeMessage', () => {
  it('parses JSON text', () => {
    assert.deepEqual(parseChangeMessage('{"uri":"/orders/1"}'), { ok: true, changes: [{ uri: '/orders/1' }] });
  });

  it('rejects text that is not JSON', () => {
    const result = parseChangeMessage('orders/1 changed');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.message, 'Change message is not valid JSON');
    }
  });
});
