/**
 * Client Frame Protocol Tests
 * Decoding of v1 and legacy frames, error classification and server frame encoding
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeClientFrame, encodeServerFrame } from '../protocol/frame-codec.js';
import { ProtocolError } from '../../../lib/errors/broker-errors.js';

const allowLegacy = { allowLegacy: true };

function errorCode(raw: string, options = allowLegacy): string | null {
  const result = decodeClientFrame(raw, options);
  return result.ok ? null : result.error.code;
}

describe('decodeClientFrame', () => {
  describe('v1 frames', () => {
    it('decodes subscribe, unsubscribe and close', () => {
      assert.deepEqual(
        decodeClientFrame('{"v":1,"type":"subscribe","uri":"/orders/42"}', allowLegacy),
        { ok: true, command: { kind: 'subscribe', uri: '/orders/42' }, dialect: 'v1' }
      );
      assert.deepEqual(
        decodeClientFrame('{"v":1,"type":"unsubscribe","uri":"/orders/42"}', allowLegacy),
        { ok: true, command: { kind: 'unsubscribe', uri: '/orders/42' }, dialect: 'v1' }
      );
      assert.deepEqual(
        decodeClientFrame('{"v":1,"type":"close"}', allowLegacy),
        { ok: true, command: { kind: 'close' }, dialect: 'v1' }
      );
    });

    it('treats uris as opaque strings', () => {
      const result = decodeClientFrame('{"v":1,"type":"subscribe","uri":"not a url at all ✓"}', allowLegacy);
      assert.equal(result.ok && result.command.kind === 'subscribe' && result.command.uri, 'not a url at all ✓');
    });
  });

  describe('errors', () => {
    it('reports non-JSON text as parse_error', () => {
      assert.equal(errorCode('subscribe me'), 'parse_error');
      assert.equal(errorCode(''), 'parse_error');
    });

    it('reports a foreign protocol version as unsupported_version', () => {
      const result = decodeClientFrame('{"v":2,"type":"subscribe","uri":"x"}', allowLegacy);
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof ProtocolError);
        assert.equal(result.error.code, 'unsupported_version');
        assert.equal(result.error.message, 'Unsupported protocol version 2');
      }
    });

    it('reports structural problems as invalid_frame', () => {
      assert.equal(errorCode('{"v":1,"type":"publish","uri":"x"}'), 'invalid_frame');
      assert.equal(errorCode('{"v":1,"type":"subscribe"}'), 'invalid_frame');
      assert.equal(errorCode('{"type":"subscribe","uri":"x"}'), 'invalid_frame');
      assert.equal(errorCode('[1,2,3]'), 'invalid_frame');
      assert.equal(errorCode('42'), 'invalid_frame');
    });

    it('names the offending field', () => {
      const result = decodeClientFrame('{"v":1,"type":"subscribe","uri":""}', allowLegacy);
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.error.message, 'uri: uri must not be empty');
      }
    });

    it('rejects uris longer than 2048 characters', () => {
      const uri = 'u'.repeat(2049);
      assert.equal(errorCode(JSON.stringify({ v: 1, type: 'subscribe', uri })), 'invalid_frame');
      assert.equal(errorCode(JSON.stringify({ v: 1, type: 'subscribe', uri: 'u'.repeat(2048) })), null);
    });
  });

  describe('legacy frames', () => {
    it('maps watch and unwatch onto subscribe and unsubscribe', () => {
      assert.deepEqual(
        decodeClientFrame('{"message":"watch","data":{"uri":"/orders/42"}}', allowLegacy),
        { ok: true, command: { kind: 'subscribe', uri: '/orders/42' }, dialect: 'legacy' }
      );
      assert.deepEqual(
        decodeClientFrame('{"message":"unwatch","data":{"uri":"/orders/42"}}', allowLegacy),
        { ok: true, command: { kind: 'unsubscribe', uri: '/orders/42' }, dialect: 'legacy' }
      );
    });

    it('rejects unknown legacy messages', () => {
      assert.equal(errorCode('{"message":"dance","data":{"uri":"x"}}'), 'invalid_frame');
      assert.equal(errorCode('{"message":"watch"}'), 'invalid_frame');
    });

    it('refuses legacy frames when they are disabled', () => {
      assert.equal(
        errorCode('{"message":"watch","data":{"uri":"x"}}', { allowLegacy: false }),
        'legacy_rejected'
      );
    });
  });
});

describe('encodeServerFrame', () => {
  it('stamps v1 frames with the protocol version', () => {
    assert.equal(
      encodeServerFrame({ type: 'ack', uri: '/orders/42' }, 'v1'),
      '{"v":1,"type":"ack","uri":"/orders/42"}'
    );
    assert.equal(
      encodeServerFrame({ type: 'invalidated', uri: '/orders/42', payload: 'rev-3' }, 'v1'),
      '{"v":1,"type":"invalidated","uri":"/orders/42","payload":"rev-3"}'
    );
    assert.equal(
      encodeServerFrame({ type: 'error', code: 'rate_limited', reason: 'slow down' }, 'v1'),
      '{"v":1,"type":"error","code":"rate_limited","reason":"slow down"}'
    );
  });

  it('writes the legacy envelope for legacy sessions', () => {
    assert.equal(
      encodeServerFrame({ type: 'invalidated', uri: '/orders/42' }, 'legacy'),
      '{"message":"invalidate","data":{"uri":"/orders/42"}}'
    );
    assert.equal(
      encodeServerFrame({ type: 'invalidated', uri: '/orders/42', payload: 'p' }, 'legacy'),
      '{"message":"invalidate","data":{"uri":"/orders/42","payload":"p"}}'
    );
    assert.equal(
      encodeServerFrame({ type: 'ack', uri: '/orders/42' }, 'legacy'),
      '{"message":"ack","data":{"uri":"/orders/42"}}'
    );
    assert.equal(
      encodeServerFrame({ type: 'error', code: 'invalid_frame', reason: 'bad' }, 'legacy'),
      '{"message":"error","data":{"code":"invalid_frame","reason":"bad"}}'
    );
  });
});
