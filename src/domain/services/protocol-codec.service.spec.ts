import { DecodeError } from '../errors/broker.errors';
import { WireFormat } from '../types/control-message.types';
import { ProtocolCodec } from './protocol-codec.service';

const NOW_MS = 1_700_000_000_500;

function base64(text: string): string {
  return Buffer.from(text, 'utf8').toString('base64');
}

describe('ProtocolCodec', () => {
  let generate: jest.Mock<string, []>;
  let codec: ProtocolCodec;

  beforeEach(() => {
    generate = jest
      .fn<string, []>()
      .mockReturnValueOnce('ticket-1')
      .mockReturnValueOnce('tag-1');
    codec = new ProtocolCodec(generate, () => NOW_MS);
  });

  describe('encodePing', () => {
    it('should envelope a broadcast ping with a null destination', () => {
      const payload = codec.encodePing({
        replyChannel: 'reply-token',
        destinations: null,
        format: WireFormat.ENVELOPED,
        timeoutMs: 1500,
      });

      const envelope = JSON.parse(payload.toString('utf8'));
      const inner = JSON.parse(Buffer.from(envelope.body, 'base64').toString('utf8'));

      expect(inner).toEqual({
        method: 'ping',
        arguments: {},
        destination: null,
        pattern: null,
        matcher: null,
        ticket: 'ticket-1',
        reply_to: { exchange: 'reply.celery.pidbox', routing_key: 'reply-token' },
      });
      expect(envelope['content-encoding']).toBe('utf-8');
      expect(envelope['content-type']).toBe('application/json');
      expect(envelope.headers).toEqual({ clock: 1, expires: 1_700_000_010 });
      expect(envelope.properties).toEqual({
        delivery_mode: 2,
        delivery_info: { exchange: 'celery.pidbox', routing_key: '' },
        priority: 0,
        body_encoding: 'base64',
        delivery_tag: 'tag-1',
      });
    });

    it('should keep targeted destinations in order in raw format', () => {
      const payload = codec.encodePing({
        replyChannel: 'reply-token',
        destinations: ['worker1@host', 'worker2@host'],
        format: WireFormat.RAW,
        timeoutMs: 1500,
      });

      const message = JSON.parse(payload.toString('utf8'));
      expect(message.destination).toEqual(['worker1@host', 'worker2@host']);
      expect(message.ticket).toBe('ticket-1');
      expect(message.body).toBeUndefined();
    });

    it('should treat an empty destination list as a broadcast', () => {
      const message = codec.buildPing('reply-token', []);
      expect(message.destination).toBeNull();
    });

    it('should let the envelope outlive long collection windows', () => {
      const payload = codec.encodePing({
        replyChannel: 'reply-token',
        format: WireFormat.ENVELOPED,
        timeoutMs: 30_000,
      });

      expect(JSON.parse(payload.toString('utf8')).headers.expires).toBe(1_700_000_031);
    });

    it('should round-trip an enveloped ping through decodeResponse', () => {
      const payload = codec.encodePing({
        replyChannel: 'reply-token',
        destinations: ['celery@a'],
        format: WireFormat.ENVELOPED,
        timeoutMs: 1000,
      });

      const decoded = codec.decodeResponse(payload);
      expect(decoded.method).toBe('ping');
      expect(decoded.destination).toEqual(['celery@a']);
      expect(decoded.reply_to).toEqual({
        exchange: 'reply.celery.pidbox',
        routing_key: 'reply-token',
      });
    });
  });

  describe('decodeResponse', () => {
    it('should parse a worker-keyed reply', () => {
      const document = codec.decodeResponse(Buffer.from('{"celery@nero":{"ok":"pong"}}'));

      expect(document).toEqual({ 'celery@nero': { ok: 'pong' } });
      expect(codec.validateResponse(document)).toBe(true);
      expect(codec.extractIdentity(document)).toBe('celery@nero');
    });

    it('should unwrap one level of base64 body', () => {
      const payload = JSON.stringify({ body: base64('{"celery@a":{"ok":"pong"}}') });
      expect(codec.decodeResponse(payload)).toEqual({ 'celery@a': { ok: 'pong' } });
    });

    it('should tolerate whitespace inside the base64 body', () => {
      const encoded = base64('{"hostname":"w@h"}');
      const payload = JSON.stringify({ body: `${encoded.slice(0, 8)}\n${encoded.slice(8)}` });
      expect(codec.decodeResponse(payload)).toEqual({ hostname: 'w@h' });
    });

    it('should leave a non-string body alone', () => {
      expect(codec.decodeResponse('{"body":42,"hostname":"w@h"}')).toEqual({
        body: 42,
        hostname: 'w@h',
      });
    });

    it('should reject truncated JSON', () => {
      expect(() => codec.decodeResponse('{"celery@nero":{"ok":')).toThrow(DecodeError);
      expect(() => codec.decodeResponse('{"celery@nero":{"ok":')).toThrow(
        'Failed to parse response envelope',
      );
    });

    it('should reject a top-level array', () => {
      expect(() => codec.decodeResponse('[1,2]')).toThrow(
        'Failed to parse response envelope: expected a JSON object',
      );
    });

    it('should reject a body that is not base64', () => {
      expect(() => codec.decodeResponse('{"body":"not base64!"}')).toThrow(
        'Failed to decode base64 body: invalid base64 text',
      );
    });

    it('should reject a body that does not decode to an object', () => {
      const payload = JSON.stringify({ body: base64('"just text"') });
      expect(() => codec.decodeResponse(payload)).toThrow(
        'Failed to parse decoded body: expected a JSON object',
      );
    });
  });

  describe('validateResponse and extractIdentity', () => {
    it('should fall back to a top-level hostname', () => {
      const document = { hostname: 'worker@host' };
      expect(codec.validateResponse(document)).toBe(true);
      expect(codec.extractIdentity(document)).toBe('worker@host');
    });

    it('should find identity fields nested under data', () => {
      const document = { data: { nodename: 'w1@h' } };
      expect(codec.validateResponse(document)).toBe(true);
      expect(codec.extractIdentity(document)).toBe('w1@h');
    });

    it('should prefer a top-level field over a nested one', () => {
      const document = { hostname: 'top@h', data: { hostname: 'nested@h' } };
      expect(codec.extractIdentity(document)).toBe('top@h');
    });

    it('should not validate a worker-keyed entry that is not a pong', () => {
      const document = { 'celery@a': { ok: 'busy' } };
      expect(codec.validateResponse(document)).toBe(false);
      expect(codec.extractIdentity(document)).toBe('celery@a');
    });

    it('should use the scan only for extraction', () => {
      expect(codec.validateResponse({ reply: 'x@y' })).toBe(false);
      expect(codec.extractIdentity({ reply: 'x@y' })).toBe('x@y');
      expect(codec.extractIdentity({ myhost: 'box1' })).toBe('box1');
    });

    it('should return an empty identity when nothing matches', () => {
      expect(codec.validateResponse({})).toBe(false);
      expect(codec.extractIdentity({})).toBe('');
      expect(codec.extractIdentity({ hostname: '' })).toBe('');
    });

    it('should extract the same identity on repeated calls', () => {
      const document = { 'celery@a': { ok: 'pong' }, hostname: 'other@h' };
      const first = codec.extractIdentity(document);
      expect(codec.extractIdentity(document)).toBe(first);
      expect(first).toBe('celery@a');
    });
  });
});
