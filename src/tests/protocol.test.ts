import { describe, expect, it } from 'vitest';
import { decodeRequest, decodeResponse, encode } from '../network/protocol';
import { formatAddress, parseAddress } from '../network/transport';

describe('protocol', () => {
  it('answers malformed JSON', () => {
    expect(decodeRequest('{not json')).toEqual({ kind: 'reply', reply: { type: 'error', error: 'Invalid JSON' } });
  });

  it('answers unknown or missing types', () => {
    const unknown = { kind: 'reply', reply: { type: 'error', error: 'Unknown message type' } };
    expect(decodeRequest('{"type":"gossip"}')).toEqual(unknown);
    expect(decodeRequest('[1,2]')).toEqual(unknown);
  });

  it('rejects a join without its fields', () => {
    expect(decodeRequest('{"type":"join","node_id":"abc"}')).toEqual({
      kind: 'reply',
      reply: { type: 'error', error: 'Invalid join request' }
    });
    expect(decodeRequest('{"type":"join","node_id":"abc","host":"127.0.0.1","port":70000}').kind).toBe('reply');
  });

  it('decodes requests', () => {
    const join = encode({ type: 'join', node_id: 'abc', host: '127.0.0.1', port: 6000 });
    expect(decodeRequest(join)).toEqual({
      kind: 'request',
      request: { type: 'join', node_id: 'abc', host: '127.0.0.1', port: 6000 }
    });
    expect(decodeRequest('{"type":"get_chain"}')).toEqual({ kind: 'request', request: { type: 'get_chain' } });
    expect(decodeRequest('{"type":"new_transaction","transaction":{"x":1}}')).toEqual({
      kind: 'request',
      request: { type: 'new_transaction', transaction: { x: 1 } }
    });
  });

  it('decodes known responses only', () => {
    expect(decodeResponse('{"type":"ack"}')).toEqual({ type: 'ack' });
    expect(decodeResponse('{"type":"error","error":"nope"}')).toEqual({ type: 'error', error: 'nope' });
    expect(decodeResponse('{"type":"chain_response"}')).toBeNull();
    expect(decodeResponse('{"type":"join"}')).toBeNull();
    expect(decodeResponse('')).toBeNull();
  });
});

describe('addresses', () => {
  it('parses host:port', () => {
    expect(parseAddress('127.0.0.1:6000')).toEqual({ host: '127.0.0.1', port: 6000 });
    expect(parseAddress(' node-a :7001')).toEqual({ host: 'node-a', port: 7001 });
    expect(formatAddress({ host: 'node-a', port: 7001 })).toBe('node-a:7001');
  });

  it.each(['localhost', ':6000', 'host:0', 'host:99999', 'host:abc'])('rejects %s', raw => {
    expect(parseAddress(raw)).toBeNull();
  });
});
