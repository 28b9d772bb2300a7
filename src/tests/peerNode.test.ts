import net from 'net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { Blockchain } from '../blockchain';
import { PeerNode, PeerNodeOptions } from '../network/peerNode';
import { SYSTEM_SENDER } from '../transaction';
import { Wallet } from '../wallet';

const DIFFICULTY = 2;
const running: PeerNode[] = [];

async function startNode(options: Partial<PeerNodeOptions> = {}) {
  const chain = new Blockchain({ difficulty: DIFFICULTY });
  const node = new PeerNode({
    host: '127.0.0.1',
    port: 0,
    chain,
    readyDelayMs: 0,
    requestTimeoutMs: 2000,
    bootstrapDelayMs: 10,
    ...options
  });
  running.push(node);
  const state = await node.start();
  return { node, chain, state };
}

async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  await new Promise<void>(resolve => server.close(() => resolve()));
  return port;
}

/**
 * Write `parts` to a node over a raw socket, pausing between them, and read
 * until the node closes. The write side is only closed when `halfClose` is set.
 */
function rawRequest(port: number, parts: string[], halfClose: boolean): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: '127.0.0.1', port });
    const chunks: Buffer[] = [];
    const writeFrom = (i: number) => {
      if (i === parts.length) {
        if (halfClose) socket.end();
        return;
      }
      socket.write(parts[i]);
      setTimeout(() => writeFrom(i + 1), 20);
    };
    socket.on('connect', () => writeFrom(0));
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('end', () => {
      socket.destroy();
      resolve(Buffer.concat(chunks).toString('utf8'));
    });
    socket.on('error', reject);
  });
}

afterEach(async () => {
  await Promise.all(running.splice(0).map(node => node.stop()));
});

describe('PeerNode', () => {
  it('answers bad input with protocol errors', async () => {
    const node = new PeerNode({ host: '127.0.0.1', port: 0 });
    expect(JSON.parse(await node.handleMessage('nope'))).toEqual({ type: 'error', error: 'Invalid JSON' });
    expect(JSON.parse(await node.handleMessage('{"type":"ping"}'))).toEqual({ type: 'error', error: 'Unknown message type' });
    expect(JSON.parse(await node.handleMessage('{"type":"get_chain"}'))).toEqual({ type: 'error', error: 'No blockchain available' });
  });

  it('acknowledges gossip it cannot use', async () => {
    const node = new PeerNode({ host: '127.0.0.1', port: 0, chain: new Blockchain({ difficulty: DIFFICULTY }) });
    expect(JSON.parse(await node.handleMessage('{"type":"new_block","block":{"index":"x"}}'))).toEqual({ type: 'ack' });
    expect(JSON.parse(await node.handleMessage('{"type":"new_transaction","transaction":{}}'))).toEqual({ type: 'ack' });
  });

  it('derives a 16 character hex id', () => {
    const a = new PeerNode({ host: '127.0.0.1', port: 6000 });
    const b = new PeerNode({ host: '127.0.0.1', port: 6000 });
    expect(a.nodeId).toMatch(/^[0-9a-f]{16}$/);
    expect(a.nodeId).not.toBe(b.nodeId);
  });

  it('syncs a joining node from its bootstrap peer', async () => {
    const a = await startNode();
    expect(a.state).toEqual({ status: 'fallback' });
    await a.chain.minePendingTransactions(SYSTEM_SENDER);
    await a.chain.minePendingTransactions(SYSTEM_SENDER);

    const b = await startNode({ bootstrap: [`127.0.0.1:${a.node.port}`] });

    expect(b.state).toEqual({ status: 'synced', address: `127.0.0.1:${a.node.port}` });
    expect(b.chain.chain.map(x => x.hash)).toEqual(a.chain.chain.map(x => x.hash));
    expect(a.node.getPeers()).toEqual([{ nodeId: b.node.nodeId, host: '127.0.0.1', port: b.node.port }]);
    expect(b.node.getPeers()).toEqual([{ nodeId: a.node.nodeId, host: '127.0.0.1', port: a.node.port }]);
  });

  it('syncs when the bootstrap peer has nothing newer', async () => {
    const a = await startNode();
    const b = await startNode({ bootstrap: [`127.0.0.1:${a.node.port}`] });
    expect(b.state.status).toBe('synced');
    expect(b.chain.length).toBe(1);
  });

  it('falls back to its own chain when no bootstrap peer answers', async () => {
    const port = await closedPort();
    const b = await startNode({ bootstrap: [`127.0.0.1:${port}`], bootstrapAttempts: 2 });
    expect(b.state).toEqual({ status: 'fallback' });
    expect(b.chain.length).toBe(1);
  });

  it('broadcasts to reachable peers and evicts the rest', async () => {
    const a = await startNode();
    const b = await startNode();
    const c = await startNode();
    a.node.addPeer(b.node.nodeId, b.node.address);
    a.node.addPeer(c.node.nodeId, c.node.address);
    a.node.addPeer('deadbeefdeadbeef', { host: '127.0.0.1', port: await closedPort() });

    const alice = new Wallet();
    const tx = await alice.createTransaction(new Wallet().address, 4, 1700000000);
    a.chain.addTransaction(tx);

    expect(await a.node.broadcastTransaction(tx)).toBe(2);
    expect(a.node.getPeers().map(p => p.nodeId).sort()).toEqual([b.node.nodeId, c.node.nodeId].sort());
    expect(b.chain.transactionPool.getTransactions().map(t => t.hash())).toEqual([tx.hash()]);
    expect(c.chain.transactionPool.size).toBe(1);

    const block = await a.chain.minePendingTransactions(alice.address);
    expect(block).not.toBeNull();
    if (!block) return;
    expect(await a.node.broadcastBlock(block)).toBe(2);
    expect(b.chain.getLatestBlock().hash).toBe(block.hash);
    expect(c.chain.length).toBe(2);
    expect(c.chain.transactionPool.size).toBe(0);
  });

  it('pulls the chain from a peer that is ahead', async () => {
    const a = await startNode();
    const b = await startNode();
    a.node.addPeer(b.node.nodeId, b.node.address);
    b.node.addPeer(a.node.nodeId, a.node.address);

    await a.chain.minePendingTransactions(SYSTEM_SENDER);
    const second = await a.chain.minePendingTransactions(SYSTEM_SENDER);
    expect(second).not.toBeNull();
    if (!second) return;

    expect(await a.node.broadcastBlock(second)).toBe(1);
    await vi.waitFor(() => expect(b.chain.length).toBe(3));
    expect(b.chain.getLatestBlock().hash).toBe(second.hash);
  });

  it('answers a client that keeps its write side open', async () => {
    const a = await startNode();
    const reply: unknown = JSON.parse(await rawRequest(a.node.port, ['{"type":"get_chain"}'], false));
    expect(reply).toMatchObject({ type: 'chain_response', chain: { difficulty: DIFFICULTY } });
  });

  it('assembles a request split across writes', async () => {
    const a = await startNode();
    const reply: unknown = JSON.parse(await rawRequest(a.node.port, ['{"type":"get_', 'chain"}'], false));
    expect(reply).toMatchObject({ type: 'chain_response' });
  });

  it('answers an incomplete request once the client half-closes', async () => {
    const a = await startNode();
    const reply: unknown = JSON.parse(await rawRequest(a.node.port, ['{"type":"get_chain"'], true));
    expect(reply).toEqual({ type: 'error', error: 'Invalid JSON' });
  });

  it('refuses itself as a peer', async () => {
    const a = await startNode();
    expect(a.node.addPeer(a.node.nodeId, { host: '10.0.0.1', port: 1 })).toBe(false);
    expect(a.node.addPeer('other', a.node.address)).toBe(false);
    expect(a.node.removePeer('other')).toBe(false);
    expect(a.node.getPeers()).toEqual([]);
  });
});
