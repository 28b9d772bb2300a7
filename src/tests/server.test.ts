import { IncomingHttpHeaders, request } from 'http';
import { MemoryLevel } from 'memory-level';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import WebSocket from 'ws';
import { z } from 'zod';
import { AppConfig, DEFAULT_RATE_LIMITS, loadConfig } from '../config';
import { AppContext, ContextOverrides, createAppContext } from '../context';
import { HttpServer, createHttpServer, isAllowedOrigin } from '../server';
import { Wallet } from '../wallet';

type Reply = { status: number; body: unknown };

/** A node with an in-memory store and its HTTP API on an ephemeral loopback port. */
class Api {
  private running?: { ctx: AppContext; http: HttpServer; base: string };

  constructor(private config: AppConfig, private overrides: ContextOverrides = {}) {}

  async start() {
    const db = new MemoryLevel<string, string>({ valueEncoding: 'utf8' });
    const ctx = await createAppContext(this.config, { db, readyDelayMs: 0, ...this.overrides });
    const http = createHttpServer(ctx);
    const port = await http.listen(0, '127.0.0.1');
    this.running = { ctx, http, base: `http://127.0.0.1:${port}` };
  }

  async stop() {
    if (!this.running) return;
    await this.running.http.close();
    await this.running.ctx.close();
  }

  private get state() {
    if (!this.running) throw new Error('API is not running');
    return this.running;
  }

  get ctx(): AppContext {
    return this.state.ctx;
  }

  get base(): string {
    return this.state.base;
  }

  async get(path: string): Promise<Reply> {
    const res = await fetch(this.base + path);
    return { status: res.status, body: await res.json() };
  }

  async post(path: string, payload: unknown): Promise<Reply> {
    const res = await fetch(this.base + path, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload)
    });
    return { status: res.status, body: await res.json() };
  }

  /** Response headers for a GET sent from a browser page at `origin`. */
  headersFrom(path: string, origin: string): Promise<IncomingHttpHeaders> {
    return new Promise((resolve, reject) => {
      const req = request(this.base + path, { headers: { origin } }, res => {
        res.resume();
        resolve(res.headers);
      });
      req.on('error', reject);
      req.end();
    });
  }
}

const BASE_ARGS = ['--host', '127.0.0.1', '--p2p-port', '0'];

describe('HTTP API', () => {
  const api = new Api(loadConfig([...BASE_ARGS, '--difficulty', '2'], {}));
  const alice = new Wallet();
  const bob = new Wallet();

  beforeAll(() => api.start());
  afterAll(() => api.stop());

  it('reports health', async () => {
    expect(await api.get('/health')).toEqual({ status: 200, body: { ok: true } });
  });

  it('serves the chain', async () => {
    const { status, body } = await api.get('/chain');
    expect(status).toBe(200);
    expect(body).toMatchObject({ length: 1, genesis_hash: api.ctx.chain.chain[0].hash, chain: { difficulty: 2 } });
  });

  it('creates and stores wallets', async () => {
    const { status, body } = await api.get('/wallet/new');
    expect(status).toBe(200);
    const wallet = z.object({ address: z.string(), public_key: z.string(), private_key: z.string() }).parse(body);
    expect(wallet.address).toMatch(/^0[23][0-9a-f]{64}$/);
    expect(wallet.address).toBe(wallet.public_key);
    expect(await api.ctx.store.getWallet(wallet.address)).toMatchObject({ address: wallet.address, publicKey: wallet.public_key });
  });

  it('validates submitted transactions', async () => {
    const tx = await alice.createTransaction(bob.address, 2, 1700000000);
    const json = tx.toJSON();

    expect(await api.post('/transactions/new', { sender: alice.address, recipient: bob.address, amount: 2 })).toEqual({
      status: 400,
      body: { error: 'Missing required fields' }
    });
    expect(await api.post('/transactions/new', { ...json, amount: 0 })).toEqual({
      status: 400,
      body: { error: 'Amount must be positive' }
    });
    expect(await api.post('/transactions/new', { ...json, recipient: 'bob' })).toEqual({
      status: 400,
      body: { error: 'Invalid recipient address format' }
    });
    expect(await api.post('/transactions/new', { ...json, amount: 3 })).toEqual({
      status: 400,
      body: { error: 'Transaction verification failed' }
    });
    expect(api.ctx.chain.transactionPool.size).toBe(0);
  });

  it('accepts a transaction and mines it', async () => {
    const tx = await alice.createTransaction(bob.address, 2, 1700000100);

    const submitted = await api.post('/transactions/new', tx.toJSON());
    expect(submitted.status).toBe(201);
    expect(submitted.body).toMatchObject({ message: 'Transaction added to pool', txid: tx.hash() });
    expect(await api.post('/transactions/new', tx.toJSON())).toEqual({
      status: 400,
      body: { error: 'Failed to add transaction' }
    });

    const mined = await api.get(`/mine?address=${alice.address}`);
    expect(mined.status).toBe(200);
    expect(mined.body).toMatchObject({
      message: 'New block mined',
      balance: 8,
      block: {
        index: 1,
        transactions: [{ sender: 'system', recipient: alice.address, amount: 10 }, tx.toJSON()]
      }
    });

    expect(await api.get(`/wallet/balance?address=${bob.address}`)).toEqual({
      status: 200,
      body: { address: bob.address, balance: 2 }
    });

    await api.ctx.flush();
    expect((await api.ctx.store.getBlocks()).map(b => b.hash)).toEqual(api.ctx.chain.chain.map(b => b.hash));
    expect(await api.ctx.store.getPendingTransactions()).toEqual([]);
  });

  it('has nothing to mine on an empty pool', async () => {
    expect(await api.get(`/mine?address=${alice.address}`)).toEqual({ status: 200, body: { message: 'No transactions to mine' } });
    expect((await api.get('/mine?address=nobody')).status).toBe(400);
  });

  it('requires an address for balances', async () => {
    expect(await api.get('/wallet/balance')).toEqual({ status: 400, body: { error: 'Address required' } });
  });

  it('describes the node', async () => {
    expect(await api.get('/peers')).toEqual({ status: 200, body: { peers: [], count: 0 } });
    const { body } = await api.get('/');
    expect(body).toMatchObject({ status: 'running', node_id: api.ctx.node.nodeId, chain_length: api.ctx.chain.length });
  });

  it('answers malformed JSON bodies with 400', async () => {
    const res = await fetch(api.base + '/transactions/new', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{oops'
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request must be JSON' });
  });

  it('pushes accepted transactions to ws clients', async () => {
    const client = new WebSocket(api.base.replace('http', 'ws'));
    await new Promise<void>((resolve, reject) => {
      client.once('open', () => resolve());
      client.once('error', reject);
    });

    const received = new Promise<unknown>(resolve => {
      client.once('message', data => resolve(JSON.parse(data.toString())));
    });
    const tx = await bob.createTransaction(alice.address, 1, 1700000200);
    expect((await api.post('/transactions/new', tx.toJSON())).status).toBe(201);

    expect(await received).toEqual({ type: 'newTx', payload: { txid: tx.hash(), tx: tx.toJSON() } });
    client.close();
  });
});

describe('HTTP API guards', () => {
  const config = loadConfig([...BASE_ARGS, '--difficulty', '1', '--allowed-hosts', 'wallet.local'], {});
  const api = new Api(
    { ...config, rateLimits: { ...DEFAULT_RATE_LIMITS, default: [{ limit: 2, windowMs: 60000 }] } },
    { maxNonce: 500 }
  );
  const alice = new Wallet();
  const bob = new Wallet();

  beforeAll(() => api.start());
  afterAll(() => api.stop());

  it('matches browser origins against the allowed hostnames', () => {
    const hosts = ['localhost', '127.0.0.1'];
    expect(isAllowedOrigin(undefined, hosts)).toBe(true);
    expect(isAllowedOrigin('http://localhost:3000', hosts)).toBe(true);
    expect(isAllowedOrigin('https://127.0.0.1', hosts)).toBe(true);
    expect(isAllowedOrigin('http://localhost.evil.example', hosts)).toBe(false);
    expect(isAllowedOrigin('null', hosts)).toBe(false);
  });

  it('sends CORS headers only to allowed origins', async () => {
    expect((await api.headersFrom('/health', 'http://localhost:3000'))['access-control-allow-origin']).toBe('http://localhost:3000');
    expect((await api.headersFrom('/health', 'https://wallet.local'))['access-control-allow-origin']).toBe('https://wallet.local');
    expect((await api.headersFrom('/health', 'http://evil.example'))['access-control-allow-origin']).toBeUndefined();
  });

  it('answers 503 when the nonce search runs out', async () => {
    const tx = await alice.createTransaction(bob.address, 1, 1700000000);
    expect((await api.post('/transactions/new', tx.toJSON())).status).toBe(201);

    api.ctx.chain.difficulty = 20;
    try {
      expect(await api.get(`/mine?address=${alice.address}`)).toEqual({
        status: 503,
        body: { error: 'Error mining block: Failed to mine block after 500 attempts' }
      });
    } finally {
      api.ctx.chain.difficulty = 1;
    }
    expect(api.ctx.chain.length).toBe(1);
    expect(api.ctx.chain.transactionPool.size).toBe(1);
  });

  it('limits each route per client', async () => {
    expect((await api.get('/peers')).status).toBe(200);
    expect((await api.get('/peers')).status).toBe(200);
    expect(await api.get('/peers')).toEqual({ status: 429, body: { error: 'Rate limit exceeded: 2 per 60s' } });

    expect((await api.get(`/wallet/balance?address=${bob.address}`)).status).toBe(200);
    expect((await api.get('/health')).status).toBe(200);
  });
});
