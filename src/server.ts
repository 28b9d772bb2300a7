import express, { ErrorRequestHandler } from 'express';
import bodyParser from 'body-parser';
import cors, { CorsOptions } from 'cors';
import { rateLimit } from 'express-rate-limit';
import http from 'http';
import WebSocket from 'ws';
import { RateLimitRule, RateLimits } from './config';
import { AppContext } from './context';
import { MiningExhaustedError, ValidationError } from './errors';
import { SYSTEM_SENDER, Transaction } from './transaction';
import { parsePublicKey } from './utils/crypto';
import { Wallet } from './wallet';

export interface HttpServer {
  app: express.Express;
  server: http.Server;
  wss: WebSocket.Server;
  broadcast(type: string, payload: unknown): void;
  listen(port: number, host?: string): Promise<number>;
  close(): Promise<void>;
}

const REQUIRED_TX_FIELDS = ['sender', 'recipient', 'amount', 'timestamp', 'signature'];

const isAddress = (value: unknown): value is string => typeof value === 'string' && parsePublicKey(value) !== null;

/** Browser origins are allowed by hostname; requests without an Origin pass. */
export function isAllowedOrigin(origin: string | undefined, allowedHosts: readonly string[]): boolean {
  if (!origin) return true;
  try {
    return allowedHosts.includes(new URL(origin).hostname);
  } catch (e) {
    return false;
  }
}

function limiter({ limit, windowMs }: RateLimitRule): express.RequestHandler {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: `Rate limit exceeded: ${limit} per ${windowMs / 1000}s` }
  });
}

export function createHttpServer(ctx: AppContext): HttpServer {
  const { chain, node, store, config } = ctx;
  const log = ctx.log.child({ module: 'http' });

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => callback(null, isAllowedOrigin(origin, config.allowedHosts))
  };

  // Each route gets its own counters.
  const limits = config.rateLimits;
  const only = (pick: (l: RateLimits) => RateLimitRule) => (limits ? [limiter(pick(limits))] : []);
  const defaults = () => (limits ? limits.default.map(limiter) : []);

  const app = express();
  app.use(cors(corsOptions));
  app.use(bodyParser.json({ limit: '2mb' }));

  const server = http.createServer(app);
  const wss = new WebSocket.Server({ server });

  wss.on('connection', () => {
    log.debug({ clients: wss.clients.size }, 'ws client connected');
  });

  // helper to broadcast
  function broadcast(type: string, payload: unknown) {
    const msg = JSON.stringify({ type, payload });
    wss.clients.forEach(c => {
      if (c.readyState === WebSocket.OPEN) c.send(msg);
    });
  }

  const unsubscribe = chain.subscribe({
    blockAppended: block => broadcast('newBlock', block.toJSON()),
    transactionAdded: tx => broadcast('newTx', { txid: tx.hash(), tx: tx.toJSON() })
  });

  const gossip = (what: string, send: () => Promise<number>) => {
    send().catch(err => log.error({ err, what }, 'Gossip failed'));
  };

  app.get('/chain', ...only(l => l.chain), (req, res) => {
    res.json({
      chain: chain.toJSON(),
      length: chain.length,
      genesis_hash: chain.chain[0].hash
    });
  });

  app.post('/transactions/new', ...only(l => l.submitTransaction), (req, res) => {
    const data: unknown = req.body;
    if (typeof data !== 'object' || data === null || !REQUIRED_TX_FIELDS.every(f => f in data)) {
      return res.status(400).json({ error: 'Missing required fields' });
    }

    let tx: Transaction;
    try {
      tx = Transaction.fromJSON(data);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return res.status(e instanceof ValidationError ? 400 : 500).json({ error: message });
    }

    if (!isAddress(tx.sender)) return res.status(400).json({ error: 'Invalid sender address format' });
    if (!isAddress(tx.recipient)) return res.status(400).json({ error: 'Invalid recipient address format' });
    if (!tx.verify()) return res.status(400).json({ error: 'Transaction verification failed' });
    if (!chain.addTransaction(tx)) return res.status(400).json({ error: 'Failed to add transaction' });

    res.status(201).json({ message: 'Transaction added to pool', transaction: tx.toJSON(), txid: tx.hash() });
    gossip('transaction', () => node.broadcastTransaction(tx));
  });

  app.get('/mine', ...only(l => l.mine), async (req, res) => {
    const address = typeof req.query.address === 'string' ? req.query.address : SYSTEM_SENDER;
    if (address !== SYSTEM_SENDER && !isAddress(address)) {
      return res.status(400).json({ error: 'Invalid miner address' });
    }

    try {
      const started = Date.now();
      const block = await chain.minePendingTransactions(address);
      if (!block) return res.json({ message: 'No transactions to mine' });

      log.info({ miner: address, ms: Date.now() - started }, 'Block mined via API');
      res.json({ message: 'New block mined', block: block.toJSON(), balance: chain.getBalance(address) });
      gossip('block', () => node.broadcastBlock(block));
    } catch (e) {
      const status = e instanceof MiningExhaustedError ? 503 : 500;
      log.error({ err: e }, 'Error mining block');
      res.status(status).json({ error: `Error mining block: ${e instanceof Error ? e.message : String(e)}` });
    }
  });

  app.get('/wallet/new', ...defaults(), async (req, res) => {
    try {
      const wallet = new Wallet();
      await store.saveWallet(wallet.toRecord());
      res.json(wallet.toJSON());
    } catch (e) {
      log.error({ err: e }, 'Error creating wallet');
      res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
    }
  });

  app.get('/wallet/balance', ...defaults(), (req, res) => {
    const address = req.query.address;
    if (typeof address !== 'string' || !address) return res.status(400).json({ error: 'Address required' });
    res.json({ address, balance: chain.getBalance(address) });
  });

  app.get('/peers', ...defaults(), (req, res) => {
    const peers = node.getPeers().map(p => ({ node_id: p.nodeId, host: p.host, port: p.port }));
    res.json({ peers, count: peers.length });
  });

  app.get('/', ...defaults(), (req, res) => {
    res.json({
      status: 'running',
      node_id: node.nodeId,
      host: node.advertisedHost,
      p2p_port: node.port,
      api_port: config.httpPort,
      peers_count: node.getPeers().length,
      chain_length: chain.length
    });
  });

  app.get('/node-info', ...defaults(), (req, res) => {
    res.json({
      node_id: node.nodeId,
      host: node.advertisedHost,
      p2p_port: node.port,
      api_port: config.httpPort,
      peers: node.getPeers().map(p => ({ id: p.nodeId, host: p.host, port: p.port })),
      bootstrap_nodes: node.bootstrapNodes,
      bootstrap: node.bootstrapState,
      chain_length: chain.length,
      chain_hash: chain.getLatestBlock().hash,
      difficulty: chain.difficulty,
      transaction_count: chain.transactionPool.size
    });
  });

  app.get('/health', (req, res) => res.json({ ok: true }));

  const onError: ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) return res.status(400).json({ error: 'Request must be JSON' });
    log.error({ err }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(onError);

  return {
    app,
    server,
    wss,
    broadcast,
    listen(port, host = config.host) {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          const bound = server.address();
          resolve(bound !== null && typeof bound === 'object' ? bound.port : port);
        });
      });
    },
    close() {
      unsubscribe();
      wss.clients.forEach(c => c.terminate());
      return new Promise<void>((resolve, reject) => {
        wss.close();
        if (!server.listening) return resolve();
        server.close(err => (err ? reject(err) : resolve()));
      });
    }
  };
}
