import { Blockchain } from './blockchain';
import { AppConfig } from './config';
import { ChainStore, Database, openDatabase } from './db';
import { Logger, logger as rootLogger } from './logger';
import { PeerNode } from './network/peerNode';
import { Mutex } from './utils/mutex';

export interface AppContext {
  config: AppConfig;
  chain: Blockchain;
  store: ChainStore;
  node: PeerNode;
  log: Logger;
  /** Resolves once queued store writes have finished. */
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface ContextOverrides {
  db?: Database;
  log?: Logger;
  /** Passed through to the peer node; tests use 0. */
  readyDelayMs?: number;
  /** Caps the nonce search of each mining run. */
  maxNonce?: number;
}

/**
 * Build the node once at startup: open the store, restore the chain and the
 * pending pool from it, then keep it in sync through a chain observer.
 */
export async function createAppContext(config: AppConfig, overrides: ContextOverrides = {}): Promise<AppContext> {
  const log = overrides.log ?? rootLogger;
  const store = new ChainStore(overrides.db ?? openDatabase(config.dbPath), log.child({ module: 'store' }));
  await store.open();

  const chain = new Blockchain({ ...config.chain, maxNonce: overrides.maxNonce, log: log.child({ module: 'chain' }) });
  await restore(chain, store, log);

  // Store writes run one at a time so a replace never interleaves with an append.
  const writes = new Mutex();
  const persist = (what: string, write: () => Promise<boolean>) => {
    writes.runExclusive(write).then(ok => {
      if (!ok) log.warn({ what }, 'Store write failed');
    }, err => log.error({ err, what }, 'Store write failed'));
  };

  chain.subscribe({
    blockAppended: block => persist('block', () => store.saveBlock(block)),
    chainReplaced: blocks => persist('chain', async () => {
      const replaced = await store.replaceBlocks(blocks);
      const pruned = await store.removePendingTransactions(blocks.flatMap(b => b.transactions));
      return replaced && pruned;
    }),
    transactionAdded: tx => persist('transaction', () => store.savePendingTransaction(tx))
  });

  const node = new PeerNode({
    host: config.host,
    port: config.p2pPort,
    advertisedHost: config.advertisedHost,
    bootstrap: config.bootstrap,
    chain,
    requestTimeoutMs: config.requestTimeoutMs,
    bootstrapAttempts: config.bootstrapAttempts,
    bootstrapDelayMs: config.bootstrapDelayMs,
    readyDelayMs: overrides.readyDelayMs,
    log,
    events: {
      peerAdded: (peer, trusted) => persist('peer', () => store.savePeer({ ...peer, trusted, lastSeen: Date.now() }))
    }
  });

  for (const peer of await store.getPeers(true)) {
    node.addPeer(peer.nodeId, { host: peer.host, port: peer.port }, true);
  }

  const flush = () => writes.runExclusive(() => undefined);

  return {
    config,
    chain,
    store,
    node,
    log,
    flush,
    async close() {
      await node.stop();
      await flush();
      await store.close();
    }
  };
}

async function restore(chain: Blockchain, store: ChainStore, log: Logger): Promise<void> {
  const stored = await store.getBlocks();
  if (stored.length === 0) {
    await store.saveBlock(chain.getLatestBlock());
    log.info({ genesis: chain.getLatestBlock().hash }, 'Initialized store with genesis block');
  } else if (stored.length > 1 && !chain.replaceChain(stored)) {
    log.warn({ stored: stored.length }, 'Stored chain is invalid, starting from genesis');
    await store.replaceBlocks(chain.chain);
  } else if (stored[0].hash !== chain.chain[0].hash) {
    log.warn('Stored genesis does not match, starting from genesis');
    await store.replaceBlocks(chain.chain);
  }

  const pending = await store.getPendingTransactions();
  const restored = pending.filter(tx => chain.addTransaction(tx)).length;
  log.info({ length: chain.length, pending: restored }, 'Chain restored from store');
}
