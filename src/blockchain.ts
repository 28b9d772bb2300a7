import { Block, MAX_NONCE, ZERO_HASH } from './block';
import { ChainParams, DEFAULT_CHAIN_PARAMS } from './config';
import { Logger, logger as rootLogger } from './logger';
import { SYSTEM_SENDER, Transaction } from './transaction';
import { TransactionPool } from './transactionPool';
import { ChainSnapshot } from './types';
import { Mutex } from './utils/mutex';

/** Fixed so that every node mines the identical genesis block. */
export const GENESIS_TIMESTAMP = 1234567890;

export interface ChainObserver {
  blockAppended?(block: Block): void;
  chainReplaced?(blocks: readonly Block[]): void;
  transactionAdded?(tx: Transaction): void;
}

export interface BlockchainOptions extends Partial<ChainParams> {
  log?: Logger;
  /** Longest hashing stretch, in ms, between event-loop turns while mining. */
  mineSliceMs?: number;
  maxNonce?: number;
}

type ChainCheck = { ok: true; difficulty: number } | { ok: false; reason: string };

const genesisCache = new Map<number, Block>();

function genesisFor(difficulty: number): Block {
  let genesis = genesisCache.get(difficulty);
  if (!genesis) {
    genesis = Blockchain.createGenesisBlock(difficulty);
    genesisCache.set(difficulty, genesis);
  }
  return genesis;
}

/**
 * Difficulty after a chain of `length` blocks: adjusted only when the length
 * is a multiple of the interval and past the first interval.
 */
export function retarget(
  blocks: readonly Block[],
  length: number,
  difficulty: number,
  interval: number,
  blockTime: number
): number {
  if (length % interval !== 0 || length <= interval) return difficulty;

  const tip = blocks[length - 1];
  const anchor = blocks[length - interval];
  const expected = blockTime * interval;
  const taken = tip.timestamp - anchor.timestamp;

  if (taken < expected / 2) return difficulty + 1;
  if (taken > expected * 2 && difficulty > 1) return difficulty - 1;
  return difficulty;
}

/**
 * The consensus engine: an append-only chain of blocks, the mempool and the
 * current difficulty.
 *
 * Every mutating method is synchronous, so on Node's single event loop each
 * one runs to completion before any inbound gossip is handled. Only the
 * proof-of-work search in minePendingTransactions yields, and mining calls are
 * serialized behind a mutex. A mining run is not cancelled when the chain
 * moves underneath it; its block is simply rejected at append time.
 */
export class Blockchain {
  difficulty: number;
  readonly initialDifficulty: number;
  readonly miningReward: number;
  readonly adjustmentInterval: number;
  readonly blockTime: number;
  readonly transactionPool: TransactionPool;

  private _chain: Block[];
  private observers = new Set<ChainObserver>();
  private miningLock = new Mutex();
  private mineSliceMs: number;
  private maxNonce: number;
  private log: Logger;

  constructor(options: BlockchainOptions = {}) {
    const params = { ...DEFAULT_CHAIN_PARAMS, ...definedOnly(options) };
    this.log = options.log ?? rootLogger.child({ module: 'chain' });
    this.difficulty = params.difficulty;
    this.initialDifficulty = params.difficulty;
    this.miningReward = params.miningReward;
    this.adjustmentInterval = params.adjustmentInterval;
    this.blockTime = params.targetBlockTime;
    this.mineSliceMs = options.mineSliceMs ?? 10;
    this.maxNonce = options.maxNonce ?? MAX_NONCE;
    this.transactionPool = new TransactionPool(params.maxPoolSize, this.log.child({ module: 'pool' }));
    this._chain = [genesisFor(this.initialDifficulty)];
    this.log.debug({ hash: this._chain[0].hash }, 'Genesis block ready');
  }

  static createGenesisBlock(difficulty: number): Block {
    const genesis = new Block({
      index: 0,
      timestamp: GENESIS_TIMESTAMP,
      transactions: [],
      previousHash: ZERO_HASH
    });
    genesis.mine(difficulty);
    return genesis;
  }

  get chain(): readonly Block[] {
    return this._chain;
  }

  get length(): number {
    return this._chain.length;
  }

  getLatestBlock(): Block {
    return this._chain[this._chain.length - 1];
  }

  getBlock(index: number): Block | undefined {
    return this._chain[index];
  }

  subscribe(observer: ChainObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  addTransaction(tx: Transaction): boolean {
    if (this.transactionPool.admit(tx) !== null) return false;
    this.notify(o => o.transactionAdded?.(tx));
    return true;
  }

  /**
   * Mine the pending pool into a new block paying `minerAddress` the reward.
   * Resolves to null when there is nothing to mine or when the mined block no
   * longer fits the chain. Rejects with MiningExhaustedError when the nonce
   * space runs out.
   */
  minePendingTransactions(minerAddress: string): Promise<Block | null> {
    return this.miningLock.runExclusive(() => this.mineNext(minerAddress));
  }

  private async mineNext(minerAddress: string): Promise<Block | null> {
    const pending = this.transactionPool.getTransactions();
    if (pending.length === 0 && minerAddress !== SYSTEM_SENDER) {
      this.log.info('No transactions to mine');
      return null;
    }

    const transactions = minerAddress === SYSTEM_SENDER
      ? pending
      : [new Transaction(SYSTEM_SENDER, minerAddress, this.miningReward), ...pending];

    const block = new Block({
      index: this._chain.length,
      transactions,
      previousHash: this.getLatestBlock().hash
    });

    this.log.info({ index: block.index, difficulty: this.difficulty, txs: transactions.length }, 'Mining new block');
    await block.mineAsync(this.difficulty, { sliceMs: this.mineSliceMs, maxNonce: this.maxNonce });

    if (!this.addBlock(block)) {
      this.log.warn({ index: block.index, hash: block.hash }, 'Mined block no longer extends the chain');
      return null;
    }
    return block;
  }

  addBlock(block: Block): boolean {
    if (this._chain.some(b => b.hash === block.hash)) {
      this.log.warn({ hash: block.hash }, 'Block already exists in chain');
      return false;
    }

    const reason = this.checkBlock(block, this.getLatestBlock(), this._chain.length, this.difficulty);
    if (reason) {
      this.log.warn({ hash: block.hash, index: block.index, reason }, 'Block failed validation');
      return false;
    }

    this._chain.push(block);
    const pruned = this.transactionPool.removeTransactions(block.transactions);
    this.log.info({ hash: block.hash, index: block.index, pruned }, 'Added new block');
    this.adjustDifficulty();
    this.notify(o => o.blockAppended?.(block));
    return true;
  }

  /**
   * Adopt `candidate` if it is fully valid and strictly longer than the local
   * chain. Ties are never adopted. Length, not accumulated work, decides.
   */
  replaceChain(candidate: readonly Block[]): boolean {
    if (!Array.isArray(candidate) || candidate.length === 0) {
      this.log.warn('Replacement chain must be a non-empty list');
      return false;
    }

    const seen = new Set<string>();
    for (const block of candidate) {
      if (seen.has(block.hash)) {
        this.log.warn({ hash: block.hash }, 'Duplicate block in replacement chain');
        return false;
      }
      seen.add(block.hash);
    }

    const check = this.validateChain(candidate);
    if (!check.ok) {
      this.log.warn({ reason: check.reason }, 'Replacement chain is invalid');
      return false;
    }

    if (candidate.length <= this._chain.length) {
      this.log.info({ candidate: candidate.length, current: this._chain.length }, 'Replacement chain is not longer');
      return false;
    }

    this._chain = candidate.slice();
    this.difficulty = check.difficulty;
    for (const block of this._chain) this.transactionPool.removeTransactions(block.transactions);
    this.log.info({ length: this._chain.length, difficulty: this.difficulty }, 'Chain replaced');
    this.notify(o => o.chainReplaced?.(this._chain));
    return true;
  }

  adjustDifficulty(): void {
    const next = retarget(this._chain, this._chain.length, this.difficulty, this.adjustmentInterval, this.blockTime);
    if (next > this.difficulty) this.log.info({ difficulty: next }, 'Increased difficulty');
    else if (next < this.difficulty) this.log.info({ difficulty: next }, 'Decreased difficulty');
    this.difficulty = next;
  }

  /** Linear scan over every transaction ever mined. */
  getBalance(address: string): number {
    let balance = 0;
    for (const block of this._chain) {
      for (const tx of block.transactions) {
        if (tx.sender === address) balance -= tx.amount;
        if (tx.recipient === address) balance += tx.amount;
      }
    }
    return balance;
  }

  toJSON(): ChainSnapshot {
    return {
      chain: this._chain.map(b => b.toJSON()),
      difficulty: this.difficulty,
      mining_reward: this.miningReward,
      transaction_pool: this.transactionPool.toJSON()
    };
  }

  /** Replays the whole candidate from genesis, difficulty schedule included. */
  private validateChain(blocks: readonly Block[]): ChainCheck {
    const genesis = blocks[0];
    if (genesis.index !== 0 || genesis.previousHash !== ZERO_HASH || genesis.transactions.length > 0) {
      return { ok: false, reason: 'Invalid genesis block' };
    }
    if (!genesis.isValid(this.initialDifficulty)) {
      return { ok: false, reason: 'Genesis block failed hash validation' };
    }

    let difficulty = this.initialDifficulty;
    for (let i = 1; i < blocks.length; i++) {
      const reason = this.checkBlock(blocks[i], blocks[i - 1], i, difficulty);
      if (reason) return { ok: false, reason: `${reason} at position ${i}` };
      difficulty = retarget(blocks, i + 1, difficulty, this.adjustmentInterval, this.blockTime);
    }
    return { ok: true, difficulty };
  }

  private checkBlock(block: Block, tip: Block, expectedIndex: number, difficulty: number): string | null {
    if (block.index !== expectedIndex) {
      return `Invalid block index ${block.index}, expected ${expectedIndex}`;
    }
    if (block.previousHash !== tip.hash) {
      return 'Invalid previous hash';
    }
    if (!block.isValid(difficulty)) {
      return 'Block failed hash validation';
    }
    for (let i = 0; i < block.transactions.length; i++) {
      const tx = block.transactions[i];
      if (!tx.isReward()) continue;
      if (i !== 0) return 'Reward transaction must come first';
      if (tx.amount !== this.miningReward) return `Reward of ${tx.amount} does not match ${this.miningReward}`;
    }
    return null;
  }

  private notify(fn: (observer: ChainObserver) => void) {
    for (const observer of this.observers) {
      try {
        fn(observer);
      } catch (err) {
        this.log.error({ err }, 'Chain observer failed');
      }
    }
  }
}

function definedOnly(options: BlockchainOptions): Partial<ChainParams> {
  const out: Partial<ChainParams> = {};
  if (options.difficulty !== undefined) out.difficulty = options.difficulty;
  if (options.miningReward !== undefined) out.miningReward = options.miningReward;
  if (options.adjustmentInterval !== undefined) out.adjustmentInterval = options.adjustmentInterval;
  if (options.targetBlockTime !== undefined) out.targetBlockTime = options.targetBlockTime;
  if (options.maxPoolSize !== undefined) out.maxPoolSize = options.maxPoolSize;
  return out;
}
