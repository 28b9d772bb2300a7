import { setImmediate as yieldToLoop } from 'timers/promises';
import { MiningExhaustedError, ValidationError } from './errors';
import { logger } from './logger';
import { Transaction, TransactionJSON, nowSeconds } from './transaction';
import { BlockData, BlockDataSchema } from './types';
import { Hex, canonicalJson, isHex, sha256HexParts } from './utils/crypto';

/** Nonce search space; the search gives up once it is exhausted. */
export const MAX_NONCE = 2 ** 32;
export const ZERO_HASH: Hex = '0'.repeat(64);

export interface BlockFields {
  index: number;
  transactions: Transaction[];
  previousHash: Hex;
  timestamp?: number;
  nonce?: number;
  hash?: Hex;
}

export interface MineOptions {
  /** Longest stretch of hashing, in ms, before yielding to the event loop. */
  sliceMs?: number;
  maxNonce?: number;
}

/**
 * The hashed document with the nonce cut out. Canonical key order puts
 * `nonce` second, so only its digits change between attempts.
 */
interface Preimage {
  prefix: Buffer;
  suffix: Buffer;
}

export class Block {
  readonly index: number;
  readonly transactions: readonly Transaction[];
  readonly previousHash: Hex;
  readonly timestamp: number;
  private _nonce: number;
  private _hash: Hex;

  constructor({ index, transactions, previousHash, timestamp, nonce = 0, hash }: BlockFields) {
    if (!Number.isInteger(index) || index < 0) {
      throw new ValidationError('Block index must be a non-negative integer');
    }
    if (!Array.isArray(transactions)) {
      throw new ValidationError('Transactions must be a list');
    }
    if (typeof previousHash !== 'string' || !isHex(previousHash, 64)) {
      throw new ValidationError('Previous hash must be a 64-character hex string');
    }
    if (!Number.isInteger(nonce) || nonce < 0 || nonce >= MAX_NONCE) {
      throw new ValidationError(`Nonce must be an integer in [0, ${MAX_NONCE})`);
    }
    if (hash !== undefined && (typeof hash !== 'string' || !isHex(hash, 64))) {
      throw new ValidationError('Block hash must be a 64-character hex string');
    }

    this.index = index;
    this.transactions = transactions.slice();
    this.previousHash = previousHash;
    this.timestamp = timestamp ?? nowSeconds();
    this._nonce = nonce;
    this._hash = hash ?? this.calculateHash();
  }

  get nonce(): number {
    return this._nonce;
  }

  get hash(): Hex {
    return this._hash;
  }

  static meetsDifficulty(hash: Hex, difficulty: number): boolean {
    return hash.startsWith('0'.repeat(difficulty));
  }

  calculateHash(): Hex {
    return Block.hashWith(this.preimage(), this._nonce);
  }

  /** Same bytes as canonicalJson over index, nonce, previous_hash, timestamp, transactions. */
  private preimage(): Preimage {
    const transactions: TransactionJSON[] = this.transactions.map(tx => tx.toJSON());
    return {
      prefix: Buffer.from(`{"index":${canonicalJson(this.index)},"nonce":`),
      suffix: Buffer.from(
        `,"previous_hash":${canonicalJson(this.previousHash)}` +
        `,"timestamp":${canonicalJson(this.timestamp)}` +
        `,"transactions":${canonicalJson(transactions)}}`
      )
    };
  }

  private static hashWith({ prefix, suffix }: Preimage, nonce: number): Hex {
    return sha256HexParts([prefix, String(nonce), suffix]);
  }

  /**
   * Search nonces from 0 upward until the hash has `difficulty` leading
   * zeros. Blocks the calling thread for the whole search.
   */
  mine(difficulty: number, maxNonce: number = MAX_NONCE): void {
    warnOnDifficulty(difficulty);
    const started = Date.now();
    const preimage = this.preimage();
    for (let nonce = 0; nonce < maxNonce; nonce++) {
      const hash = Block.hashWith(preimage, nonce);
      if (Block.meetsDifficulty(hash, difficulty)) {
        this.solved(nonce, hash, started);
        return;
      }
    }
    throw new MiningExhaustedError(maxNonce);
  }

  /**
   * Same search as mine(), yielding to the event loop once `sliceMs` has
   * passed since the last yield. Large blocks hash slowly, so the slice is
   * measured in time rather than attempts.
   */
  async mineAsync(difficulty: number, { sliceMs = 10, maxNonce = MAX_NONCE }: MineOptions = {}): Promise<void> {
    warnOnDifficulty(difficulty);
    const started = Date.now();
    const preimage = this.preimage();
    let sliceStart = Date.now();
    for (let nonce = 0; nonce < maxNonce; nonce++) {
      const hash = Block.hashWith(preimage, nonce);
      if (Block.meetsDifficulty(hash, difficulty)) {
        this.solved(nonce, hash, started);
        return;
      }
      if (Date.now() - sliceStart >= sliceMs) {
        await yieldToLoop();
        sliceStart = Date.now();
      }
    }
    throw new MiningExhaustedError(maxNonce);
  }

  private solved(nonce: number, hash: Hex, started: number) {
    this._nonce = nonce;
    this._hash = hash;
    logger.info({ index: this.index, nonce, ms: Date.now() - started }, 'Block mined');
  }

  isValid(difficulty: number): boolean {
    const calculated = this.calculateHash();
    if (calculated !== this._hash) {
      logger.warn({ stored: this._hash, calculated }, 'Block hash mismatch');
      return false;
    }
    if (!Block.meetsDifficulty(this._hash, difficulty)) {
      logger.warn({ hash: this._hash, difficulty }, 'Block hash does not meet difficulty requirement');
      return false;
    }
    for (const tx of this.transactions) {
      if (!tx.verify()) {
        logger.warn({ index: this.index, tx: tx.hash() }, 'Block contains an invalid transaction');
        return false;
      }
    }
    return true;
  }

  toJSON(): BlockData {
    return {
      index: this.index,
      timestamp: this.timestamp,
      previous_hash: this.previousHash,
      hash: this._hash,
      nonce: this._nonce,
      transactions: this.transactions.map(tx => tx.toJSON())
    };
  }

  static fromJSON(data: unknown): Block {
    const parsed = BlockDataSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`Invalid block data: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`);
    }
    return Block.fromData(parsed.data);
  }

  static fromData(data: BlockData): Block {
    return new Block({
      index: data.index,
      timestamp: data.timestamp,
      previousHash: data.previous_hash,
      nonce: data.nonce,
      hash: data.hash,
      transactions: data.transactions.map(tx => Transaction.fromData(tx))
    });
  }

  toString(): string {
    return `Block(index=${this.index}, hash=${this._hash.slice(0, 10)}..., ` +
      `previous_hash=${this.previousHash.slice(0, 10)}..., transactions=${this.transactions.length}, nonce=${this._nonce})`;
  }
}

function warnOnDifficulty(difficulty: number) {
  if (difficulty < 1) logger.warn({ difficulty }, 'Mining with low difficulty');
  else if (difficulty > 8) logger.warn({ difficulty }, 'Mining with very high difficulty');
}
