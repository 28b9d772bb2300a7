import { Logger, logger as rootLogger } from './logger';
import { Transaction } from './transaction';

export const DEFAULT_MAX_POOL_SIZE = 1000;

export type PoolRejection = 'full' | 'duplicate' | 'reward' | 'invalid';

/**
 * Pending transactions waiting to be mined.
 *
 * Removal is matched by signature, so only signed transactions can ever be
 * pruned. Reward transactions are unsigned and therefore refused here; the
 * miner injects them straight into the block it builds.
 */
export class TransactionPool {
  readonly maxSize: number;
  private transactions: Transaction[] = [];
  private log: Logger;

  constructor(maxSize: number = DEFAULT_MAX_POOL_SIZE, log: Logger = rootLogger.child({ module: 'pool' })) {
    this.maxSize = maxSize;
    this.log = log;
  }

  get size(): number {
    return this.transactions.length;
  }

  addTransaction(tx: Transaction): boolean {
    return this.admit(tx) === null;
  }

  /** Same as addTransaction but reports why a transaction was refused. */
  admit(tx: Transaction): PoolRejection | null {
    if (this.transactions.length >= this.maxSize) {
      this.log.warn({ maxSize: this.maxSize }, 'Transaction pool full');
      return 'full';
    }

    const duplicate = this.transactions.some(t =>
      t.sender === tx.sender &&
      t.recipient === tx.recipient &&
      t.amount === tx.amount &&
      t.timestamp === tx.timestamp
    );
    if (duplicate) {
      this.log.warn({ tx: tx.hash() }, 'Duplicate transaction rejected');
      return 'duplicate';
    }

    if (tx.isReward()) {
      this.log.warn('Reward transactions cannot be pooled');
      return 'reward';
    }

    if (!tx.verify()) {
      this.log.warn({ tx: tx.hash() }, 'Transaction verification failed');
      return 'invalid';
    }

    this.transactions.push(tx);
    this.log.info({ sender: tx.sender, recipient: tx.recipient, amount: tx.amount }, 'Added transaction');
    return null;
  }

  getTransactions(): Transaction[] {
    return this.transactions.slice();
  }

  removeTransactions(txs: readonly Transaction[]): number {
    const signatures = new Set<string>();
    for (const tx of txs) {
      if (tx.signature) signatures.add(tx.signature);
    }
    if (signatures.size === 0) return 0;

    const before = this.transactions.length;
    this.transactions = this.transactions.filter(tx => !tx.signature || !signatures.has(tx.signature));
    return before - this.transactions.length;
  }

  clear(): void {
    this.transactions = [];
  }

  toJSON() {
    return { transactions: this.transactions.map(tx => tx.toJSON()) };
  }
}
