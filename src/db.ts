import type { AbstractLevel } from 'abstract-level';
import { Level } from 'level';
import { z } from 'zod';
import { Block } from './block';
import { Logger, logger as rootLogger } from './logger';
import { Transaction } from './transaction';
import {
  BlockDataSchema,
  PeerRecord,
  PeerRecordSchema,
  TransactionDataSchema,
  WalletRecord,
  WalletRecordSchema
} from './types';

/*
Key schema:
- block:<index>     -> Block JSON
- pending:<txid>    -> Transaction JSON (mempool, survives restarts)
- wallet:<address>  -> { address, publicKey, createdAt }
- peer:<node_id>    -> { nodeId, host, port, trusted, lastSeen }
Values are JSON strings, validated on read.
*/

export type Database = AbstractLevel<string | Buffer | Uint8Array, string, string>;

export function openDatabase(dbPath: string): Database {
  return new Level<string, string>(dbPath, { valueEncoding: 'utf8' });
}

const prefixRange = (prefix: string) => ({ gte: `${prefix}:`, lt: `${prefix};` });

function parseRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | null {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (e) {
    return null;
  }
}

/**
 * Persistence for the node. Every method reports failure as false / empty
 * instead of throwing, and logs the cause.
 */
export class ChainStore {
  private log: Logger;

  constructor(private db: Database, log?: Logger) {
    this.log = log ?? rootLogger.child({ module: 'store' });
  }

  async open(): Promise<void> {
    await this.db.open();
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  async saveBlock(block: Block): Promise<boolean> {
    const ops = [
      { type: 'put' as const, key: `block:${block.index}`, value: JSON.stringify(block.toJSON()) },
      ...block.transactions.map(tx => ({ type: 'del' as const, key: `pending:${tx.hash()}` }))
    ];
    try {
      await this.db.batch(ops);
      return true;
    } catch (err) {
      this.log.error({ err, index: block.index }, 'Failed to save block');
      return false;
    }
  }

  /** Stored blocks in index order; unreadable records are skipped. */
  async getBlocks(): Promise<Block[]> {
    const blocks: Block[] = [];
    try {
      for await (const [key, value] of this.db.iterator(prefixRange('block'))) {
        const data = parseRecord(BlockDataSchema, value);
        if (!data) {
          this.log.warn({ key }, 'Skipping unreadable block record');
          continue;
        }
        try {
          blocks.push(Block.fromData(data));
        } catch (err) {
          this.log.warn({ key, err }, 'Skipping invalid block record');
        }
      }
    } catch (err) {
      this.log.error({ err }, 'Failed to read blocks');
      return [];
    }
    return blocks.sort((a, b) => a.index - b.index);
  }

  /** Swap the stored chain for `blocks` in one batch. */
  async replaceBlocks(blocks: readonly Block[]): Promise<boolean> {
    try {
      const stale: string[] = [];
      for await (const key of this.db.keys(prefixRange('block'))) stale.push(key);
      await this.db.batch([
        ...stale.map(key => ({ type: 'del' as const, key })),
        ...blocks.map(block => ({ type: 'put' as const, key: `block:${block.index}`, value: JSON.stringify(block.toJSON()) }))
      ]);
      return true;
    } catch (err) {
      this.log.error({ err, length: blocks.length }, 'Failed to replace stored chain');
      return false;
    }
  }

  async savePendingTransaction(tx: Transaction): Promise<boolean> {
    try {
      await this.db.put(`pending:${tx.hash()}`, JSON.stringify(tx.toJSON()));
      return true;
    } catch (err) {
      this.log.error({ err }, 'Failed to save pending transaction');
      return false;
    }
  }

  async getPendingTransactions(): Promise<Transaction[]> {
    const txs: Transaction[] = [];
    try {
      for await (const [key, value] of this.db.iterator(prefixRange('pending'))) {
        const data = parseRecord(TransactionDataSchema, value);
        if (!data) {
          this.log.warn({ key }, 'Skipping unreadable transaction record');
          continue;
        }
        try {
          txs.push(Transaction.fromData(data));
        } catch (err) {
          this.log.warn({ key, err }, 'Skipping invalid transaction record');
        }
      }
    } catch (err) {
      this.log.error({ err }, 'Failed to read pending transactions');
      return [];
    }
    return txs.sort((a, b) => a.timestamp - b.timestamp);
  }

  async removePendingTransactions(txs: readonly Transaction[]): Promise<boolean> {
    if (txs.length === 0) return true;
    try {
      await this.db.batch(txs.map(tx => ({ type: 'del' as const, key: `pending:${tx.hash()}` })));
      return true;
    } catch (err) {
      this.log.error({ err }, 'Failed to remove pending transactions');
      return false;
    }
  }

  async saveWallet(record: WalletRecord): Promise<boolean> {
    try {
      await this.db.put(`wallet:${record.address}`, JSON.stringify(record));
      return true;
    } catch (err) {
      this.log.error({ err, address: record.address }, 'Failed to save wallet');
      return false;
    }
  }

  async getWallet(address: string): Promise<WalletRecord | null> {
    const raw = await this.getRaw(`wallet:${address}`);
    return raw === null ? null : parseRecord(WalletRecordSchema, raw);
  }

  async savePeer(peer: PeerRecord): Promise<boolean> {
    try {
      await this.db.put(`peer:${peer.nodeId}`, JSON.stringify(peer));
      return true;
    } catch (err) {
      this.log.error({ err, peer: peer.nodeId }, 'Failed to save peer');
      return false;
    }
  }

  async getPeers(trustedOnly = false): Promise<PeerRecord[]> {
    const peers: PeerRecord[] = [];
    try {
      for await (const value of this.db.values(prefixRange('peer'))) {
        const peer = parseRecord(PeerRecordSchema, value);
        if (peer && (!trustedOnly || peer.trusted)) peers.push(peer);
      }
    } catch (err) {
      this.log.error({ err }, 'Failed to read peers');
      return [];
    }
    return peers.sort((a, b) => b.lastSeen - a.lastSeen);
  }

  async clearData(): Promise<boolean> {
    try {
      await this.db.clear();
      this.log.info('Store cleared');
      return true;
    } catch (err) {
      this.log.error({ err }, 'Failed to clear store');
      return false;
    }
  }

  private async getRaw(key: string): Promise<string | null> {
    try {
      return await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) return null;
      this.log.error({ err, key }, 'Store read failed');
      return null;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'LEVEL_NOT_FOUND';
}
