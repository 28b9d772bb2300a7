import { z } from 'zod';

export const TransactionDataSchema = z.object({
  sender: z.string(),
  recipient: z.string(),
  amount: z.number(),
  timestamp: z.number(),
  signature: z.string().nullish()
});

export type TransactionData = z.infer<typeof TransactionDataSchema>;

export const BlockDataSchema = z.object({
  index: z.number().int(),
  timestamp: z.number(),
  previous_hash: z.string(),
  hash: z.string(),
  nonce: z.number().int(),
  transactions: z.array(TransactionDataSchema)
});

export type BlockData = z.infer<typeof BlockDataSchema>;

export const ChainSnapshotSchema = z.object({
  chain: z.array(BlockDataSchema),
  difficulty: z.number().int().optional(),
  mining_reward: z.number().optional(),
  transaction_pool: z.object({ transactions: z.array(TransactionDataSchema) }).optional()
});

export type ChainSnapshot = z.infer<typeof ChainSnapshotSchema>;

export const PeerRecordSchema = z.object({
  nodeId: z.string(),
  host: z.string(),
  port: z.number().int(),
  trusted: z.boolean(),
  lastSeen: z.number()
});

export type PeerRecord = z.infer<typeof PeerRecordSchema>;

export const WalletRecordSchema = z.object({
  address: z.string(),
  publicKey: z.string(),
  createdAt: z.string()
});

export type WalletRecord = z.infer<typeof WalletRecordSchema>;

export type PeerAddress = {
  host: string;
  port: number;
};
