import { ValidationError } from './errors';
import { logger } from './logger';
import { TransactionData, TransactionDataSchema } from './types';
import {
  Hex,
  canonicalJson,
  parsePublicKey,
  publicKeyFor,
  sha256Bytes,
  sha256Hex,
  signDigest,
  verifyDigest
} from './utils/crypto';

/** Sender of mining rewards. Reward transactions are never signed. */
export const SYSTEM_SENDER = 'system';

export const MIN_AMOUNT = 1e-8;
export const MAX_AMOUNT = 1e9;

export type TransactionJSON = {
  sender: string;
  recipient: string;
  amount: number;
  timestamp: number;
  signature?: Hex;
};

export function isValidAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount > 0 && amount >= MIN_AMOUNT && amount <= MAX_AMOUNT;
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}

export class Transaction {
  readonly sender: string;
  readonly recipient: string;
  readonly amount: number;
  readonly timestamp: number;
  private _signature?: Hex;

  constructor(sender: string, recipient: string, amount: number, timestamp: number = nowSeconds(), signature?: Hex) {
    if (!sender) throw new ValidationError('Sender must be a non-empty string');
    if (!recipient) throw new ValidationError('Recipient must be a non-empty string');
    if (!Number.isFinite(amount)) throw new ValidationError('Invalid amount format');
    if (amount <= 0) throw new ValidationError('Amount must be positive');
    if (amount < MIN_AMOUNT) throw new ValidationError(`Amount is too small (minimum: ${MIN_AMOUNT})`);
    if (amount > MAX_AMOUNT) throw new ValidationError(`Amount is too large (maximum: ${MAX_AMOUNT})`);
    if (!Number.isFinite(timestamp)) throw new ValidationError('Invalid timestamp');

    this.sender = sender;
    this.recipient = recipient;
    this.amount = amount;
    this.timestamp = timestamp;
    this._signature = signature || undefined;
  }

  get signature(): Hex | undefined {
    return this._signature;
  }

  isReward(): boolean {
    return this.sender === SYSTEM_SENDER;
  }

  /** Digest that gets signed: every field except the signature. */
  signingHash(): Uint8Array {
    return sha256Bytes(canonicalJson({
      sender: this.sender,
      recipient: this.recipient,
      amount: this.amount,
      timestamp: this.timestamp
    }));
  }

  async sign(privateKey: Hex): Promise<void> {
    if (this.isReward()) return;
    if (this._signature) {
      logger.warn({ tx: this.hash() }, 'Transaction already signed, overwriting existing signature');
    }
    let publicKey: Hex;
    try {
      publicKey = publicKeyFor(privateKey);
    } catch (e) {
      throw new ValidationError('Invalid private key');
    }
    if (publicKey !== this.sender.toLowerCase()) {
      throw new ValidationError('Private key does not belong to the sender address');
    }
    this._signature = await signDigest(this.signingHash(), privateKey);
  }

  verify(): boolean {
    if (this.isReward()) return true;

    if (!this._signature) {
      logger.warn({ sender: this.sender }, 'Transaction has no signature');
      return false;
    }
    if (!isValidAmount(this.amount)) {
      logger.warn({ amount: this.amount }, 'Invalid amount in transaction');
      return false;
    }

    try {
      const publicKey = parsePublicKey(this.sender);
      if (!publicKey) {
        logger.warn({ sender: this.sender }, 'Invalid public key format from sender');
        return false;
      }
      const ok = verifyDigest(this.signingHash(), this._signature, publicKey);
      if (!ok) logger.warn({ sender: this.sender, recipient: this.recipient }, 'Signature verification failed');
      return ok;
    } catch (err) {
      logger.warn({ err, sender: this.sender }, 'Signature verification failed');
      return false;
    }
  }

  /** Identity hash over every field, signature included when present. */
  hash(): Hex {
    return sha256Hex(canonicalJson(this.toJSON()));
  }

  equals(other: Transaction): boolean {
    return this.sender === other.sender &&
      this.recipient === other.recipient &&
      this.amount === other.amount &&
      this.timestamp === other.timestamp &&
      this._signature === other._signature;
  }

  toJSON(): TransactionJSON {
    const data: TransactionJSON = {
      sender: this.sender,
      recipient: this.recipient,
      amount: this.amount,
      timestamp: this.timestamp
    };
    if (this._signature) data.signature = this._signature;
    return data;
  }

  static fromJSON(data: unknown): Transaction {
    const parsed = TransactionDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Invalid transaction data: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return Transaction.fromData(parsed.data);
  }

  static fromData(data: TransactionData): Transaction {
    return new Transaction(data.sender, data.recipient, data.amount, data.timestamp, data.signature ?? undefined);
  }

  toString(): string {
    return `Transaction(sender=${this.sender}, recipient=${this.recipient}, amount=${this.amount}, timestamp=${this.timestamp})`;
  }
}
