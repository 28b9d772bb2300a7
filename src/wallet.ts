import { Transaction, nowSeconds } from './transaction';
import { WalletRecord } from './types';
import { Hex, generatePrivateKey, publicKeyFor } from './utils/crypto';

/**
 * A secp256k1 key pair. The address is the compressed public key in hex,
 * which is also what transaction verification parses.
 */
export class Wallet {
  readonly privateKey: Hex;
  readonly publicKey: Hex;

  constructor(privateKey: Hex = generatePrivateKey()) {
    this.privateKey = privateKey.toLowerCase();
    this.publicKey = publicKeyFor(this.privateKey);
  }

  get address(): string {
    return this.publicKey;
  }

  async createTransaction(recipient: string, amount: number, timestamp: number = nowSeconds()): Promise<Transaction> {
    const tx = new Transaction(this.address, recipient, amount, timestamp);
    await tx.sign(this.privateKey);
    return tx;
  }

  toRecord(): WalletRecord {
    return { address: this.address, publicKey: this.publicKey, createdAt: new Date().toISOString() };
  }

  toJSON() {
    return { address: this.address, public_key: this.publicKey, private_key: this.privateKey };
  }
}
