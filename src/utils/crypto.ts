import { createHash } from 'crypto';
import * as secp from 'noble-secp256k1';

export type Hex = string;

const HEX_RE = /^[0-9a-fA-F]*$/;

export function isHex(value: string, length?: number): boolean {
  if (length !== undefined && value.length !== length) return false;
  return value.length % 2 === 0 && HEX_RE.test(value);
}

export function sha256Hex(input: string): Hex {
  return createHash('sha256').update(input).digest('hex');
}

/** sha256 over the concatenation of `parts`, without joining them first. */
export function sha256HexParts(parts: readonly (string | Uint8Array)[]): Hex {
  const hash = createHash('sha256');
  for (const part of parts) hash.update(part);
  return hash.digest('hex');
}

export function sha256Bytes(input: string): Uint8Array {
  return createHash('sha256').update(input).digest();
}

export function bytesToHex(bytes: Uint8Array): Hex {
  return Buffer.from(bytes).toString('hex');
}

export function hexToBytes(hex: Hex): Uint8Array {
  if (!isHex(hex)) throw new Error('bad hex');
  return Buffer.from(hex, 'hex');
}

export type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical | undefined };

/**
 * Deterministic JSON: object keys sorted, undefined members dropped, no
 * whitespace. Everything that is hashed or signed goes through here.
 */
export function canonicalJson(value: Canonical): string {
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  if (value !== null && typeof value === 'object') {
    const entries: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item === undefined) continue;
      entries.push(JSON.stringify(key) + ':' + canonicalJson(item));
    }
    return '{' + entries.join(',') + '}';
  }
  return JSON.stringify(value);
}

export function generatePrivateKey(): Hex {
  return bytesToHex(secp.utils.randomPrivateKey());
}

/** Compressed public key (33 bytes, 66 hex chars) for a private key. */
export function publicKeyFor(privateKeyHex: Hex): Hex {
  return bytesToHex(secp.getPublicKey(hexToBytes(privateKeyHex), true));
}

export function parsePublicKey(publicKeyHex: string): Uint8Array | null {
  try {
    const bytes = hexToBytes(publicKeyHex);
    secp.Point.fromHex(bytes);
    return bytes;
  } catch (e) {
    return null;
  }
}

export async function signDigest(digest: Uint8Array, privateKeyHex: Hex): Promise<Hex> {
  const sig = await secp.sign(digest, hexToBytes(privateKeyHex), { canonical: true });
  return bytesToHex(sig);
}

export function verifyDigest(digest: Uint8Array, signatureHex: Hex, publicKey: Uint8Array): boolean {
  try {
    return secp.verify(hexToBytes(signatureHex), digest, publicKey);
  } catch (e) {
    return false;
  }
}
