/**
 * Public Key Helpers
 *
 * Participant identities are 32 raw bytes, written by humans in base58
 * (bitcoin alphabet). Ordering is unsigned lexicographic byte order, which
 * is also the on-disk order of the binary leader geo map.
 *
 * @module geo-rules/public-key
 */

import { base58btc } from 'multiformats/bases/base58';

/** Public key length in bytes */
export const KEY_SIZE = 32;

/** One record: key bytes followed by one bucket byte */
export const RECORD_SIZE = KEY_SIZE + 1;

/**
 * Decode a base58 public key.
 *
 * @returns The 32 key bytes, or null when the text is not base58 or does
 * not decode to exactly 32 bytes
 */
export function decodePublicKey(text: string): Uint8Array | null {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return null;
  }

  let decoded: Uint8Array;
  try {
    decoded = base58btc.baseDecode(trimmed);
  } catch {
    return null;
  }

  return decoded.length === KEY_SIZE ? decoded : null;
}

export function encodePublicKey(bytes: Uint8Array): string {
  return base58btc.baseEncode(bytes);
}

/**
 * Compare two keys by unsigned byte order.
 *
 * A shorter key that is a prefix of a longer one sorts first.
 */
export function comparePublicKeys(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return a.length - b.length;
}

export function publicKeyToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}
