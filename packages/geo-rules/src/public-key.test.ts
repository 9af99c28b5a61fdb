import { describe, it, expect } from 'vitest';
import {
  comparePublicKeys,
  decodePublicKey,
  encodePublicKey,
  publicKeyToHex,
} from './public-key.js';

describe('decodePublicKey', () => {
  it('decodes a 32-byte base58 key', () => {
    const key = decodePublicKey('7XSXtg2CWwjWCa7j4kXfYLMi8xawJbq6XW6xMa6Y5P9Q');
    expect(key).not.toBeNull();
    expect(key?.length).toBe(32);
    expect(publicKeyToHex(key ?? new Uint8Array()).slice(0, 8)).toBe('60f26a67');
  });

  it('decodes leading ones as zero bytes', () => {
    const key = decodePublicKey('11111111111111111111111111111111');
    expect(key).toEqual(new Uint8Array(32));
  });

  it('rejects text that is not base58', () => {
    expect(decodePublicKey('invalid')).toBeNull();
    expect(decodePublicKey('0OIl')).toBeNull();
    expect(decodePublicKey('')).toBeNull();
  });

  it('rejects keys of the wrong length', () => {
    expect(decodePublicKey('1111111111111111111111111111111')).toBeNull();
    expect(decodePublicKey('2jXy799ynN5A6xM4mT2QPY2ATqNnSboP8Gr3HdWu3UwR2')).toBeNull();
  });
});

describe('encodePublicKey', () => {
  it('encodes back to the original text', () => {
    const text = '2jXy799ynN5A6xM4mT2QPY2ATqNnSboP8Gr3HdWu3UwR';
    const key = decodePublicKey(text);
    expect(key).not.toBeNull();
    expect(encodePublicKey(key ?? new Uint8Array())).toBe(text);
  });
});

describe('comparePublicKeys', () => {
  it('orders by unsigned bytes', () => {
    const low = new Uint8Array([0x01, 0xff]);
    const high = new Uint8Array([0x80, 0x00]);
    expect(comparePublicKeys(low, high)).toBeLessThan(0);
    expect(comparePublicKeys(high, low)).toBeGreaterThan(0);
    expect(comparePublicKeys(high, new Uint8Array([0x80, 0x00]))).toBe(0);
  });

  it('sorts a prefix before the longer key', () => {
    expect(comparePublicKeys(new Uint8Array([1]), new Uint8Array([1, 0]))).toBeLessThan(0);
  });
});
