import { describe, it, expect } from 'vitest';
import { contentHash, deterministicHash, stableStringify } from '@/core/seed';

describe('seed', () => {
  describe('deterministicHash', () => {
    it('produces consistent hash for same input', () => {
      expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    });

    it('produces different hash for different input', () => {
      expect(deterministicHash('input-a')).not.toBe(deterministicHash('input-b'));
    });

    it('returns 64-character hex string', () => {
      expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('stableStringify', () => {
    it('sorts keys at every depth', () => {
      expect(stableStringify({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } })).toBe(
        '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}'
      );
    });

    it('drops undefined properties and writes undefined items as null', () => {
      expect(stableStringify({ a: undefined, b: [undefined, 1] })).toBe('{"b":[null,1]}');
    });
  });

  describe('contentHash', () => {
    it('produces same hash regardless of key order', () => {
      expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    });

    it('changes with any nested value', () => {
      expect(contentHash({ votes: [{ direction: 'positive' }] })).not.toBe(
        contentHash({ votes: [{ direction: 'neutral' }] })
      );
    });
  });
});
