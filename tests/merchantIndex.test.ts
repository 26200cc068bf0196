import { describe, expect, it } from 'vitest';
import { indexHas, indexInsert, indexRemove } from '../src/domain/ledger/merchantIndex.js';
import type { MerchantIndex } from '../src/domain/ledger/merchantTypes.js';

const build = (...keys: string[]): MerchantIndex => {
  const index: MerchantIndex = { keys: [], positions: {} };
  for (const key of keys) indexInsert(index, key);
  return index;
};

describe('merchant index', () => {
  it('appends new keys and ignores duplicates', () => {
    const index = build('a', 'b', 'a');
    expect(index.keys).toEqual(['a', 'b']);
    expect(index.positions).toEqual({ a: 0, b: 1 });
  });

  it('fills a removed slot with the last key', () => {
    const index = build('a', 'b', 'c', 'd');

    expect(indexRemove(index, 'b')).toBe(true);

    expect(index.keys).toEqual(['a', 'd', 'c']);
    expect(index.positions).toEqual({ a: 0, d: 1, c: 2 });
    expect(indexHas(index, 'b')).toBe(false);
  });

  it('removes the last key without moving others', () => {
    const index = build('a', 'b');

    indexRemove(index, 'b');

    expect(index.keys).toEqual(['a']);
    expect(index.positions).toEqual({ a: 0 });
  });

  it('removes the only key', () => {
    const index = build('solo');
    indexRemove(index, 'solo');
    expect(index).toEqual({ keys: [], positions: {} });
  });

  it('reports false for a key that was never indexed', () => {
    const index = build('a');
    expect(indexRemove(index, 'zzz')).toBe(false);
    expect(index.keys).toEqual(['a']);
  });

  it('does not treat inherited object keys as indexed', () => {
    const index = build('a');
    expect(indexHas(index, 'toString')).toBe(false);
  });
});
