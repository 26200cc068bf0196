import { setOwn } from '../../utils/records.js';
import type { MerchantIndex } from './merchantTypes.js';

export const indexHas = (index: MerchantIndex, key: string): boolean => Object.hasOwn(index.positions, key);

export const indexInsert = (index: MerchantIndex, key: string): void => {
  if (indexHas(index, key)) return;
  setOwn(index.positions, key, index.keys.length);
  index.keys.push(key);
};

/**
 * Removes `key` by moving the last key into its slot. Order is not kept.
 * Returns false when the key was not indexed.
 */
export const indexRemove = (index: MerchantIndex, key: string): boolean => {
  if (!indexHas(index, key)) return false;

  const position = index.positions[key];
  const lastKey = index.keys[index.keys.length - 1];

  index.keys[position] = lastKey;
  setOwn(index.positions, lastKey, position);
  index.keys.pop();
  delete index.positions[key];
  return true;
};
