/**
 * JSON.stringify replacer that writes bigints as decimal strings.
 */
export const bigintReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

export const stringify = (value: unknown, space?: number): string => JSON.stringify(value, bigintReplacer, space);

/**
 * Deep copy with every bigint turned into its decimal string, for wire output.
 */
export const toWire = (value: unknown): unknown => {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toWire);
  if (value && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toWire(v)]));
  }
  return value;
};
