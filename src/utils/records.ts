/**
 * Keyed access to plain-object records whose keys come from callers.
 * Inherited properties (`constructor`, `toString`) never read as entries and
 * `__proto__` is stored as an ordinary key.
 */

/** Keys a persisted record cannot round-trip through schema validation. */
export const isReservedKey = (key: string): boolean => key === '__proto__';

export const ownValue = <T>(record: Record<string, T>, key: string): T | undefined => (
  Object.hasOwn(record, key) ? record[key] : undefined
);

export const setOwn = <T>(record: Record<string, T>, key: string, value: T): void => {
  Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
};
