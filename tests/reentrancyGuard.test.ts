import { describe, expect, it } from 'vitest';
import { DomainError } from '../src/errors/taxonomy.js';
import { ReentrancyGuard } from '../src/infra/reentrancyGuard.js';

describe('ReentrancyGuard', () => {
  it('returns the work result and releases the lock', () => {
    const guard = new ReentrancyGuard();
    let lockedInside = false;

    const result = guard.run(() => {
      lockedInside = guard.locked;
      return 42;
    });

    expect(result).toBe(42);
    expect(lockedInside).toBe(true);
    expect(guard.locked).toBe(false);
  });

  it('rejects a nested run with reentrant_call', () => {
    const guard = new ReentrancyGuard();
    let nested: unknown = null;

    guard.run(() => {
      try {
        guard.run(() => 'inner');
      } catch (error) {
        nested = error;
      }
    });

    expect(nested).toBeInstanceOf(DomainError);
    expect(nested).toMatchObject({ code: 'reentrant_call', statusCode: 409, category: 'InvalidState' });
  });

  it('releases the lock when the work throws', () => {
    const guard = new ReentrancyGuard();

    expect(() => guard.run(() => {
      throw new Error('work failed');
    })).toThrow('work failed');

    expect(guard.locked).toBe(false);
    expect(guard.run(() => 'again')).toBe('again');
  });
});
