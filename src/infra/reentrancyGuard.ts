import { domainError, ErrorCode } from '../errors/taxonomy.js';

/**
 * Per-instance lock flag. `run` refuses to start while another `run` is on
 * the stack and always clears the flag on the way out.
 */
export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(work: () => T): T {
    if (this.entered) {
      throw domainError(ErrorCode.ReentrantCall, 'Nested call into a mutating entry point rejected.');
    }

    this.entered = true;
    try {
      return work();
    } finally {
      this.entered = false;
    }
  }
}
