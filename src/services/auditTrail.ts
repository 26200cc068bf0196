import { DomainError } from '../errors/taxonomy.js';
import type { EventLogger } from '../infra/logger.js';

/**
 * Logs accepted and rejected entry-point calls and counts rejections by code.
 */
export class AuditTrail {
  private rejected = 0;
  private readonly rejectionsByCode: Record<string, number> = {};

  constructor(private readonly logger: EventLogger) {}

  async accepted(event: string, data: Record<string, unknown>): Promise<void> {
    await this.logger.log('info', event, data);
  }

  async rejectedCall(event: string, error: unknown, data: Record<string, unknown>): Promise<void> {
    this.rejected += 1;
    const code = error instanceof DomainError ? error.code : 'internal_error';
    this.rejectionsByCode[code] = (this.rejectionsByCode[code] ?? 0) + 1;

    await this.logger.log(error instanceof DomainError ? 'warn' : 'error', event, {
      ...data,
      code,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  counts(): { rejectedCalls: number; rejectionsByCode: Record<string, number> } {
    return { rejectedCalls: this.rejected, rejectionsByCode: { ...this.rejectionsByCode } };
  }
}
