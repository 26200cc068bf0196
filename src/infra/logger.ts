import fs from 'node:fs/promises';
import path from 'node:path';
import { stringify } from '../utils/json.js';
import { isoNow } from '../utils/time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  data: Record<string, unknown>;
}

const RECENT_LIMIT = 500;

/**
 * Append-only NDJSON event log. With a null path entries are only kept in memory.
 */
export class EventLogger {
  private readonly recent: LogEntry[] = [];

  constructor(private readonly logFilePath: string | null) {}

  async init(): Promise<void> {
    if (!this.logFilePath) return;
    await fs.mkdir(path.dirname(this.logFilePath), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: Record<string, unknown> = {}): Promise<void> {
    const entry: LogEntry = { ts: isoNow(), level, event, data };

    this.recent.push(entry);
    if (this.recent.length > RECENT_LIMIT) this.recent.shift();

    if (!this.logFilePath) return;
    await fs.appendFile(this.logFilePath, `${stringify(entry)}\n`);
  }

  entries(): LogEntry[] {
    return [...this.recent];
  }
}
