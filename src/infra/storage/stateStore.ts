import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppState } from '../../types.js';
import { stringify } from '../../utils/json.js';
import { Clock, systemClock } from '../../utils/time.js';
import { EventBus, EventType, eventBus } from '../eventBus.js';
import { ReentrancyGuard } from '../reentrancyGuard.js';
import { appStateSchema } from './stateSchema.js';

export interface PendingEvent {
  type: EventType;
  data: unknown;
}

/**
 * One call's working copy of the state. Everything a call changes goes
 * through `state`; events wait in `events` until the call commits.
 */
export class Transaction {
  readonly events: PendingEvent[] = [];

  constructor(
    readonly state: AppState,
    readonly now: number,
  ) {}

  emit(type: EventType, data: unknown): void {
    this.events.push({ type, data });
  }
}

export interface StateStoreOptions {
  /** null keeps state in memory only. */
  stateFilePath: string | null;
  defaults: () => AppState;
  clock?: Clock;
  bus?: EventBus;
}

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export class StateStore {
  private state: AppState;
  private readonly guard = new ReentrancyGuard();
  private readonly clock: Clock;
  private readonly bus: EventBus;
  private writes: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(private readonly options: StateStoreOptions) {
    this.state = options.defaults();
    this.clock = options.clock ?? systemClock;
    this.bus = options.bus ?? eventBus;
  }

  async init(): Promise<void> {
    const file = this.options.stateFilePath;
    if (!file) return;

    await fs.mkdir(path.dirname(file), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = this.options.defaults();
      await this.persist();
      return;
    }

    const parsed = appStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`State file ${file} is invalid: ${parsed.error.message}`);
    }
    this.state = parsed.data;
  }

  now(): number {
    return this.clock();
  }

  /** True while a transaction is running. */
  get busy(): boolean {
    return this.guard.locked;
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /** Runs a read-only view over committed state and returns a detached copy. */
  read<T>(view: (state: AppState, now: number) => T): T {
    return structuredClone(view(this.state, this.clock()));
  }

  /**
   * Runs `work` against a draft of the state. A throw discards the draft and
   * its events; a return commits both. Nested calls are rejected.
   */
  transaction<T>(work: (tx: Transaction) => T): T {
    const { result, events } = this.guard.run(() => {
      const tx = new Transaction(structuredClone(this.state), this.clock());
      const result = structuredClone(work(tx));
      tx.state.metrics.transactionsCommitted += 1;
      this.state = tx.state;
      return { result, events: tx.events };
    });

    this.schedulePersist();
    for (const event of events) {
      this.bus.emit(event.type, event.data);
    }

    return result;
  }

  /** Waits for queued writes; re-raises the first write failure since the last flush. */
  async flush(): Promise<void> {
    await this.writes;
    if (this.writeError !== null) {
      const error = this.writeError;
      this.writeError = null;
      throw error;
    }
  }

  private schedulePersist(): void {
    if (!this.options.stateFilePath) return;

    this.writes = this.writes
      .then(() => this.persist())
      .catch((error: unknown) => {
        this.writeError ??= error;
      });
  }

  private async persist(): Promise<void> {
    const file = this.options.stateFilePath;
    if (!file) return;
    await fs.writeFile(file, stringify(this.state, 2));
  }
}
