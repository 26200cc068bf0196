/**
 * Simple in-memory pub/sub event bus.
 * The state store publishes committed transaction events here; the WebSocket
 * handler and the audit logger subscribe to them.
 */

export type EventType =
  | 'proposal.initiated'
  | 'proposal.vote_cast'
  | 'proposal.deposit'
  | 'proposal.executed'
  | 'proposal.ended'
  | 'parameter.changed'
  | 'merchant.added'
  | 'merchant.removed'
  | 'merchant.modified'
  | 'merchant.frozen'
  | 'merchant.unfrozen'
  | 'merchant.minted'
  | 'merchant.payment'
  | 'treasury.withdrawn'
  | 'asset.transfer'
  | 'asset.approval';

export type EventCallback = (event: EventType, data: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers.
   * A throwing listener is reported to `onListenerError` and does not stop delivery.
   */
  emit(event: EventType, data: unknown): void {
    const specific = this.listeners.get(event);
    const targets = [...(specific ?? []), ...this.wildcardListeners];

    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  onListenerError: (event: EventType, error: unknown) => void = (event, error) => {
    console.error(`eventBus listener for ${event} failed`, error);
  };

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
