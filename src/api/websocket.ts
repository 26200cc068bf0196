/**
 * WebSocket audit feed.
 * Broadcasts every committed event (proposal, merchant, asset) to all
 * connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import type { EventBus, EventType } from '../infra/eventBus.js';
import { stringify } from '../utils/json.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

export class EventFeed {
  private readonly clients = new Set<WSLike>();
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly bus: EventBus) {}

  get size(): number {
    return this.clients.size;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.bus.on('*', (event: EventType, data: unknown) => {
      this.broadcast(stringify({ type: event, data, ts: new Date().toISOString() }));
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clients.clear();
  }

  add(socket: WSLike): void {
    this.clients.add(socket);
    socket.send(stringify({ type: 'connected', data: { clients: this.clients.size }, ts: new Date().toISOString() }));
    socket.on('close', () => {
      this.clients.delete(socket);
    });
    socket.on('error', () => {
      this.clients.delete(socket);
    });
  }

  private broadcast(message: string): void {
    for (const ws of this.clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  }
}

/**
 * Register the WebSocket endpoint.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance, feed: EventFeed): Promise<void> {
  feed.start();
  app.addHook('onClose', async () => {
    feed.stop();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    feed.add(socket);
  });
}
