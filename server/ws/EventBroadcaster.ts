import { WebSocket } from 'ws';

import type { MarginEvent, MarginEventSink } from '../margin/types';
import { jsonReplacer } from '../utils/logger';

type LifecycleReason = 'close' | 'error' | 'stale' | 'terminated';

/** The slice of a `ws` socket the broadcaster drives. */
export interface BroadcastClient {
  readonly readyState: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
}

type BroadcasterDeps = {
  log: (event: string, data?: Record<string, unknown>) => void;
  heartbeatIntervalMs?: number;
  staleConnectionMs?: number;
  maxSubscriptionsPerClient?: number;
  now?: () => number;
};

type ConnectionContext = {
  account?: string | null;
  remoteAddress?: string | null;
};

export const ALL_MARKETS = '*';

const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;
const DEFAULT_STALE_CONNECTION_MS = 60_000;
const DEFAULT_MAX_SUBSCRIPTIONS_PER_CLIENT = 50;

function marketOf(event: MarginEvent): string | null {
  return 'symbol' in event ? event.symbol : null;
}

/**
 * Fans committed records out to WebSocket subscribers. Market records reach
 * clients subscribed to that market (or `*`); pool and capability records
 * reach every client.
 */
export class EventBroadcaster implements MarginEventSink {
  private readonly clients = new Set<BroadcastClient>();
  private readonly clientSubs = new Map<BroadcastClient, Set<string>>();
  private readonly lastPongAt = new Map<BroadcastClient, number>();
  private readonly heartbeatIntervalMs: number;
  private readonly staleConnectionMs: number;
  private readonly maxSubscriptionsPerClient: number;
  private readonly now: () => number;
  private readonly timer: NodeJS.Timeout;

  constructor(private readonly deps: BroadcasterDeps) {
    this.heartbeatIntervalMs = Math.max(1_000, deps.heartbeatIntervalMs || DEFAULT_HEARTBEAT_INTERVAL_MS);
    this.staleConnectionMs = Math.max(this.heartbeatIntervalMs * 2, deps.staleConnectionMs || DEFAULT_STALE_CONNECTION_MS);
    this.maxSubscriptionsPerClient = Math.max(1, deps.maxSubscriptionsPerClient || DEFAULT_MAX_SUBSCRIPTIONS_PER_CLIENT);
    this.now = deps.now || Date.now;
    this.timer = setInterval(() => this.heartbeatSweep(), this.heartbeatIntervalMs);
    this.timer.unref();
  }

  registerClient(client: BroadcastClient, markets: string[], context: ConnectionContext = {}): string[] {
    const normalized = this.normalizeMarkets(markets).slice(0, this.maxSubscriptionsPerClient);
    const subscriptions = normalized.length > 0 ? normalized : [ALL_MARKETS];

    this.clients.add(client);
    this.clientSubs.set(client, new Set(subscriptions));
    this.lastPongAt.set(client, this.now());

    this.deps.log('WS_CLIENT_JOIN', {
      account: context.account || null,
      remoteAddress: context.remoteAddress || null,
      markets: subscriptions,
      activeClients: this.clients.size,
    });
    return subscriptions;
  }

  markAlive(client: BroadcastClient): void {
    if (this.clients.has(client)) {
      this.lastPongAt.set(client, this.now());
    }
  }

  removeClient(client: BroadcastClient, reason: LifecycleReason, detail: Record<string, unknown> = {}): void {
    this.cleanupClient(client, reason, detail);
  }

  getClientCount(): number {
    return this.clients.size;
  }

  publish(events: MarginEvent[]): void {
    for (const event of events) {
      this.broadcast(event);
    }
  }

  broadcast(event: MarginEvent): number {
    const market = marketOf(event);
    const payload = JSON.stringify({ type: 'margin_event', event }, jsonReplacer);
    let sent = 0;

    for (const client of [...this.clients]) {
      if (client.readyState !== WebSocket.OPEN) {
        continue;
      }
      const subs = this.clientSubs.get(client);
      if (market !== null && !subs?.has(ALL_MARKETS) && !subs?.has(market)) {
        continue;
      }
      try {
        client.send(payload);
        sent++;
      } catch (error) {
        this.deps.log('WS_CLIENT_SEND_ERROR', {
          market,
          error: error instanceof Error ? error.message : 'send_failed',
        });
        this.cleanupClient(client, 'error', { market });
      }
    }

    return sent;
  }

  shutdown(): void {
    clearInterval(this.timer);
    for (const client of [...this.clients]) {
      try {
        if (client.readyState === WebSocket.OPEN || client.readyState === WebSocket.CONNECTING) {
          client.terminate();
        }
      } catch (error) {
        this.deps.log('WS_CLIENT_TERMINATE_ERROR', {
          error: error instanceof Error ? error.message : 'terminate_failed',
        });
      } finally {
        this.cleanupClient(client, 'terminated');
      }
    }
  }

  heartbeatSweep(): void {
    const now = this.now();

    for (const client of [...this.clients]) {
      if (client.readyState === WebSocket.CLOSED) {
        this.cleanupClient(client, 'close');
        continue;
      }

      if (client.readyState !== WebSocket.OPEN) {
        continue;
      }

      const lastSeen = this.lastPongAt.get(client) || 0;
      if (now - lastSeen > this.staleConnectionMs) {
        this.deps.log('WS_CLIENT_STALE_CLOSE', {
          staleForMs: now - lastSeen,
        });
        try {
          client.terminate();
        } finally {
          this.cleanupClient(client, 'stale');
        }
        continue;
      }

      try {
        client.ping();
      } catch {
        this.cleanupClient(client, 'error');
      }
    }
  }

  private cleanupClient(client: BroadcastClient, reason: LifecycleReason, detail: Record<string, unknown> = {}): void {
    if (!this.clients.has(client)) {
      return;
    }

    this.clients.delete(client);
    this.clientSubs.delete(client);
    this.lastPongAt.delete(client);

    this.deps.log('WS_CLIENT_LEAVE', {
      reason,
      activeClients: this.clients.size,
      ...detail,
    });
  }

  private normalizeMarkets(markets: string[]): string[] {
    const normalized = new Set<string>();
    for (const raw of markets) {
      const market = String(raw || '').trim().toUpperCase();
      if (market) {
        normalized.add(market);
      }
    }
    return [...normalized];
  }
}
