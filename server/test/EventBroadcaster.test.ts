import assert from 'node:assert/strict';
import { WebSocket } from 'ws';

import type { MarginEvent } from '../margin/types';
import { type BroadcastClient, EventBroadcaster } from '../ws/EventBroadcaster';

class FakeClient implements BroadcastClient {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  pings = 0;
  failSends = false;

  send(data: string): void {
    if (this.failSends) {
      throw new Error('socket_write_failed');
    }
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }

  terminate(): void {
    this.readyState = WebSocket.CLOSED;
  }
}

const priceEvent: MarginEvent = {
  type: 'PRICE_UPDATED',
  symbol: 'BTC-PERP',
  price: 1_000_000n,
  updatedAtMs: 1_000,
  sequence: 7,
  timestampMs: 1_000,
};

const poolEvent: MarginEvent = {
  type: 'LIQUIDITY_ADDED',
  asset: 'USDH',
  amount: 10n,
  totalLiquidity: 10n,
  sequence: 8,
  timestampMs: 1_000,
};

export function runTests() {
  let now = 0;
  const logs: string[] = [];
  const broadcaster = new EventBroadcaster({
    log: (event) => logs.push(event),
    heartbeatIntervalMs: 1_000,
    staleConnectionMs: 5_000,
    maxSubscriptionsPerClient: 2,
    now: () => now,
  });

  try {
    const btc = new FakeClient();
    const everything = new FakeClient();
    const eth = new FakeClient();
    const capped = new FakeClient();

    assert.deepEqual(broadcaster.registerClient(btc, [' btc-perp ', 'BTC-PERP']), ['BTC-PERP']);
    assert.deepEqual(broadcaster.registerClient(everything, ['']), ['*']);
    assert.deepEqual(broadcaster.registerClient(eth, ['ETH-PERP']), ['ETH-PERP']);
    assert.deepEqual(broadcaster.registerClient(capped, ['A', 'B', 'C']), ['A', 'B']);
    assert.equal(broadcaster.getClientCount(), 4);

    assert.equal(broadcaster.broadcast(priceEvent), 2);
    assert.deepEqual(JSON.parse(btc.sent[0]), {
      type: 'margin_event',
      event: { type: 'PRICE_UPDATED', symbol: 'BTC-PERP', price: '1000000', updatedAtMs: 1_000, sequence: 7, timestampMs: 1_000 },
    });
    assert.equal(eth.sent.length, 0);

    // Records without a market reach every client
    assert.equal(broadcaster.broadcast(poolEvent), 4);

    // Non-open sockets are skipped
    eth.readyState = WebSocket.CONNECTING;
    broadcaster.publish([poolEvent]);
    assert.equal(eth.sent.length, 1);
    eth.readyState = WebSocket.OPEN;

    // A failing send drops the client
    capped.failSends = true;
    assert.equal(broadcaster.broadcast(poolEvent), 3);
    assert.equal(broadcaster.getClientCount(), 3);
    assert.ok(logs.includes('WS_CLIENT_SEND_ERROR'));

    // Heartbeat: ping live clients, drop the ones that stopped answering
    now = 1_000;
    broadcaster.heartbeatSweep();
    assert.equal(btc.pings, 1);

    now = 5_500;
    broadcaster.markAlive(btc);
    now = 6_000;
    broadcaster.heartbeatSweep();
    assert.equal(btc.pings, 2);
    assert.equal(everything.readyState, WebSocket.CLOSED);
    assert.equal(broadcaster.getClientCount(), 1);

    broadcaster.removeClient(btc, 'close');
    assert.equal(broadcaster.getClientCount(), 0);
    assert.equal(broadcaster.broadcast(poolEvent), 0);
  } finally {
    broadcaster.shutdown();
  }
}
