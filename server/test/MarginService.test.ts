import assert from 'node:assert/strict';

import type { MarginEvent, MarginEventSink } from '../margin/types';
import { MarginService } from '../service/MarginService';
import { ALICE, BOB, LP, type LogEntry, SYMBOL, assertRejectsWithCode, createLedgerFixture, recordingLogger } from './helpers';

class RecordingSink implements MarginEventSink {
  readonly events: MarginEvent[] = [];
  readonly trace: string[] = [];

  async publish(events: MarginEvent[]): Promise<void> {
    this.trace.push(`start:${events[0].sequence}`);
    await new Promise<void>((resolve) => setImmediate(resolve));
    this.events.push(...events);
    this.trace.push(`end:${events[0].sequence}`);
  }
}

class BrokenSink implements MarginEventSink {
  publish(): Promise<void> {
    return Promise.reject(new Error('disk_full'));
  }
}

export async function runTests() {
  const { ledger } = createLedgerFixture();
  const entries: LogEntry[] = [];
  const sink = new RecordingSink();
  const service = new MarginService({ ledger, sinks: [new BrokenSink(), sink], logger: recordingLogger(entries) });

  // Concurrent calls commit and publish one at a time, in arrival order
  const [aliceOpen, bobOpen, aliceClose] = await Promise.all([
    service.openPosition(ALICE, SYMBOL, { size: 5000n, direction: 'LONG', collateral: 1000n }),
    service.openPosition(BOB, SYMBOL, { size: 2000n, direction: 'SHORT', collateral: 400n }),
    service.closePosition(ALICE, SYMBOL),
  ]);
  assert.equal(aliceOpen.position.collateralAmount, 1000n);
  assert.equal(bobOpen.position.direction, 'SHORT');
  assert.equal(aliceClose.payout.value, 1000n);

  assert.deepEqual(sink.events.map((e) => e.sequence), [6, 7, 8]);
  assert.deepEqual(sink.events.map((e) => e.type), ['POSITION_OPENED', 'POSITION_OPENED', 'POSITION_CLOSED']);
  assert.deepEqual(sink.trace, ['start:6', 'end:6', 'start:7', 'end:7', 'start:8', 'end:8']);

  // A failing sink is logged and does not block the others
  const sinkFailures = entries.filter((e) => e.event === 'EVENT_SINK_FAILED');
  assert.equal(sinkFailures.length, 3);
  assert.equal(sinkFailures[0].level, 'error');
  assert.equal(sinkFailures[0].context?.sink, 'BrokenSink');
  assert.deepEqual(sinkFailures[0].context?.sequences, [6]);

  const committed = entries.filter((e) => e.event === 'MARGIN_EVENT');
  assert.equal(committed.length, 3);
  assert.equal(committed[0].context?.operation, 'open_position');
  assert.equal(committed[0].context?.account, 'alice');

  // Rejections are logged, rethrown and publish nothing
  await assertRejectsWithCode(service.addLiquidity(ALICE, 'USDH', 1n), 'Unauthorized');
  await assertRejectsWithCode(service.closePosition(ALICE, SYMBOL), 'PositionNotFound');
  const rejected = entries.filter((e) => e.event === 'MARGIN_CALL_REJECTED');
  assert.deepEqual(rejected.map((e) => [e.level, e.context?.operation, e.context?.code]), [
    ['warn', 'add_liquidity', 'Unauthorized'],
    ['warn', 'close_position', 'PositionNotFound'],
  ]);
  assert.equal(sink.events.length, 3);

  // The lock is released after a rejection
  const pool = await service.addLiquidity(LP, 'usdh', 10n);
  assert.equal(pool.balance, 1_000_410n);
  assert.equal(sink.events[3].sequence, 9);

  // Reads bypass the lock
  assert.equal(service.describeMarket(SYMBOL).openPositions, 1);
  assert.deepEqual(service.getPrice(SYMBOL), { price: 1_000_000n, lastUpdatedMs: 1_000 });
  assert.equal(service.isPaused(SYMBOL), false);
  assert.deepEqual(service.rolesOf('lp'), ['LIQUIDITY_PROVIDER']);
  assert.equal(service.overview().pools.length, 1);
}
