import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { EventJournal } from '../journal/EventJournal';
import type { MarginEvent } from '../margin/types';

const DAY_MS = 86_400_000;

export async function runTests() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'margin-journal-'));
  try {
    const journal = new EventJournal({ dir: path.join(dir, 'events') });

    const events: MarginEvent[] = [
      { type: 'LIQUIDITY_POOL_CREATED', asset: 'USDH', sequence: 1, timestampMs: 1_000 },
      { type: 'LIQUIDITY_ADDED', asset: 'USDH', amount: 500n, totalLiquidity: 500n, sequence: 2, timestampMs: 2_000 },
      { type: 'PRICE_FEED_CREATED', symbol: 'BTC-PERP', sequence: 3, timestampMs: DAY_MS + 5 },
    ];
    await journal.publish(events);
    await journal.publish([{ type: 'MARKET_PAUSE_CHANGED', symbol: 'BTC-PERP', paused: true, sequence: 4, timestampMs: DAY_MS + 6 }]);

    assert.equal(journal.getWrittenCount(), 4);
    assert.equal(journal.fileFor(0), path.join(dir, 'events', 'margin-events-1970-01-01.jsonl'));

    const firstDay = fs.readFileSync(journal.fileFor(0), 'utf8').trim().split('\n');
    assert.deepEqual(firstDay.map((line) => JSON.parse(line)), [
      { type: 'LIQUIDITY_POOL_CREATED', asset: 'USDH', sequence: 1, timestampMs: 1_000 },
      { type: 'LIQUIDITY_ADDED', asset: 'USDH', amount: '500', totalLiquidity: '500', sequence: 2, timestampMs: 2_000 },
    ]);

    const secondDay = fs.readFileSync(journal.fileFor(DAY_MS), 'utf8').trim().split('\n');
    assert.equal(secondDay.length, 2);
    assert.equal(JSON.parse(secondDay[1]).sequence, 4);

    const prefixed = new EventJournal({ dir, filePrefix: 'audit' });
    assert.equal(path.basename(prefixed.fileFor(DAY_MS * 2)), 'audit-1970-01-03.jsonl');
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
