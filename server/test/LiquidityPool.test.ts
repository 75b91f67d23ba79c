import assert from 'node:assert/strict';

import { LiquidityPool } from '../margin/LiquidityPool';
import { PriceFeed } from '../margin/PriceFeed';
import { Transaction } from '../margin/Transaction';
import { U64_MAX } from '../margin/U64Math';
import { assertMarginError, usdh } from './helpers';

function poolTests() {
  const pool = new LiquidityPool('USDH');

  const add = new Transaction(1);
  assert.equal(pool.addLiquidity(add, usdh(500n)), 500n);
  assert.deepEqual(add.commit(() => 1), [
    { type: 'LIQUIDITY_ADDED', asset: 'USDH', amount: 500n, totalLiquidity: 500n, sequence: 1, timestampMs: 1 },
  ]);

  assertMarginError(() => pool.addLiquidity(new Transaction(2), usdh(0n)), 'ZeroAmount');
  assertMarginError(() => pool.addLiquidity(new Transaction(2), { asset: 'OTHER', value: 1n }), 'AssetMismatch');
  assertMarginError(() => pool.removeLiquidity(new Transaction(2), 0n), 'ZeroAmount');
  assertMarginError(() => pool.removeLiquidity(new Transaction(2), 501n), 'InsufficientLiquidity');
  assertMarginError(() => pool.deposit(new Transaction(2), usdh(U64_MAX)), 'ArithmeticOverflow');
  assertMarginError(() => pool.addLiquidity(new Transaction(2), usdh(-5n)), 'ArithmeticOverflow');
  assertMarginError(() => pool.removeLiquidity(new Transaction(2), -5n), 'ArithmeticOverflow');
  assertMarginError(() => pool.withdraw(new Transaction(2), -1n), 'ArithmeticOverflow');
  assert.equal(pool.getBalance(), 500n);

  const remove = new Transaction(3);
  assert.deepEqual(pool.removeLiquidity(remove, 200n), usdh(200n));
  assert.equal(pool.getBalance(), 300n);
  remove.rollback();
  assert.equal(pool.getBalance(), 500n, 'rollback restores the balance');

  // The whole balance can be withdrawn
  const drain = new Transaction(4);
  pool.removeLiquidity(drain, 500n);
  drain.commit(() => 2);
  assert.deepEqual(pool.snapshot(), { asset: 'USDH', balance: 0n });
}

function feedTests() {
  const feed = new PriceFeed('BTC-PERP');
  assert.deepEqual(feed.getPrice(), { price: 0n, lastUpdatedMs: 0 });

  const first = new Transaction(1_000);
  feed.updatePrice(first, 1_000_000n, 1_000);
  assert.deepEqual(first.commit(() => 1), [
    { type: 'PRICE_UPDATED', symbol: 'BTC-PERP', price: 1_000_000n, updatedAtMs: 1_000, sequence: 1, timestampMs: 1_000 },
  ]);

  // Same timestamp is not stale
  feed.updatePrice(new Transaction(1_000), 1_100_000n, 1_000);
  assert.deepEqual(feed.getPrice(), { price: 1_100_000n, lastUpdatedMs: 1_000 });

  assertMarginError(() => feed.updatePrice(new Transaction(999), 1_200_000n, 999), 'StaleUpdate');
  assertMarginError(() => feed.updatePrice(new Transaction(2_000), 0n, 2_000), 'InvalidPrice');
  assert.deepEqual(feed.getPrice(), { price: 1_100_000n, lastUpdatedMs: 1_000 });

  const undone = new Transaction(5_000);
  feed.updatePrice(undone, 7n, 5_000);
  undone.rollback();
  assert.deepEqual(feed.snapshot(), { symbol: 'BTC-PERP', price: 1_100_000n, lastUpdatedMs: 1_000 });
}

export function runTests() {
  poolTests();
  feedTests();
}
