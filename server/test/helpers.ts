import assert from 'node:assert/strict';

import { ManualClock } from '../margin/Clock';
import { type MarginErrorCode, isMarginEngineError } from '../margin/errors';
import { MarginLedger } from '../margin/MarginLedger';
import type { Caller, Coin } from '../margin/types';
import type { Logger } from '../utils/logger';

export const ADMIN: Caller = { account: 'admin' };
export const LP: Caller = { account: 'lp' };
export const ORACLE: Caller = { account: 'oracle' };
export const ALICE: Caller = { account: 'alice' };
export const BOB: Caller = { account: 'bob' };
export const KEEPER: Caller = { account: 'keeper' };

export const SYMBOL = 'BTC-PERP';
export const ASSET = 'USDH';

export function usdh(value: bigint): Coin {
  return { asset: ASSET, value };
}

export function assertMarginError(fn: () => unknown, code: MarginErrorCode, message?: string): void {
  assert.throws(fn, (error: unknown) => isMarginEngineError(error) && error.code === code, message ?? `expected ${code}`);
}

export async function assertRejectsWithCode(promise: Promise<unknown>, code: MarginErrorCode, message?: string): Promise<void> {
  await assert.rejects(promise, (error: unknown) => isMarginEngineError(error) && error.code === code, message ?? `expected ${code}`);
}

export interface LedgerFixture {
  clock: ManualClock;
  ledger: MarginLedger;
  /** Advances the clock one second and pushes a new oracle price. */
  movePrice: (price: bigint) => void;
}

/**
 * USDH pool, BTC-PERP market and feed. Liquidity and the opening price are
 * committed at t=1000 unless set to zero.
 */
export function createLedgerFixture(options: { leverage?: number; liquidity?: bigint; price?: bigint } = {}): LedgerFixture {
  const leverage = options.leverage ?? 10;
  const liquidity = options.liquidity ?? 1_000_000n;
  const price = options.price ?? 1_000_000n;

  const clock = new ManualClock(1_000);
  const ledger = new MarginLedger({
    capabilityHolders: { ADMIN: 'admin', LIQUIDITY_PROVIDER: 'lp', ORACLE_OPERATOR: 'oracle' },
    clock,
  });
  ledger.createLiquidityPool(ADMIN, ASSET);
  ledger.createMarket(ADMIN, { symbol: SYMBOL, asset: ASSET, leverage });
  ledger.createPriceFeed(ORACLE, SYMBOL);
  if (liquidity > 0n) {
    ledger.addLiquidity(LP, ASSET, usdh(liquidity));
  }
  if (price > 0n) {
    ledger.updatePrice(ORACLE, SYMBOL, price);
  }

  return {
    clock,
    ledger,
    movePrice: (next: bigint) => {
      clock.advance(1_000);
      ledger.updatePrice(ORACLE, SYMBOL, next);
    },
  };
}

export type LogEntry = { level: string; event: string; context?: Record<string, unknown> };

export function recordingLogger(entries: LogEntry[]): Logger {
  return {
    debug: (event, context) => { entries.push({ level: 'debug', event, context }); },
    info: (event, context) => { entries.push({ level: 'info', event, context }); },
    warn: (event, context) => { entries.push({ level: 'warn', event, context }); },
    error: (event, context) => { entries.push({ level: 'error', event, context }); },
  };
}
