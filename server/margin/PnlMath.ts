import { fail } from './errors';
import type { Direction, PnlResult, Position } from './types';
import { type U64, mulDiv, narrow, u128Add, u128Mul, u64Add, u64Sub, u64SubSaturating } from './U64Math';

export interface LiquidationAssessment {
  pnl: PnlResult;
  maintenanceMargin: U64;
  bankrupt: boolean;
  eligible: boolean;
  /** Collateral left after the loss; zero when bankrupt. */
  remaining: U64;
}

/**
 * Profit or loss magnitude of `size` notional moved from `entryPrice` to `exitPrice`:
 * `size * |exit - entry| / entry`. Equal prices report a zero loss.
 */
export function computePnl(size: U64, entryPrice: U64, exitPrice: U64, direction: Direction): PnlResult {
  if (entryPrice === 0n) {
    fail('InvalidPrice', 'entry_price_zero');
  }

  let isProfit: boolean;
  let diff: U64;
  if (direction === 'LONG') {
    isProfit = exitPrice > entryPrice;
    diff = isProfit ? exitPrice - entryPrice : entryPrice - exitPrice;
  } else {
    isProfit = exitPrice < entryPrice;
    diff = isProfit ? entryPrice - exitPrice : exitPrice - entryPrice;
  }

  return { pnl: mulDiv(size, diff, entryPrice, 'pnl'), isProfit };
}

/** Percentage-of-notional margin derived from the leverage cap: leverage 10 -> 10%. */
export function maintenanceMargin(size: U64, leverage: number): U64 {
  if (!Number.isInteger(leverage) || leverage <= 0) {
    fail('InvalidLeverage', `invalid_leverage:${leverage}`);
  }
  const marginPct = 100n / BigInt(leverage);
  return mulDiv(size, marginPct, 100n, 'maintenance_margin');
}

export function isWithinLeverage(collateral: U64, leverage: number, size: U64): boolean {
  return u128Mul(collateral, BigInt(leverage)) >= size;
}

/** Amount handed back on close; a loss at or beyond the collateral returns zero. */
export function closeReturnAmount(collateral: U64, result: PnlResult): U64 {
  return result.isProfit
    ? u64Add(collateral, result.pnl, 'return_amount')
    : u64SubSaturating(collateral, result.pnl);
}

export function weightedEntryPrice(oldEntry: U64, oldSize: U64, price: U64, addedSize: U64): U64 {
  const newSize = u64Add(oldSize, addedSize, 'position_size');
  if (newSize === 0n) {
    fail('InvalidSize', 'merged_size_zero');
  }
  const weighted = u128Add(u128Mul(oldEntry, oldSize), u128Mul(price, addedSize), 'weighted_entry');
  return narrow(weighted / newSize, 'weighted_entry');
}

export function assessLiquidation(position: Position, exitPrice: U64, leverage: number): LiquidationAssessment {
  const pnl = computePnl(position.size, position.entryPrice, exitPrice, position.direction);
  const margin = maintenanceMargin(position.size, leverage);

  if (pnl.isProfit) {
    return { pnl, maintenanceMargin: margin, bankrupt: false, eligible: false, remaining: position.collateralAmount };
  }

  if (pnl.pnl >= position.collateralAmount) {
    return { pnl, maintenanceMargin: margin, bankrupt: true, eligible: true, remaining: 0n };
  }

  const remaining = u64Sub(position.collateralAmount, pnl.pnl, 'remaining_collateral');
  return { pnl, maintenanceMargin: margin, bankrupt: false, eligible: remaining < margin, remaining };
}
