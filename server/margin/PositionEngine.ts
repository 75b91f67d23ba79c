import { fail } from './errors';
import type { LiquidityPool } from './LiquidityPool';
import type { Market } from './Market';
import {
  assessLiquidation,
  closeReturnAmount,
  computePnl,
  isWithinLeverage,
  weightedEntryPrice,
} from './PnlMath';
import type { PriceFeed } from './PriceFeed';
import type { Transaction } from './Transaction';
import type { AccountId, Coin, Direction, Position } from './types';
import { type U64, assertU64, u64Add } from './U64Math';

/** The market, its settlement pool and its oracle, resolved for one call. */
export interface MarketContext {
  market: Market;
  pool: LiquidityPool;
  feed: PriceFeed;
  tx: Transaction;
}

export interface OpenPositionInput {
  owner: AccountId;
  size: U64;
  direction: Direction;
  collateral: Coin;
}

export interface OpenPositionResult {
  position: Position;
  merged: boolean;
}

export interface ClosePositionResult {
  position: Position;
  exitPrice: U64;
  pnl: U64;
  isProfit: boolean;
  payout: Coin;
}

export interface LiquidationResult {
  position: Position;
  exitPrice: U64;
  loss: U64;
  reward: Coin;
}

export function isDirection(value: unknown): value is Direction {
  return value === 'LONG' || value === 'SHORT';
}

function readOraclePrice(feed: PriceFeed): U64 {
  const { price } = feed.getPrice();
  if (price === 0n) {
    fail('InvalidPrice', `oracle_price_unset:${feed.symbol}`);
  }
  return price;
}

export function openPosition(ctx: MarketContext, input: OpenPositionInput): OpenPositionResult {
  const { market, pool, feed, tx } = ctx;
  market.assertNotPaused();
  if (input.size === 0n) {
    fail('InvalidSize', 'size_zero');
  }
  assertU64(input.size, 'size');
  if (!isDirection(input.direction)) {
    fail('InvalidDirection', `invalid_direction:${String(input.direction)}`);
  }

  const price = readOraclePrice(feed);
  const leverage = market.getLeverage();
  const collateral = input.collateral.value;

  pool.deposit(tx, input.collateral);

  const existing = market.getPosition(input.owner);
  if (!existing) {
    if (collateral === 0n) {
      fail('InvalidCollateral', 'collateral_zero');
    }
    if (!isWithinLeverage(collateral, leverage, input.size)) {
      fail('InvalidCollateral', 'collateral_below_leverage_requirement', {
        size: input.size.toString(),
        collateral: collateral.toString(),
        leverage,
      });
    }

    const position: Position = {
      owner: input.owner,
      size: input.size,
      collateralAmount: collateral,
      entryPrice: price,
      direction: input.direction,
      openTimestampMs: tx.timestampMs,
    };
    market.insertPosition(tx, position);
    tx.emit({
      type: 'POSITION_OPENED',
      symbol: market.symbol,
      owner: position.owner,
      size: position.size,
      collateral: position.collateralAmount,
      entryPrice: position.entryPrice,
      direction: position.direction,
      openTimestampMs: position.openTimestampMs,
    });
    return { position, merged: false };
  }

  if (existing.direction !== input.direction) {
    fail('DirectionMismatch', `direction_mismatch:${existing.direction}!=${input.direction}`);
  }

  const size = u64Add(existing.size, input.size, 'position_size');
  const collateralAmount = u64Add(existing.collateralAmount, collateral, 'position_collateral');
  if (!isWithinLeverage(collateralAmount, leverage, size)) {
    fail('InvalidCollateral', 'collateral_below_leverage_requirement', {
      size: size.toString(),
      collateral: collateralAmount.toString(),
      leverage,
    });
  }

  const merged: Position = {
    ...existing,
    size,
    collateralAmount,
    entryPrice: weightedEntryPrice(existing.entryPrice, existing.size, price, input.size),
  };
  market.replacePosition(tx, merged);
  tx.emit({
    type: 'POSITION_UPDATED',
    symbol: market.symbol,
    owner: merged.owner,
    addedSize: input.size,
    addedCollateral: collateral,
    size: merged.size,
    collateral: merged.collateralAmount,
    entryPrice: merged.entryPrice,
    direction: merged.direction,
  });
  return { position: merged, merged: true };
}

export function closePosition(ctx: MarketContext, owner: AccountId): ClosePositionResult {
  const { market, pool, feed, tx } = ctx;
  market.assertNotPaused();
  const position = market.extractPosition(tx, owner);

  const exitPrice = readOraclePrice(feed);
  const { pnl, isProfit } = computePnl(position.size, position.entryPrice, exitPrice, position.direction);
  const returnAmount = closeReturnAmount(position.collateralAmount, { pnl, isProfit });

  const payout = pool.withdraw(tx, returnAmount);
  tx.emit({
    type: 'POSITION_CLOSED',
    symbol: market.symbol,
    owner,
    size: position.size,
    collateral: position.collateralAmount,
    entryPrice: position.entryPrice,
    exitPrice,
    pnl,
    isProfit,
    amountReturned: payout.value,
  });
  return { position, exitPrice, pnl, isProfit, payout };
}

/**
 * Keeper entry point. The liquidator receives the entire remaining
 * collateral of an under-margined position, or nothing when it is bankrupt.
 */
export function liquidatePosition(ctx: MarketContext, liquidator: AccountId, owner: AccountId): LiquidationResult {
  const { market, pool, feed, tx } = ctx;
  market.assertNotPaused();
  const current = market.getPosition(owner);
  if (!current) {
    fail('PositionNotFound', `position_not_found:${owner}`, { symbol: market.symbol, owner });
  }

  const exitPrice = readOraclePrice(feed);
  const assessment = assessLiquidation(current, exitPrice, market.getLeverage());
  if (assessment.pnl.isProfit) {
    fail('CannotLiquidate', 'position_in_profit', { owner });
  }
  if (!assessment.eligible) {
    fail('CannotLiquidate', 'position_above_maintenance_margin', {
      owner,
      remaining: assessment.remaining.toString(),
      maintenanceMargin: assessment.maintenanceMargin.toString(),
    });
  }

  const position = market.extractPosition(tx, owner);
  const reward = pool.withdraw(tx, assessment.bankrupt ? 0n : assessment.remaining);
  tx.emit({
    type: 'POSITION_LIQUIDATED',
    symbol: market.symbol,
    owner,
    liquidator,
    size: position.size,
    collateral: position.collateralAmount,
    loss: assessment.pnl.pnl,
    exitPrice,
    amountPaid: reward.value,
  });
  return { position, exitPrice, loss: assessment.pnl.pnl, reward };
}
