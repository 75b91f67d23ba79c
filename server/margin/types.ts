export type Direction = 'LONG' | 'SHORT';

export type Role = 'ADMIN' | 'LIQUIDITY_PROVIDER' | 'ORACLE_OPERATOR';

export const ROLES: readonly Role[] = ['ADMIN', 'LIQUIDITY_PROVIDER', 'ORACLE_OPERATOR'];

/** Account identifier of whoever issued the call. */
export type AccountId = string;

export interface Caller {
  account: AccountId;
}

/** A settlement-asset amount in transit; never held outside a pool or a position. */
export interface Coin {
  asset: string;
  value: bigint;
}

export interface Position {
  owner: AccountId;
  size: bigint;
  collateralAmount: bigint;
  entryPrice: bigint;
  direction: Direction;
  openTimestampMs: number;
}

export interface PriceReading {
  price: bigint;
  lastUpdatedMs: number;
}

export interface PnlResult {
  pnl: bigint;
  isProfit: boolean;
}

export interface MarketSnapshot {
  symbol: string;
  asset: string;
  leverage: number;
  isPaused: boolean;
  openPositions: number;
  totalCollateral: bigint;
}

export interface PoolSnapshot {
  asset: string;
  balance: bigint;
}

export interface PriceFeedSnapshot extends PriceReading {
  symbol: string;
}

type RecordBase = {
  sequence: number;
  timestampMs: number;
};

export type MarginEventPayload =
  | { type: 'LIQUIDITY_POOL_CREATED'; asset: string }
  | { type: 'MARKET_CREATED'; symbol: string; asset: string; leverage: number }
  | { type: 'PRICE_FEED_CREATED'; symbol: string }
  | { type: 'LIQUIDITY_ADDED'; asset: string; amount: bigint; totalLiquidity: bigint }
  | { type: 'LIQUIDITY_REMOVED'; asset: string; amount: bigint; totalLiquidity: bigint }
  | {
      type: 'POSITION_OPENED';
      symbol: string;
      owner: AccountId;
      size: bigint;
      collateral: bigint;
      entryPrice: bigint;
      direction: Direction;
      openTimestampMs: number;
    }
  | {
      type: 'POSITION_UPDATED';
      symbol: string;
      owner: AccountId;
      addedSize: bigint;
      addedCollateral: bigint;
      size: bigint;
      collateral: bigint;
      entryPrice: bigint;
      direction: Direction;
    }
  | {
      type: 'POSITION_CLOSED';
      symbol: string;
      owner: AccountId;
      size: bigint;
      collateral: bigint;
      entryPrice: bigint;
      exitPrice: bigint;
      pnl: bigint;
      isProfit: boolean;
      amountReturned: bigint;
    }
  | {
      type: 'POSITION_LIQUIDATED';
      symbol: string;
      owner: AccountId;
      liquidator: AccountId;
      size: bigint;
      collateral: bigint;
      loss: bigint;
      exitPrice: bigint;
      amountPaid: bigint;
    }
  | { type: 'MARKET_PAUSE_CHANGED'; symbol: string; paused: boolean }
  | { type: 'MARKET_LEVERAGE_CHANGED'; symbol: string; previousLeverage: number; leverage: number }
  | { type: 'PRICE_UPDATED'; symbol: string; price: bigint; updatedAtMs: number }
  | { type: 'CAPABILITY_TRANSFERRED'; role: Role; from: AccountId; to: AccountId };

export type MarginEventType = MarginEventPayload['type'];

export type MarginEvent = RecordBase & MarginEventPayload;

export interface MarginEventSink {
  publish(events: MarginEvent[]): void | Promise<void>;
}
