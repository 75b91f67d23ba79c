import { type CapabilityHolders, CapabilityRegistry } from './Capabilities';
import type { Clock } from './Clock';
import { fail } from './errors';
import { LiquidityPool } from './LiquidityPool';
import { Market } from './Market';
import {
  type ClosePositionResult,
  type LiquidationResult,
  type MarketContext,
  type OpenPositionResult,
  closePosition,
  liquidatePosition,
  openPosition,
} from './PositionEngine';
import { PriceFeed } from './PriceFeed';
import { Transaction } from './Transaction';
import type {
  AccountId,
  Caller,
  Coin,
  Direction,
  MarginEvent,
  MarketSnapshot,
  PoolSnapshot,
  Position,
  PriceFeedSnapshot,
  PriceReading,
  Role,
} from './types';
import type { U64 } from './U64Math';

export interface MarginLedgerOptions {
  capabilityHolders: CapabilityHolders;
  clock: Clock;
}

export interface LedgerResult<T> {
  value: T;
  events: MarginEvent[];
}

export interface CreateMarketInput {
  symbol: string;
  asset: string;
  leverage: number;
}

export interface OpenPositionRequest {
  size: U64;
  direction: Direction;
  collateral: Coin;
}

export function normalizeSymbol(symbol: string): string {
  return String(symbol || '').trim().toUpperCase();
}

function normalizeCoin(coin: Coin): Coin {
  return { asset: normalizeSymbol(coin.asset), value: coin.value };
}

function requireIdentifier(raw: string, label: string): string {
  const value = normalizeSymbol(raw);
  if (!value) {
    fail('InvalidRequest', `${label}_required`);
  }
  return value;
}

/**
 * Owns every pool, market and price feed. Each mutating entry point checks
 * the caller's capability, runs inside its own transaction and either
 * commits all of its effects or none of them.
 */
export class MarginLedger {
  private readonly pools = new Map<string, LiquidityPool>();
  private readonly markets = new Map<string, Market>();
  private readonly feeds = new Map<string, PriceFeed>();
  private readonly capabilities: CapabilityRegistry;
  private readonly clock: Clock;
  private sequence = 0;

  constructor(options: MarginLedgerOptions) {
    this.capabilities = new CapabilityRegistry(options.capabilityHolders);
    this.clock = options.clock;
  }

  // ---------------------------------------------------------------------------
  // Object creation
  // ---------------------------------------------------------------------------

  createLiquidityPool(caller: Caller, rawAsset: string): LedgerResult<PoolSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ADMIN');
      const asset = requireIdentifier(rawAsset, 'asset');
      if (this.pools.has(asset)) {
        fail('AlreadyExists', `pool_exists:${asset}`);
      }
      const pool = new LiquidityPool(asset);
      this.pools.set(asset, pool);
      tx.onRollback(() => {
        this.pools.delete(asset);
      });
      tx.emit({ type: 'LIQUIDITY_POOL_CREATED', asset });
      return pool.snapshot();
    });
  }

  createMarket(caller: Caller, input: CreateMarketInput): LedgerResult<MarketSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ADMIN');
      const symbol = requireIdentifier(input.symbol, 'symbol');
      const asset = requireIdentifier(input.asset, 'asset');
      if (this.markets.has(symbol)) {
        fail('AlreadyExists', `market_exists:${symbol}`);
      }
      const market = new Market(symbol, asset, input.leverage);
      this.markets.set(symbol, market);
      tx.onRollback(() => {
        this.markets.delete(symbol);
      });
      tx.emit({ type: 'MARKET_CREATED', symbol, asset, leverage: market.getLeverage() });
      return market.snapshot();
    });
  }

  createPriceFeed(caller: Caller, rawSymbol: string): LedgerResult<PriceFeedSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ORACLE_OPERATOR');
      const symbol = requireIdentifier(rawSymbol, 'symbol');
      if (this.feeds.has(symbol)) {
        fail('AlreadyExists', `price_feed_exists:${symbol}`);
      }
      const feed = new PriceFeed(symbol);
      this.feeds.set(symbol, feed);
      tx.onRollback(() => {
        this.feeds.delete(symbol);
      });
      tx.emit({ type: 'PRICE_FEED_CREATED', symbol });
      return feed.snapshot();
    });
  }

  // ---------------------------------------------------------------------------
  // Liquidity (not gated by any market's pause flag)
  // ---------------------------------------------------------------------------

  addLiquidity(caller: Caller, asset: string, coin: Coin): LedgerResult<PoolSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'LIQUIDITY_PROVIDER');
      const pool = this.requirePool(asset);
      pool.addLiquidity(tx, normalizeCoin(coin));
      return pool.snapshot();
    });
  }

  removeLiquidity(caller: Caller, asset: string, amount: U64): LedgerResult<Coin> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'LIQUIDITY_PROVIDER');
      return this.requirePool(asset).removeLiquidity(tx, amount);
    });
  }

  // ---------------------------------------------------------------------------
  // Positions
  // ---------------------------------------------------------------------------

  openPosition(caller: Caller, symbol: string, request: OpenPositionRequest): LedgerResult<OpenPositionResult> {
    return this.execute((tx) =>
      openPosition(this.resolveContext(symbol, tx), {
        owner: caller.account,
        size: request.size,
        direction: request.direction,
        collateral: normalizeCoin(request.collateral),
      })
    );
  }

  closePosition(caller: Caller, symbol: string): LedgerResult<ClosePositionResult> {
    return this.execute((tx) => closePosition(this.resolveContext(symbol, tx), caller.account));
  }

  liquidate(caller: Caller, symbol: string, owner: AccountId): LedgerResult<LiquidationResult> {
    return this.execute((tx) => liquidatePosition(this.resolveContext(symbol, tx), caller.account, owner));
  }

  // ---------------------------------------------------------------------------
  // Admin and oracle
  // ---------------------------------------------------------------------------

  setPaused(caller: Caller, symbol: string, paused: boolean): LedgerResult<MarketSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ADMIN');
      const market = this.requireMarket(symbol);
      market.setPaused(tx, paused);
      return market.snapshot();
    });
  }

  editMarketLeverage(caller: Caller, symbol: string, leverage: number): LedgerResult<MarketSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ADMIN');
      const market = this.requireMarket(symbol);
      market.editLeverage(tx, leverage);
      return market.snapshot();
    });
  }

  updatePrice(caller: Caller, symbol: string, price: U64): LedgerResult<PriceFeedSnapshot> {
    return this.execute((tx) => {
      this.capabilities.assertRole(caller, 'ORACLE_OPERATOR');
      const feed = this.requireFeed(symbol);
      feed.updatePrice(tx, price, tx.timestampMs);
      return feed.snapshot();
    });
  }

  transferCapability(caller: Caller, role: Role, to: AccountId): LedgerResult<CapabilityHolders> {
    return this.execute((tx) => {
      this.capabilities.transfer(tx, caller, role, to);
      return this.capabilities.snapshot();
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getPrice(symbol: string): PriceReading {
    return this.requireFeed(symbol).getPrice();
  }

  isPaused(symbol: string): boolean {
    return this.requireMarket(symbol).isPaused();
  }

  describeMarket(symbol: string): MarketSnapshot {
    return this.requireMarket(symbol).snapshot();
  }

  describePool(asset: string): PoolSnapshot {
    return this.requirePool(asset).snapshot();
  }

  describeFeed(symbol: string): PriceFeedSnapshot {
    return this.requireFeed(symbol).snapshot();
  }

  getPosition(symbol: string, owner: AccountId): Position {
    const position = this.requireMarket(symbol).getPosition(owner);
    if (!position) {
      fail('PositionNotFound', `position_not_found:${owner}`, { symbol: normalizeSymbol(symbol), owner });
    }
    return position;
  }

  listPositions(symbol: string): Position[] {
    return this.requireMarket(symbol).listPositions();
  }

  listMarkets(): MarketSnapshot[] {
    return [...this.markets.values()].map((m) => m.snapshot());
  }

  listPools(): PoolSnapshot[] {
    return [...this.pools.values()].map((p) => p.snapshot());
  }

  listFeeds(): PriceFeedSnapshot[] {
    return [...this.feeds.values()].map((f) => f.snapshot());
  }

  capabilityHolders(): CapabilityHolders {
    return this.capabilities.snapshot();
  }

  rolesOf(account: AccountId): Role[] {
    return this.capabilities.rolesOf(account);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private execute<T>(body: (tx: Transaction) => T): LedgerResult<T> {
    const tx = new Transaction(this.clock.nowMs());
    let value: T;
    try {
      value = body(tx);
    } catch (error) {
      tx.rollback();
      throw error;
    }
    const events = tx.commit(() => {
      this.sequence += 1;
      return this.sequence;
    });
    return { value, events };
  }

  private resolveContext(symbol: string, tx: Transaction): MarketContext {
    const market = this.requireMarket(symbol);
    return {
      market,
      pool: this.requirePool(market.asset),
      feed: this.requireFeed(market.symbol),
      tx,
    };
  }

  private requireMarket(symbol: string): Market {
    const market = this.markets.get(normalizeSymbol(symbol));
    if (!market) {
      fail('MarketNotFound', `market_not_found:${normalizeSymbol(symbol)}`);
    }
    return market;
  }

  private requirePool(asset: string): LiquidityPool {
    const pool = this.pools.get(normalizeSymbol(asset));
    if (!pool) {
      fail('PoolNotFound', `pool_not_found:${normalizeSymbol(asset)}`);
    }
    return pool;
  }

  private requireFeed(symbol: string): PriceFeed {
    const feed = this.feeds.get(normalizeSymbol(symbol));
    if (!feed) {
      fail('PriceFeedNotFound', `price_feed_not_found:${normalizeSymbol(symbol)}`);
    }
    return feed;
  }
}
