import { Mutex } from 'async-mutex';

import type { CapabilityHolders } from '../margin/Capabilities';
import { isMarginEngineError } from '../margin/errors';
import type { CreateMarketInput, LedgerResult, MarginLedger } from '../margin/MarginLedger';
import type { ClosePositionResult, LiquidationResult, OpenPositionResult } from '../margin/PositionEngine';
import type {
  AccountId,
  Caller,
  Coin,
  Direction,
  MarginEvent,
  MarginEventSink,
  MarketSnapshot,
  PoolSnapshot,
  Position,
  PriceFeedSnapshot,
  PriceReading,
  Role,
} from '../margin/types';
import { type Logger, logger as defaultLogger, serializeError } from '../utils/logger';

export interface MarginServiceDeps {
  ledger: MarginLedger;
  sinks?: MarginEventSink[];
  logger?: Logger;
}

export interface OpenPositionCommand {
  size: bigint;
  direction: Direction;
  collateral: bigint;
}

/**
 * Single-writer facade over the ledger. Every mutating call runs under one
 * mutex, and committed records reach the sinks before the lock is released.
 * Reads go straight to the ledger and never wait on the lock.
 */
export class MarginService {
  private readonly mutex = new Mutex();
  private readonly ledger: MarginLedger;
  private readonly sinks: MarginEventSink[];
  private readonly log: Logger;

  constructor(deps: MarginServiceDeps) {
    this.ledger = deps.ledger;
    this.sinks = deps.sinks ?? [];
    this.log = deps.logger ?? defaultLogger;
  }

  createLiquidityPool(caller: Caller, asset: string): Promise<PoolSnapshot> {
    return this.run('create_liquidity_pool', caller, (l) => l.createLiquidityPool(caller, asset));
  }

  createMarket(caller: Caller, input: CreateMarketInput): Promise<MarketSnapshot> {
    return this.run('create_market', caller, (l) => l.createMarket(caller, input));
  }

  createPriceFeed(caller: Caller, symbol: string): Promise<PriceFeedSnapshot> {
    return this.run('create_price_feed', caller, (l) => l.createPriceFeed(caller, symbol));
  }

  addLiquidity(caller: Caller, asset: string, amount: bigint): Promise<PoolSnapshot> {
    const coin: Coin = { asset, value: amount };
    return this.run('add_liquidity', caller, (l) => l.addLiquidity(caller, asset, coin));
  }

  removeLiquidity(caller: Caller, asset: string, amount: bigint): Promise<Coin> {
    return this.run('remove_liquidity', caller, (l) => l.removeLiquidity(caller, asset, amount));
  }

  openPosition(caller: Caller, symbol: string, command: OpenPositionCommand): Promise<OpenPositionResult> {
    return this.run('open_position', caller, (l) => {
      const { asset } = l.describeMarket(symbol);
      return l.openPosition(caller, symbol, {
        size: command.size,
        direction: command.direction,
        collateral: { asset, value: command.collateral },
      });
    });
  }

  closePosition(caller: Caller, symbol: string): Promise<ClosePositionResult> {
    return this.run('close_position', caller, (l) => l.closePosition(caller, symbol));
  }

  liquidate(caller: Caller, symbol: string, owner: AccountId): Promise<LiquidationResult> {
    return this.run('liquidate', caller, (l) => l.liquidate(caller, symbol, owner));
  }

  setPaused(caller: Caller, symbol: string, paused: boolean): Promise<MarketSnapshot> {
    return this.run('set_paused', caller, (l) => l.setPaused(caller, symbol, paused));
  }

  editMarketLeverage(caller: Caller, symbol: string, leverage: number): Promise<MarketSnapshot> {
    return this.run('edit_market_leverage', caller, (l) => l.editMarketLeverage(caller, symbol, leverage));
  }

  updatePrice(caller: Caller, symbol: string, price: bigint): Promise<PriceFeedSnapshot> {
    return this.run('update_price', caller, (l) => l.updatePrice(caller, symbol, price));
  }

  transferCapability(caller: Caller, role: Role, to: AccountId): Promise<CapabilityHolders> {
    return this.run('transfer_capability', caller, (l) => l.transferCapability(caller, role, to));
  }

  getPrice(symbol: string): PriceReading {
    return this.ledger.getPrice(symbol);
  }

  isPaused(symbol: string): boolean {
    return this.ledger.isPaused(symbol);
  }

  describeMarket(symbol: string): MarketSnapshot {
    return this.ledger.describeMarket(symbol);
  }

  describePool(asset: string): PoolSnapshot {
    return this.ledger.describePool(asset);
  }

  describeFeed(symbol: string): PriceFeedSnapshot {
    return this.ledger.describeFeed(symbol);
  }

  getPosition(symbol: string, owner: AccountId): Position {
    return this.ledger.getPosition(symbol, owner);
  }

  listPositions(symbol: string): Position[] {
    return this.ledger.listPositions(symbol);
  }

  overview(): { markets: MarketSnapshot[]; pools: PoolSnapshot[]; feeds: PriceFeedSnapshot[]; capabilities: CapabilityHolders } {
    return {
      markets: this.ledger.listMarkets(),
      pools: this.ledger.listPools(),
      feeds: this.ledger.listFeeds(),
      capabilities: this.ledger.capabilityHolders(),
    };
  }

  rolesOf(account: AccountId): Role[] {
    return this.ledger.rolesOf(account);
  }

  private run<T>(operation: string, caller: Caller, call: (ledger: MarginLedger) => LedgerResult<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      let result: LedgerResult<T>;
      try {
        result = call(this.ledger);
      } catch (error) {
        if (isMarginEngineError(error)) {
          this.log.warn('MARGIN_CALL_REJECTED', {
            operation,
            account: caller.account,
            code: error.code,
            message: error.message,
            details: error.details,
          });
        } else {
          this.log.error('MARGIN_CALL_FAILED', {
            operation,
            account: caller.account,
            error: serializeError(error),
          });
        }
        throw error;
      }

      for (const event of result.events) {
        this.log.info('MARGIN_EVENT', { operation, account: caller.account, ...event });
      }
      await this.publish(result.events);
      return result.value;
    });
  }

  private async publish(events: MarginEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    for (const sink of this.sinks) {
      try {
        await sink.publish(events);
      } catch (error) {
        this.log.error('EVENT_SINK_FAILED', {
          sink: sink.constructor.name,
          sequences: events.map((e) => e.sequence),
          error: serializeError(error),
        });
      }
    }
  }
}
