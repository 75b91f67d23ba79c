import { fail } from './errors';
import type { Transaction } from './Transaction';
import type { AccountId, MarketSnapshot, Position } from './types';
import { U8_MAX, type U64, u64Add } from './U64Math';

export function assertLeverage(leverage: number): number {
  if (!Number.isInteger(leverage) || leverage < 1 || leverage > U8_MAX) {
    fail('InvalidLeverage', `invalid_leverage:${leverage}`, { min: 1, max: U8_MAX });
  }
  return leverage;
}

/** Per-instrument configuration plus the table of open positions, at most one per account. */
export class Market {
  private leverage: number;
  private paused = false;
  private readonly positions = new Map<AccountId, Position>();

  constructor(
    readonly symbol: string,
    readonly asset: string,
    leverage: number
  ) {
    this.leverage = assertLeverage(leverage);
  }

  getLeverage(): number {
    return this.leverage;
  }

  isPaused(): boolean {
    return this.paused;
  }

  assertNotPaused(): void {
    if (this.paused) {
      fail('MarketPaused', `market_paused:${this.symbol}`);
    }
  }

  getPosition(owner: AccountId): Position | null {
    const position = this.positions.get(owner);
    return position ? { ...position } : null;
  }

  listPositions(): Position[] {
    return [...this.positions.values()]
      .map((p) => ({ ...p }))
      .sort((a, b) => a.owner.localeCompare(b.owner));
  }

  snapshot(): MarketSnapshot {
    let totalCollateral: U64 = 0n;
    for (const position of this.positions.values()) {
      totalCollateral = u64Add(totalCollateral, position.collateralAmount, 'total_collateral');
    }
    return {
      symbol: this.symbol,
      asset: this.asset,
      leverage: this.leverage,
      isPaused: this.paused,
      openPositions: this.positions.size,
      totalCollateral,
    };
  }

  insertPosition(tx: Transaction, position: Position): void {
    if (this.positions.has(position.owner)) {
      fail('AlreadyExists', `position_exists:${position.owner}`);
    }
    tx.onRollback(() => {
      this.positions.delete(position.owner);
    });
    this.positions.set(position.owner, { ...position });
  }

  replacePosition(tx: Transaction, position: Position): void {
    const previous = this.positions.get(position.owner);
    if (!previous) {
      fail('PositionNotFound', `position_not_found:${position.owner}`);
    }
    tx.onRollback(() => {
      this.positions.set(previous.owner, previous);
    });
    this.positions.set(position.owner, { ...position });
  }

  /** Removes and returns the entry; the removal is undone if the call later aborts. */
  extractPosition(tx: Transaction, owner: AccountId): Position {
    const position = this.positions.get(owner);
    if (!position) {
      fail('PositionNotFound', `position_not_found:${owner}`, { symbol: this.symbol, owner });
    }
    tx.onRollback(() => {
      this.positions.set(owner, position);
    });
    this.positions.delete(owner);
    return { ...position };
  }

  setPaused(tx: Transaction, paused: boolean): void {
    const previous = this.paused;
    tx.onRollback(() => {
      this.paused = previous;
    });
    this.paused = paused;
    tx.emit({ type: 'MARKET_PAUSE_CHANGED', symbol: this.symbol, paused });
  }

  editLeverage(tx: Transaction, leverage: number): void {
    assertLeverage(leverage);
    const previous = this.leverage;
    tx.onRollback(() => {
      this.leverage = previous;
    });
    this.leverage = leverage;
    tx.emit({ type: 'MARKET_LEVERAGE_CHANGED', symbol: this.symbol, previousLeverage: previous, leverage });
  }
}
