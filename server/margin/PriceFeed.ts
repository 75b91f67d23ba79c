import { fail } from './errors';
import type { Transaction } from './Transaction';
import type { PriceFeedSnapshot, PriceReading } from './types';
import { type U64, assertU64 } from './U64Math';

export class PriceFeed {
  private price: U64 = 0n;
  private lastUpdatedMs = 0;

  constructor(readonly symbol: string) {}

  getPrice(): PriceReading {
    return { price: this.price, lastUpdatedMs: this.lastUpdatedMs };
  }

  snapshot(): PriceFeedSnapshot {
    return { symbol: this.symbol, ...this.getPrice() };
  }

  /** Rejects zero prices and any write older than the stored timestamp. Equal timestamps are accepted. */
  updatePrice(tx: Transaction, newPrice: U64, currentTimeMs: number): void {
    assertU64(newPrice, 'price');
    if (newPrice === 0n) {
      fail('InvalidPrice', 'price_zero');
    }
    if (currentTimeMs < this.lastUpdatedMs) {
      fail('StaleUpdate', `stale_price_update:${currentTimeMs}<${this.lastUpdatedMs}`, {
        symbol: this.symbol,
        lastUpdatedMs: this.lastUpdatedMs,
        currentTimeMs,
      });
    }

    const previous = { price: this.price, lastUpdatedMs: this.lastUpdatedMs };
    tx.onRollback(() => {
      this.price = previous.price;
      this.lastUpdatedMs = previous.lastUpdatedMs;
    });
    this.price = newPrice;
    this.lastUpdatedMs = currentTimeMs;
    tx.emit({ type: 'PRICE_UPDATED', symbol: this.symbol, price: newPrice, updatedAtMs: currentTimeMs });
  }
}
