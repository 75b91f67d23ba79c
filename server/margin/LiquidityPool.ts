import { fail } from './errors';
import type { Transaction } from './Transaction';
import type { Coin, PoolSnapshot } from './types';
import { type U64, assertU64, u64Add, u64Sub } from './U64Math';

/**
 * Single pooled balance of one settlement asset. Trading collateral and
 * provider capital are co-mingled: there is no separate locked reserve, so
 * `removeLiquidity` is bounded by the raw balance only.
 */
export class LiquidityPool {
  private balance: U64 = 0n;

  constructor(readonly asset: string) {}

  getBalance(): U64 {
    return this.balance;
  }

  snapshot(): PoolSnapshot {
    return { asset: this.asset, balance: this.balance };
  }

  addLiquidity(tx: Transaction, coin: Coin): U64 {
    if (coin.value === 0n) {
      fail('ZeroAmount', 'liquidity_amount_zero');
    }
    this.deposit(tx, coin);
    tx.emit({ type: 'LIQUIDITY_ADDED', asset: this.asset, amount: coin.value, totalLiquidity: this.balance });
    return this.balance;
  }

  removeLiquidity(tx: Transaction, amount: U64): Coin {
    if (amount === 0n) {
      fail('ZeroAmount', 'liquidity_amount_zero');
    }
    const coin = this.withdraw(tx, amount);
    tx.emit({ type: 'LIQUIDITY_REMOVED', asset: this.asset, amount, totalLiquidity: this.balance });
    return coin;
  }

  deposit(tx: Transaction, coin: Coin): void {
    this.assertAsset(coin);
    assertU64(coin.value, 'coin_value');
    this.setBalance(tx, u64Add(this.balance, coin.value, 'pool_balance'));
  }

  withdraw(tx: Transaction, amount: U64): Coin {
    assertU64(amount, 'withdraw_amount');
    if (amount > this.balance) {
      fail('InsufficientLiquidity', 'pool_balance_too_low', {
        asset: this.asset,
        requested: amount.toString(),
        available: this.balance.toString(),
      });
    }
    this.setBalance(tx, u64Sub(this.balance, amount, 'pool_balance'));
    return { asset: this.asset, value: amount };
  }

  private setBalance(tx: Transaction, next: U64): void {
    const previous = this.balance;
    tx.onRollback(() => {
      this.balance = previous;
    });
    this.balance = next;
  }

  private assertAsset(coin: Coin): void {
    if (coin.asset !== this.asset) {
      fail('AssetMismatch', `asset_mismatch:${coin.asset}!=${this.asset}`);
    }
  }
}
