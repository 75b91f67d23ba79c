import { fail } from './errors';
import type { Transaction } from './Transaction';
import { type AccountId, type Caller, ROLES, type Role } from './types';

export type CapabilityHolders = Record<Role, AccountId>;

/** One holder per role; holders hand their capability on explicitly. */
export class CapabilityRegistry {
  private readonly holders = new Map<Role, AccountId>();

  constructor(initial: CapabilityHolders) {
    for (const role of ROLES) {
      const holder = String(initial[role] || '').trim();
      if (!holder) {
        throw new Error(`capability_holder_required:${role}`);
      }
      this.holders.set(role, holder);
    }
  }

  holderOf(role: Role): AccountId {
    const holder = this.holders.get(role);
    if (!holder) {
      throw new Error(`capability_not_issued:${role}`);
    }
    return holder;
  }

  hasRole(account: AccountId, role: Role): boolean {
    return this.holders.get(role) === account;
  }

  rolesOf(account: AccountId): Role[] {
    return ROLES.filter((role) => this.hasRole(account, role));
  }

  assertRole(caller: Caller, role: Role): void {
    if (!this.hasRole(caller.account, role)) {
      fail('Unauthorized', `missing_capability:${role}`, { account: caller.account, role });
    }
  }

  transfer(tx: Transaction, caller: Caller, role: Role, to: AccountId): void {
    this.assertRole(caller, role);
    const recipient = String(to || '').trim();
    if (!recipient) {
      fail('InvalidRequest', 'capability_recipient_required');
    }

    const previous = this.holderOf(role);
    tx.onRollback(() => {
      this.holders.set(role, previous);
    });
    this.holders.set(role, recipient);
    tx.emit({ type: 'CAPABILITY_TRANSFERRED', role, from: previous, to: recipient });
  }

  snapshot(): CapabilityHolders {
    return {
      ADMIN: this.holderOf('ADMIN'),
      LIQUIDITY_PROVIDER: this.holderOf('LIQUIDITY_PROVIDER'),
      ORACLE_OPERATOR: this.holderOf('ORACLE_OPERATOR'),
    };
  }
}
