/**
 * In-process fungible token bound to one transaction.
 *
 * Balances, supply and allowances live in the transaction's draft state, so a
 * failed call rolls token moves back together with everything else.
 */

import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import type { Transaction } from '../../infra/storage/stateStore.js';
import { ownValue, setOwn } from '../../utils/records.js';
import type { TokenState, TransferHook, TransferNotice } from './tokenTypes.js';

const requireUnsigned = (amount: bigint): void => {
  if (amount < 0n) {
    throw domainError(ErrorCode.InvalidAmount, 'Amount must not be negative.', { amount: amount.toString() });
  }
};

export class TokenBook {
  constructor(
    readonly asset: string,
    private readonly tx: Transaction,
    private readonly token: TokenState,
    private readonly hooks: ReadonlySet<TransferHook>,
  ) {}

  balanceOf(account: string): bigint {
    return ownValue(this.token.balances, account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.token.totalSupply;
  }

  allowance(owner: string, spender: string): bigint {
    const forOwner = ownValue(this.token.allowances, owner);
    return (forOwner && ownValue(forOwner, spender)) ?? 0n;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    requireUnsigned(amount);
    this.setAllowance(owner, spender, amount);
    this.tx.emit('asset.approval', { asset: this.asset, owner, spender, amount: amount.toString() });
  }

  transfer(from: string, to: string, amount: bigint): void {
    requireUnsigned(amount);
    this.debit(from, amount);
    this.credit(to, amount);
    this.notify({ asset: this.asset, from, to, amount });
  }

  /** Moves `amount` on behalf of `from`, spending `spender`'s allowance. */
  transferFrom(spender: string, from: string, to: string, amount: bigint): void {
    requireUnsigned(amount);
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw domainError(ErrorCode.TransferFailed, `Allowance of ${spender} over ${from} is insufficient.`, {
        asset: this.asset,
        allowance: allowed.toString(),
        amount: amount.toString(),
      });
    }

    this.debit(from, amount);
    this.credit(to, amount);
    this.setAllowance(from, spender, allowed - amount);
    this.notify({ asset: this.asset, from, to, amount });
  }

  mint(to: string, amount: bigint): void {
    requireUnsigned(amount);
    this.credit(to, amount);
    this.token.totalSupply += amount;
    this.notify({ asset: this.asset, from: null, to, amount });
  }

  burn(from: string, amount: bigint): void {
    requireUnsigned(amount);
    this.debit(from, amount);
    this.token.totalSupply -= amount;
    this.notify({ asset: this.asset, from, to: null, amount });
  }

  private debit(account: string, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw domainError(ErrorCode.TransferFailed, `Balance of ${account} is insufficient.`, {
        asset: this.asset,
        balance: balance.toString(),
        amount: amount.toString(),
      });
    }
    setOwn(this.token.balances, account, balance - amount);
  }

  private credit(account: string, amount: bigint): void {
    setOwn(this.token.balances, account, this.balanceOf(account) + amount);
  }

  private setAllowance(owner: string, spender: string, amount: bigint): void {
    const forOwner = ownValue(this.token.allowances, owner) ?? {};
    setOwn(forOwner, spender, amount);
    setOwn(this.token.allowances, owner, forOwner);
  }

  private notify(notice: TransferNotice): void {
    this.tx.emit('asset.transfer', {
      asset: notice.asset,
      from: notice.from,
      to: notice.to,
      amount: notice.amount.toString(),
    });
    for (const hook of this.hooks) {
      hook(notice);
    }
  }
}
