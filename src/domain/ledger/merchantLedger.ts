/**
 * Merchant ledger.
 *
 * Merchants mint the ledger currency to users up to a net quota
 * (minted minus recycled) and burn it back when users pay. Controllers (the
 * ledger owner and the governance account) manage the merchant set; a
 * merchant's guardian may tune that merchant's own settings.
 */

import { DomainError, domainError, ErrorCode } from '../../errors/taxonomy.js';
import type { Transaction } from '../../infra/storage/stateStore.js';
import { setOwn } from '../../utils/records.js';
import type { AssetRegistry } from '../token/assetRegistry.js';
import type { TokenBook } from '../token/tokenBook.js';
import { indexInsert, indexRemove } from './merchantIndex.js';
import type {
  LedgerState,
  MerchantAccount,
  MerchantUpdate,
  MintReceipt,
  PaymentReceipt,
  WithdrawalReceipt,
} from './merchantTypes.js';

export interface LedgerSettings {
  ownerAddress: string;
  governanceAddress: string;
  treasuryAddress: string;
  rebateCeiling: number;
  registrationGrant: bigint;
}

export interface AddMerchantInput {
  merchant: string;
  name: string;
  printQuota: bigint;
  guardian: string;
}

export const outstandingOf = (account: MerchantAccount): bigint => account.totalCashReceived - account.totalRecycled;

export class MerchantLedger {
  constructor(
    private readonly tx: Transaction,
    private readonly assets: AssetRegistry,
    private readonly settings: LedgerSettings,
  ) {}

  private get state(): LedgerState {
    return this.tx.state.ledger;
  }

  isController(caller: string): boolean {
    return caller === this.settings.ownerAddress || caller === this.settings.governanceAddress;
  }

  isMerchant(address: string): boolean {
    return Object.hasOwn(this.state.merchants, address);
  }

  get(address: string): MerchantAccount | null {
    return this.isMerchant(address) ? this.state.merchants[address] : null;
  }

  add(caller: string, input: AddMerchantInput): MerchantAccount {
    this.requireController(caller);

    if (this.isMerchant(input.merchant)) {
      throw domainError(ErrorCode.DuplicateMerchant, `Merchant ${input.merchant} is already registered.`, {
        merchant: input.merchant,
      });
    }
    if (input.printQuota < 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'Print quota must not be negative.');
    }

    const account: MerchantAccount = {
      address: input.merchant,
      name: input.name,
      printQuota: input.printQuota,
      totalCashReceived: 0n,
      totalRecycled: 0n,
      rebate: 0,
      frozen: false,
      guardian: input.guardian,
      createdAt: this.tx.now,
      updatedAt: this.tx.now,
    };

    setOwn(this.state.merchants, input.merchant, account);
    indexInsert(this.state.index, input.merchant);
    this.tx.emit('merchant.added', {
      merchant: account.address,
      name: account.name,
      printQuota: account.printQuota.toString(),
      guardian: account.guardian,
    });

    if (this.settings.registrationGrant > 0n) {
      this.currency().mint(account.guardian, this.settings.registrationGrant);
    }

    return account;
  }

  /**
   * Drops a merchant. Refused while it still has net minted currency
   * outstanding, since its counters are the only record of that exposure.
   */
  remove(caller: string, merchant: string): MerchantAccount {
    this.requireController(caller);
    const account = this.requireMerchant(merchant);

    const outstanding = outstandingOf(account);
    if (outstanding > 0n) {
      throw domainError(ErrorCode.OutstandingBalance, `Merchant ${merchant} still has ${outstanding} outstanding.`, {
        merchant,
        outstanding: outstanding.toString(),
      });
    }

    delete this.state.merchants[merchant];
    indexRemove(this.state.index, merchant);
    this.tx.emit('merchant.removed', { merchant });
    return account;
  }

  modify(caller: string, merchant: string, update: MerchantUpdate): MerchantAccount {
    const account = this.requireMerchant(merchant);

    const controller = this.isController(caller);
    if (!controller && caller !== account.guardian) {
      throw domainError(ErrorCode.Unauthorized, `${caller} may not modify merchant ${merchant}.`);
    }
    if (!controller && update.guardian !== undefined && update.guardian !== account.guardian) {
      throw domainError(ErrorCode.Unauthorized, 'Only a controller may reassign a guardian.');
    }
    if (update.rebate !== undefined
      && (!Number.isInteger(update.rebate) || update.rebate < 0 || update.rebate > this.settings.rebateCeiling)) {
      throw domainError(ErrorCode.RebateOutOfRange, `Rebate must be an integer in [0, ${this.settings.rebateCeiling}].`, {
        rebate: update.rebate,
      });
    }
    if (update.printQuota !== undefined && update.printQuota < 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'Print quota must not be negative.');
    }

    const wasFrozen = account.frozen;
    if (update.guardian !== undefined) account.guardian = update.guardian;
    if (update.frozen !== undefined) account.frozen = update.frozen;
    if (update.printQuota !== undefined) account.printQuota = update.printQuota;
    if (update.rebate !== undefined) account.rebate = update.rebate;
    account.updatedAt = this.tx.now;

    if (!wasFrozen && account.frozen) this.tx.emit('merchant.frozen', { merchant });
    if (wasFrozen && !account.frozen) this.tx.emit('merchant.unfrozen', { merchant });
    this.tx.emit('merchant.modified', {
      merchant,
      by: caller,
      guardian: account.guardian,
      frozen: account.frozen,
      printQuota: account.printQuota.toString(),
      rebate: account.rebate,
    });

    return account;
  }

  mint(caller: string, user: string, amount: bigint): MintReceipt {
    const account = this.requireMerchant(caller);
    this.requireNotFrozen(account);

    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'Mint amount must be positive.');
    }
    const outstandingAfter = outstandingOf(account) + amount;
    if (outstandingAfter > account.printQuota) {
      throw domainError(ErrorCode.InvalidAmount, 'Mint would exceed the merchant print quota.', {
        printQuota: account.printQuota.toString(),
        outstanding: outstandingOf(account).toString(),
        amount: amount.toString(),
      });
    }

    this.currency().mint(user, amount);
    account.totalCashReceived += amount;
    account.updatedAt = this.tx.now;
    this.tx.state.metrics.merchantMints += 1;
    this.tx.emit('merchant.minted', { merchant: caller, user, amount: amount.toString() });

    return {
      merchant: caller,
      user,
      amount,
      totalCashReceived: account.totalCashReceived,
      headroom: account.printQuota - outstandingOf(account),
    };
  }

  /**
   * Burns a user's payment minus the merchant's rebate. The rebate share is
   * never burned and stays with the payer.
   */
  pay(caller: string, user: string, amount: bigint): PaymentReceipt {
    const account = this.requireMerchant(caller);
    this.requireNotFrozen(account);

    if (amount <= 0n) {
      throw domainError(ErrorCode.InvalidAmount, 'Payment amount must be positive.');
    }
    const currency = this.currency();
    const balance = currency.balanceOf(user);
    if (balance < amount) {
      throw domainError(ErrorCode.InvalidAmount, `Balance of ${user} is insufficient for this payment.`, {
        balance: balance.toString(),
        amount: amount.toString(),
      });
    }

    const burned = (amount * BigInt(100 - account.rebate)) / 100n;
    const rebateAmount = amount - burned;

    currency.burn(user, burned);
    account.totalRecycled += burned;
    account.updatedAt = this.tx.now;
    this.tx.state.metrics.merchantPayments += 1;
    this.tx.emit('merchant.payment', {
      merchant: caller,
      user,
      amount: amount.toString(),
      burned: burned.toString(),
      rebateAmount: rebateAmount.toString(),
    });

    return {
      merchant: caller,
      user,
      amount,
      burned,
      rebateAmount,
      totalRecycled: account.totalRecycled,
    };
  }

  /** Sends the treasury's whole balance of `asset` to `beneficiary`. */
  withdraw(caller: string, asset: string, beneficiary: string): WithdrawalReceipt {
    this.requireController(caller);

    const token = this.asWithdrawFailure(asset, () => this.assets.bind(this.tx, asset));
    const amount = token.balanceOf(this.settings.treasuryAddress);
    if (amount === 0n) {
      throw domainError(ErrorCode.InvalidAmount, `Treasury holds no ${asset}.`, { asset });
    }

    this.asWithdrawFailure(asset, () => token.transfer(this.settings.treasuryAddress, beneficiary, amount));
    this.tx.state.metrics.withdrawals += 1;
    this.tx.emit('treasury.withdrawn', { asset, beneficiary, amount: amount.toString() });

    return { asset, beneficiary, amount };
  }

  private currency(): TokenBook {
    return this.assets.ledger(this.tx);
  }

  private requireController(caller: string): void {
    if (!this.isController(caller)) {
      throw domainError(ErrorCode.Unauthorized, `${caller} is not a ledger controller.`);
    }
  }

  private requireMerchant(address: string): MerchantAccount {
    const account = this.get(address);
    if (!account) {
      throw domainError(ErrorCode.NotRegisteredMerchant, `${address} is not a registered merchant.`, {
        merchant: address,
      });
    }
    return account;
  }

  private requireNotFrozen(account: MerchantAccount): void {
    if (account.frozen) {
      throw domainError(ErrorCode.Frozen, `Merchant ${account.address} is frozen.`, { merchant: account.address });
    }
  }

  private asWithdrawFailure<T>(asset: string, move: () => T): T {
    try {
      return move();
    } catch (error) {
      if (error instanceof DomainError && error.category === 'TransferFailed') {
        throw domainError(ErrorCode.WithdrawFailed, `Withdrawal of ${asset} failed: ${error.message}`, {
          asset,
          cause: error.code,
        });
      }
      throw error;
    }
  }
}
