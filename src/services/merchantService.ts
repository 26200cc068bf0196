import { MerchantLedger, outstandingOf, type LedgerSettings } from '../domain/ledger/merchantLedger.js';
import type {
  MerchantAccount,
  MerchantUpdate,
  MintReceipt,
  PaymentReceipt,
} from '../domain/ledger/merchantTypes.js';
import type { AssetRegistry } from '../domain/token/assetRegistry.js';
import type { StateStore, Transaction } from '../infra/storage/stateStore.js';
import type { AuditTrail } from './auditTrail.js';

export interface MerchantView extends MerchantAccount {
  outstanding: bigint;
  headroom: bigint;
}

const toView = (account: MerchantAccount): MerchantView => {
  const outstanding = outstandingOf(account);
  return { ...account, outstanding, headroom: account.printQuota - outstanding };
};

/**
 * Direct merchant entry points: minting, payments, guardian/owner
 * modification and owner removal. Adding merchants and withdrawing funds go
 * through governance.
 */
export class MerchantService {
  constructor(
    private readonly store: StateStore,
    private readonly assets: AssetRegistry,
    private readonly settings: LedgerSettings,
    private readonly audit: AuditTrail,
  ) {}

  list(): MerchantView[] {
    return this.store.read((state) => state.ledger.index.keys.map((key) => toView(state.ledger.merchants[key])));
  }

  get(address: string): MerchantView | null {
    return this.store.read((state) => {
      const account = Object.hasOwn(state.ledger.merchants, address) ? state.ledger.merchants[address] : null;
      return account ? toView(account) : null;
    });
  }

  async mint(caller: string, user: string, amount: bigint): Promise<MintReceipt> {
    return this.run('merchant.mint', { caller, user, amount: amount.toString() }, (ledger) => ledger.mint(caller, user, amount));
  }

  async pay(caller: string, user: string, amount: bigint): Promise<PaymentReceipt> {
    return this.run('merchant.payment', { caller, user, amount: amount.toString() }, (ledger) => ledger.pay(caller, user, amount));
  }

  async modify(caller: string, merchant: string, update: MerchantUpdate): Promise<MerchantView> {
    const account = await this.run('merchant.modify', { caller, merchant }, (ledger) => ledger.modify(caller, merchant, update));
    return toView(account);
  }

  async remove(caller: string, merchant: string): Promise<MerchantView> {
    const account = await this.run('merchant.remove', { caller, merchant }, (ledger) => ledger.remove(caller, merchant));
    return toView(account);
  }

  private async run<T>(
    event: string,
    context: Record<string, unknown>,
    work: (ledger: MerchantLedger, tx: Transaction) => T,
  ): Promise<T> {
    let result: T;
    try {
      result = this.store.transaction((tx) => work(new MerchantLedger(tx, this.assets, this.settings), tx));
    } catch (error) {
      await this.audit.rejectedCall(`${event}.rejected`, error, context);
      throw error;
    }

    await this.audit.accepted(event, context);
    return result;
  }
}
