import { domainError, ErrorCode } from '../errors/taxonomy.js';
import type { AssetRegistry } from '../domain/token/assetRegistry.js';
import type { TokenState } from '../domain/token/tokenTypes.js';
import type { StateStore } from '../infra/storage/stateStore.js';
import { ownValue } from '../utils/records.js';
import type { AuditTrail } from './auditTrail.js';

export interface AssetSummary {
  asset: string;
  totalSupply: bigint;
  treasuryBalance: bigint;
  holders: number;
}

/**
 * Thin surface over the in-process tokens: reads, holder transfers and approvals.
 */
export class AssetService {
  constructor(
    private readonly store: StateStore,
    private readonly assets: AssetRegistry,
    private readonly treasuryAddress: string,
    private readonly audit: AuditTrail,
  ) {}

  list(): string[] {
    return this.store.read((state) => Object.keys(state.assets));
  }

  describe(asset: string): AssetSummary {
    return this.readToken(asset, (token) => ({
      asset,
      totalSupply: token.totalSupply,
      treasuryBalance: ownValue(token.balances, this.treasuryAddress) ?? 0n,
      holders: Object.values(token.balances).filter((balance) => balance > 0n).length,
    }));
  }

  balanceOf(asset: string, account: string): bigint {
    return this.readToken(asset, (token) => ownValue(token.balances, account) ?? 0n);
  }

  async transfer(caller: string, asset: string, to: string, amount: bigint): Promise<void> {
    const context = { caller, asset, to, amount: amount.toString() };
    try {
      this.store.transaction((tx) => this.assets.bind(tx, asset).transfer(caller, to, amount));
    } catch (error) {
      await this.audit.rejectedCall('asset.transfer.rejected', error, context);
      throw error;
    }
    await this.audit.accepted('asset.transfer', context);
  }

  async approve(caller: string, asset: string, spender: string, amount: bigint): Promise<void> {
    const context = { caller, asset, spender, amount: amount.toString() };
    try {
      this.store.transaction((tx) => this.assets.bind(tx, asset).approve(caller, spender, amount));
    } catch (error) {
      await this.audit.rejectedCall('asset.approval.rejected', error, context);
      throw error;
    }
    await this.audit.accepted('asset.approval', context);
  }

  private readToken<T>(asset: string, view: (token: TokenState) => T): T {
    return this.store.read((state) => {
      const token = ownValue(state.assets, asset);
      if (!token) {
        throw domainError(ErrorCode.UnknownAsset, `Unknown asset ${asset}.`, { asset });
      }
      return view(token);
    });
  }
}
