import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import type { Transaction } from '../../infra/storage/stateStore.js';
import { ownValue } from '../../utils/records.js';
import { TokenBook } from './tokenBook.js';
import type { TransferHook } from './tokenTypes.js';

export interface AssetNames {
  votingAsset: string;
  ledgerAsset: string;
  nativeAsset: string;
}

/**
 * Knows which assets exist and binds them to a transaction.
 */
export class AssetRegistry {
  private readonly hooks = new Set<TransferHook>();

  constructor(readonly names: AssetNames) {}

  /** Every asset the default state should carry. */
  list(): string[] {
    return [...new Set([this.names.votingAsset, this.names.ledgerAsset, this.names.nativeAsset])];
  }

  bind(tx: Transaction, asset: string): TokenBook {
    const token = ownValue(tx.state.assets, asset);
    if (!token) {
      throw domainError(ErrorCode.UnknownAsset, `Unknown asset ${asset}.`, { asset });
    }
    return new TokenBook(asset, tx, token, this.hooks);
  }

  voting(tx: Transaction): TokenBook {
    return this.bind(tx, this.names.votingAsset);
  }

  ledger(tx: Transaction): TokenBook {
    return this.bind(tx, this.names.ledgerAsset);
  }

  /** Registers a hook run after every balance move of every asset. */
  onTransfer(hook: TransferHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }
}
