export interface TokenState {
  totalSupply: bigint;
  balances: Record<string, bigint>;
  /** owner → spender → remaining allowance */
  allowances: Record<string, Record<string, bigint>>;
}

export interface TransferNotice {
  asset: string;
  /** null on mint */
  from: string | null;
  /** null on burn */
  to: string | null;
  amount: bigint;
}

/**
 * Runs synchronously after every balance move, inside the caller's transaction.
 * This is where a hostile token would call back into the system.
 */
export type TransferHook = (notice: TransferNotice) => void;
