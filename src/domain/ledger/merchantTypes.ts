export interface MerchantAccount {
  address: string;
  name: string;
  printQuota: bigint;
  totalCashReceived: bigint;
  totalRecycled: bigint;
  /** Percentage of a payment left unburned, 0..rebateCeiling. */
  rebate: number;
  frozen: boolean;
  guardian: string;
  createdAt: number;
  updatedAt: number;
}

export interface MerchantUpdate {
  guardian?: string;
  frozen?: boolean;
  printQuota?: bigint;
  rebate?: number;
}

/** Unordered key list plus key → position map, for O(1) removal. */
export interface MerchantIndex {
  keys: string[];
  positions: Record<string, number>;
}

export interface LedgerState {
  merchants: Record<string, MerchantAccount>;
  index: MerchantIndex;
}

export interface MintReceipt {
  merchant: string;
  user: string;
  amount: bigint;
  totalCashReceived: bigint;
  headroom: bigint;
}

export interface PaymentReceipt {
  merchant: string;
  user: string;
  amount: bigint;
  burned: bigint;
  rebateAmount: bigint;
  totalRecycled: bigint;
}

export interface WithdrawalReceipt {
  asset: string;
  beneficiary: string;
  amount: bigint;
}
