// ─── SDK Types ─────────────────────────────────────────────────────────────
// Wire shapes of the quota-ledger HTTP API. Amounts are decimal strings.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalKind = 'add_merchant' | 'modify_merchant' | 'change_parameter' | 'withdraw_funds';

export type SlotStatus = 'idle' | 'voting' | 'expired';

// ─── Proposals ─────────────────────────────────────────────────────────────

export type ProposalPayload =
  | { kind: 'add_merchant'; merchant: string; name: string; printQuota: string }
  | { kind: 'modify_merchant'; merchant: string; guardian: string; frozen: boolean; printQuota: string; rebate: number }
  | { kind: 'change_parameter'; majorityPercentage: number }
  | { kind: 'withdraw_funds'; asset: string; beneficiary: string };

export interface DepositReceipt {
  asset: string;
  requested: string;
  received: string;
  accepted: boolean;
}

export interface ProposalSlot {
  kind: ProposalKind;
  round: number;
  active: boolean;
  accumulatedPower: string;
  payload: ProposalPayload | null;
  initiator: string | null;
  openedAt: number | null;
  deadline: number | null;
  deposit: DepositReceipt | null;
}

export interface SlotView extends ProposalSlot {
  status: SlotStatus;
  threshold: string;
  voters: string[];
}

export interface ProposalRecord {
  id: string;
  kind: ProposalKind;
  round: number;
  payload: ProposalPayload;
  initiator: string;
  accumulatedPower: string;
  deposit: DepositReceipt | null;
  outcome: 'executed' | 'expired';
  openedAt: number;
  closedAt: number;
}

export type AddMerchantInput = { merchant: string; name: string; printQuota: string };
export type ModifyMerchantInput = { merchant: string; guardian: string; frozen: boolean; printQuota: string; rebate: number };
export type ChangeParameterInput = { majorityPercentage: number };
export type WithdrawFundsInput = { asset: string; beneficiary?: string };

export interface ProposalInputs {
  add_merchant: AddMerchantInput;
  modify_merchant: ModifyMerchantInput;
  change_parameter: ChangeParameterInput;
  withdraw_funds: WithdrawFundsInput;
}

export interface VoteResponse {
  proposal: ProposalSlot;
  weight: string;
  threshold: string;
  executed: boolean;
  effect: Record<string, unknown> | null;
}

export interface InitiateResponse extends VoteResponse {
  superseded: ProposalRecord | null;
}

export interface GovernanceParameters {
  majorityPercentage: number;
  maxMajorityPercentage: number;
  votingWindowMs: number;
  votingAsset: string;
  depositAsset: string;
  totalWeight: string;
  threshold: string;
}

// ─── Merchants ─────────────────────────────────────────────────────────────

export interface Merchant {
  address: string;
  name: string;
  printQuota: string;
  totalCashReceived: string;
  totalRecycled: string;
  rebate: number;
  frozen: boolean;
  guardian: string;
  createdAt: number;
  updatedAt: number;
  outstanding: string;
  headroom: string;
}

export interface MerchantUpdate {
  guardian?: string;
  frozen?: boolean;
  printQuota?: string;
  rebate?: number;
}

export interface MintReceipt {
  merchant: string;
  user: string;
  amount: string;
  totalCashReceived: string;
  headroom: string;
}

export interface PaymentReceipt {
  merchant: string;
  user: string;
  amount: string;
  burned: string;
  rebateAmount: string;
  totalRecycled: string;
}

// ─── Assets ────────────────────────────────────────────────────────────────

export interface AssetSummary {
  asset: string;
  totalSupply: string;
  treasuryBalance: string;
  holders: number;
}

export interface BalanceResponse {
  asset: string;
  account: string;
  balance: string;
}

// ─── System ────────────────────────────────────────────────────────────────

export interface HealthResponse {
  name: string;
  status: string;
  env: string;
  uptimeSeconds: number;
}

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
