/**
 * Governance types.
 *
 * Each proposal kind owns exactly one slot. A slot is reused round after
 * round; the round id only ever grows, so vote records from an old round
 * never collide with a new one.
 */

export const ProposalKind = {
  AddMerchant: 'add_merchant',
  ModifyMerchant: 'modify_merchant',
  ChangeParameter: 'change_parameter',
  WithdrawFunds: 'withdraw_funds',
} as const;

export type ProposalKind = typeof ProposalKind[keyof typeof ProposalKind];

export const PROPOSAL_KINDS: readonly ProposalKind[] = Object.values(ProposalKind);

export interface AddMerchantPayload {
  kind: 'add_merchant';
  merchant: string;
  name: string;
  printQuota: bigint;
}

export interface ModifyMerchantPayload {
  kind: 'modify_merchant';
  merchant: string;
  guardian: string;
  frozen: boolean;
  printQuota: bigint;
  rebate: number;
}

export interface ChangeParameterPayload {
  kind: 'change_parameter';
  majorityPercentage: number;
}

export interface WithdrawFundsPayload {
  kind: 'withdraw_funds';
  asset: string;
  beneficiary: string;
}

export type ProposalPayload =
  | AddMerchantPayload
  | ModifyMerchantPayload
  | ChangeParameterPayload
  | WithdrawFundsPayload;

/** Outcome of the best-effort deposit taken at initiation. */
export interface DepositReceipt {
  asset: string;
  requested: bigint;
  received: bigint;
  accepted: boolean;
}

export interface ProposalSlot {
  kind: ProposalKind;
  round: number;
  active: boolean;
  accumulatedPower: bigint;
  payload: ProposalPayload | null;
  initiator: string | null;
  openedAt: number | null;
  deadline: number | null;
  deposit: DepositReceipt | null;
}

export interface VoteRecord {
  kind: ProposalKind;
  round: number;
  voter: string;
  weight: bigint;
  castAt: number;
}

export type ProposalOutcome = 'executed' | 'expired';

export interface ProposalRecord {
  id: string;
  kind: ProposalKind;
  round: number;
  payload: ProposalPayload;
  initiator: string;
  accumulatedPower: bigint;
  deposit: DepositReceipt | null;
  outcome: ProposalOutcome;
  openedAt: number;
  closedAt: number;
}

export interface GovernanceState {
  majorityPercentage: number;
  slots: Record<ProposalKind, ProposalSlot>;
  /** Keyed by `kind:round:voter`. */
  votes: Record<string, VoteRecord>;
  history: ProposalRecord[];
}

export type SlotStatus = 'idle' | 'voting' | 'expired';

export interface SlotView extends ProposalSlot {
  status: SlotStatus;
  threshold: bigint;
  voters: string[];
}
