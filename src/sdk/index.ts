// quota-ledger: SDK entry point
export { QuotaLedgerClient, QuotaLedgerAPIError } from './client.js';
export type { QuotaLedgerClientOptions } from './client.js';
export type {
  // Governance
  ProposalKind,
  SlotStatus,
  ProposalPayload,
  DepositReceipt,
  ProposalSlot,
  SlotView,
  ProposalRecord,
  ProposalInputs,
  AddMerchantInput,
  ModifyMerchantInput,
  ChangeParameterInput,
  WithdrawFundsInput,
  InitiateResponse,
  VoteResponse,
  GovernanceParameters,

  // Merchants
  Merchant,
  MerchantUpdate,
  MintReceipt,
  PaymentReceipt,

  // Assets
  AssetSummary,
  BalanceResponse,

  // System
  HealthResponse,
  APIErrorEnvelope,
} from './types.js';
