export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  Unauthorized: 'unauthorized',
  ProposalAlreadyActive: 'proposal_already_active',
  NoActiveProposal: 'no_active_proposal',
  ProposalExpired: 'proposal_expired',
  AlreadyVoted: 'already_voted',
  ReentrantCall: 'reentrant_call',
  DuplicateMerchant: 'duplicate_merchant',
  NotRegisteredMerchant: 'not_registered_merchant',
  OutstandingBalance: 'outstanding_balance',
  InvalidAmount: 'invalid_amount',
  RebateOutOfRange: 'rebate_out_of_range',
  ParameterOutOfRange: 'parameter_out_of_range',
  Frozen: 'frozen',
  TransferFailed: 'transfer_failed',
  WithdrawFailed: 'withdraw_failed',
  UnknownAsset: 'unknown_asset',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type ErrorCategory =
  | 'Unauthorized'
  | 'InvalidState'
  | 'InvalidAmount'
  | 'Frozen'
  | 'TransferFailed'
  | 'InvalidPayload'
  | 'Internal';

const categoryByCode: Record<ErrorCode, ErrorCategory> = {
  invalid_payload: 'InvalidPayload',
  unauthorized: 'Unauthorized',
  proposal_already_active: 'InvalidState',
  no_active_proposal: 'InvalidState',
  proposal_expired: 'InvalidState',
  already_voted: 'InvalidState',
  reentrant_call: 'InvalidState',
  duplicate_merchant: 'InvalidState',
  not_registered_merchant: 'Unauthorized',
  outstanding_balance: 'InvalidState',
  invalid_amount: 'InvalidAmount',
  rebate_out_of_range: 'InvalidAmount',
  parameter_out_of_range: 'InvalidAmount',
  frozen: 'Frozen',
  transfer_failed: 'TransferFailed',
  withdraw_failed: 'TransferFailed',
  unknown_asset: 'TransferFailed',
  internal_error: 'Internal',
};

const statusByCategory: Record<ErrorCategory, number> = {
  Unauthorized: 403,
  InvalidState: 409,
  InvalidAmount: 422,
  Frozen: 423,
  TransferFailed: 502,
  InvalidPayload: 400,
  Internal: 500,
};

export const categoryOf = (code: ErrorCode): ErrorCategory => categoryByCode[code];

export class DomainError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
    this.category = categoryOf(code);
  }
}

/**
 * Builds a DomainError whose HTTP status follows from the code's category.
 */
export const domainError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): DomainError => new DomainError(code, statusByCategory[categoryOf(code)], message, details);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
