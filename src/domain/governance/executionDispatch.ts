import type { Transaction } from '../../infra/storage/stateStore.js';
import type { MerchantLedger } from '../ledger/merchantLedger.js';
import type { MerchantAccount, WithdrawalReceipt } from '../ledger/merchantTypes.js';
import type { ProposalPayload } from './governanceTypes.js';

export type ExecutionEffect =
  | { kind: 'add_merchant'; merchant: MerchantAccount }
  | { kind: 'modify_merchant'; merchant: MerchantAccount }
  | { kind: 'change_parameter'; previous: number; next: number }
  | { kind: 'withdraw_funds'; withdrawal: WithdrawalReceipt };

export interface DispatchContext {
  tx: Transaction;
  ledger: MerchantLedger;
  /** Account the ledger sees as the caller of executed proposals. */
  governanceAddress: string;
  initiator: string;
}

/**
 * Routes a passed proposal to the ledger call for its kind. The payload is
 * passed through as voted; only the ledger's own checks apply.
 */
export const dispatchExecution = (payload: ProposalPayload, ctx: DispatchContext): ExecutionEffect => {
  switch (payload.kind) {
    case 'add_merchant':
      return {
        kind: payload.kind,
        merchant: ctx.ledger.add(ctx.governanceAddress, {
          merchant: payload.merchant,
          name: payload.name,
          printQuota: payload.printQuota,
          guardian: ctx.initiator,
        }),
      };
    case 'modify_merchant':
      return {
        kind: payload.kind,
        merchant: ctx.ledger.modify(ctx.governanceAddress, payload.merchant, {
          guardian: payload.guardian,
          frozen: payload.frozen,
          printQuota: payload.printQuota,
          rebate: payload.rebate,
        }),
      };
    case 'change_parameter': {
      const governance = ctx.tx.state.governance;
      const previous = governance.majorityPercentage;
      governance.majorityPercentage = payload.majorityPercentage;
      ctx.tx.emit('parameter.changed', { name: 'majorityPercentage', previous, next: payload.majorityPercentage });
      return { kind: payload.kind, previous, next: payload.majorityPercentage };
    }
    case 'withdraw_funds':
      return {
        kind: payload.kind,
        withdrawal: ctx.ledger.withdraw(ctx.governanceAddress, payload.asset, payload.beneficiary),
      };
  }
};
