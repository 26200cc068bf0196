import { z } from 'zod';
import type { AppState } from '../../types.js';

const amount = z.union([z.string().regex(/^\d+$/), z.bigint()]).transform((value) => BigInt(value));

const kind = z.enum(['add_merchant', 'modify_merchant', 'change_parameter', 'withdraw_funds']);

const payload = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('add_merchant'),
    merchant: z.string(),
    name: z.string(),
    printQuota: amount,
  }),
  z.object({
    kind: z.literal('modify_merchant'),
    merchant: z.string(),
    guardian: z.string(),
    frozen: z.boolean(),
    printQuota: amount,
    rebate: z.number(),
  }),
  z.object({
    kind: z.literal('change_parameter'),
    majorityPercentage: z.number().int().min(1).max(30),
  }),
  z.object({
    kind: z.literal('withdraw_funds'),
    asset: z.string(),
    beneficiary: z.string(),
  }),
]);

const deposit = z.object({
  asset: z.string(),
  requested: amount,
  received: amount,
  accepted: z.boolean(),
});

const slot = z.object({
  kind,
  round: z.number().int().nonnegative(),
  active: z.boolean(),
  accumulatedPower: amount,
  payload: payload.nullable(),
  initiator: z.string().nullable(),
  openedAt: z.number().nullable(),
  deadline: z.number().nullable(),
  deposit: deposit.nullable(),
});

const token = z.object({
  totalSupply: amount,
  balances: z.record(z.string(), amount),
  allowances: z.record(z.string(), z.record(z.string(), amount)),
});

const merchant = z.object({
  address: z.string(),
  name: z.string(),
  printQuota: amount,
  totalCashReceived: amount,
  totalRecycled: amount,
  rebate: z.number(),
  frozen: z.boolean(),
  guardian: z.string(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

/** Shape of the state file; amounts are stored as decimal strings. */
export const appStateSchema: z.ZodType<AppState, z.ZodTypeDef, unknown> = z.object({
  assets: z.record(z.string(), token),
  ledger: z.object({
    merchants: z.record(z.string(), merchant),
    index: z.object({
      keys: z.array(z.string()),
      positions: z.record(z.string(), z.number().int().nonnegative()),
    }),
  }),
  governance: z.object({
    majorityPercentage: z.number().int().min(1).max(30),
    slots: z.object({
      add_merchant: slot,
      modify_merchant: slot,
      change_parameter: slot,
      withdraw_funds: slot,
    }),
    votes: z.record(z.string(), z.object({
      kind,
      round: z.number().int(),
      voter: z.string(),
      weight: amount,
      castAt: z.number(),
    })),
    history: z.array(z.object({
      id: z.string(),
      kind,
      round: z.number().int(),
      payload,
      initiator: z.string(),
      accumulatedPower: amount,
      deposit: deposit.nullable(),
      outcome: z.enum(['executed', 'expired']),
      openedAt: z.number(),
      closedAt: z.number(),
    })),
  }),
  metrics: z.object({
    startedAt: z.string(),
    transactionsCommitted: z.number(),
    proposalsInitiated: z.number(),
    votesCast: z.number(),
    proposalsExecuted: z.number(),
    proposalsExpired: z.number(),
    depositsAccepted: z.number(),
    depositsSkipped: z.number(),
    merchantMints: z.number(),
    merchantPayments: z.number(),
    withdrawals: z.number(),
  }),
});
