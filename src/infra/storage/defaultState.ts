import type { GenesisAllocation } from '../../config.js';
import { ProposalKind, type ProposalSlot } from '../../domain/governance/governanceTypes.js';
import type { TokenState } from '../../domain/token/tokenTypes.js';
import type { AppState } from '../../types.js';
import { ownValue, setOwn } from '../../utils/records.js';
import { isoNow } from '../../utils/time.js';

export interface DefaultStateOptions {
  assets: string[];
  majorityPercentage: number;
  genesis?: GenesisAllocation[];
}

export const emptySlot = (kind: ProposalKind): ProposalSlot => ({
  kind,
  round: 0,
  active: false,
  accumulatedPower: 0n,
  payload: null,
  initiator: null,
  openedAt: null,
  deadline: null,
  deposit: null,
});

const emptyToken = (): TokenState => ({
  totalSupply: 0n,
  balances: {},
  allowances: {},
});

export const createDefaultState = (options: DefaultStateOptions): AppState => {
  const assets: Record<string, TokenState> = Object.fromEntries(
    options.assets.map((asset) => [asset, emptyToken()]),
  );

  for (const allocation of options.genesis ?? []) {
    const token = ownValue(assets, allocation.asset);
    if (!token) continue;
    setOwn(token.balances, allocation.account, (ownValue(token.balances, allocation.account) ?? 0n) + allocation.amount);
    token.totalSupply += allocation.amount;
  }

  return {
    assets,
    ledger: {
      merchants: {},
      index: { keys: [], positions: {} },
    },
    governance: {
      majorityPercentage: options.majorityPercentage,
      slots: {
        [ProposalKind.AddMerchant]: emptySlot(ProposalKind.AddMerchant),
        [ProposalKind.ModifyMerchant]: emptySlot(ProposalKind.ModifyMerchant),
        [ProposalKind.ChangeParameter]: emptySlot(ProposalKind.ChangeParameter),
        [ProposalKind.WithdrawFunds]: emptySlot(ProposalKind.WithdrawFunds),
      },
      votes: {},
      history: [],
    },
    metrics: {
      startedAt: isoNow(),
      transactionsCommitted: 0,
      proposalsInitiated: 0,
      votesCast: 0,
      proposalsExecuted: 0,
      proposalsExpired: 0,
      depositsAccepted: 0,
      depositsSkipped: 0,
      merchantMints: 0,
      merchantPayments: 0,
      withdrawals: 0,
    },
  };
};
