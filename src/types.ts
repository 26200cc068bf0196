import type { GovernanceState } from './domain/governance/governanceTypes.js';
import type { LedgerState } from './domain/ledger/merchantTypes.js';
import type { TokenState } from './domain/token/tokenTypes.js';

export interface StateMetrics {
  startedAt: string;
  transactionsCommitted: number;
  proposalsInitiated: number;
  votesCast: number;
  proposalsExecuted: number;
  proposalsExpired: number;
  depositsAccepted: number;
  depositsSkipped: number;
  merchantMints: number;
  merchantPayments: number;
  withdrawals: number;
}

export interface AppState {
  assets: Record<string, TokenState>;
  ledger: LedgerState;
  governance: GovernanceState;
  metrics: StateMetrics;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  rejectedCalls: number;
  rejectionsByCode: Record<string, number>;
  websocketClients: number;
}
