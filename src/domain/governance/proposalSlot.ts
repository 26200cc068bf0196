import { v4 as uuid } from 'uuid';
import type {
  DepositReceipt,
  GovernanceState,
  ProposalKind,
  ProposalOutcome,
  ProposalPayload,
  ProposalRecord,
  ProposalSlot,
  SlotStatus,
} from './governanceTypes.js';

export const voteKey = (kind: ProposalKind, round: number, voter: string): string => `${kind}:${round}:${voter}`;

/** Active but past its deadline. Voting at exactly the deadline is still allowed. */
export const isPastDeadline = (slot: ProposalSlot, now: number): boolean => (
  slot.active && slot.deadline !== null && now > slot.deadline
);

export const slotStatus = (slot: ProposalSlot, now: number): SlotStatus => {
  if (!slot.active) return 'idle';
  return isPastDeadline(slot, now) ? 'expired' : 'voting';
};

export interface OpenRoundInput {
  payload: ProposalPayload;
  initiator: string;
  deposit: DepositReceipt | null;
  now: number;
  votingWindowMs: number;
}

/**
 * Starts a fresh round on the slot, dropping vote records of the round it replaces.
 */
export const openRound = (governance: GovernanceState, slot: ProposalSlot, input: OpenRoundInput): void => {
  for (const [key, record] of Object.entries(governance.votes)) {
    if (record.kind === slot.kind && record.round === slot.round) delete governance.votes[key];
  }

  slot.round += 1;
  slot.active = true;
  slot.accumulatedPower = 0n;
  slot.payload = input.payload;
  slot.initiator = input.initiator;
  slot.openedAt = input.now;
  slot.deadline = input.now + input.votingWindowMs;
  slot.deposit = input.deposit;
};

export const hasVoted = (governance: GovernanceState, slot: ProposalSlot, voter: string): boolean => (
  Object.hasOwn(governance.votes, voteKey(slot.kind, slot.round, voter))
);

export const recordVote = (
  governance: GovernanceState,
  slot: ProposalSlot,
  voter: string,
  weight: bigint,
  now: number,
): void => {
  governance.votes[voteKey(slot.kind, slot.round, voter)] = {
    kind: slot.kind,
    round: slot.round,
    voter,
    weight,
    castAt: now,
  };
  slot.accumulatedPower += weight;
};

export const votersOf = (governance: GovernanceState, slot: ProposalSlot): string[] => {
  return Object.values(governance.votes)
    .filter((record) => record.kind === slot.kind && record.round === slot.round)
    .map((record) => record.voter);
};

/**
 * Marks the slot inactive and appends the closed round to history, trimmed to `historyLimit`.
 */
export const closeRound = (
  governance: GovernanceState,
  slot: ProposalSlot,
  outcome: ProposalOutcome,
  now: number,
  historyLimit: number,
): ProposalRecord | null => {
  slot.active = false;
  if (slot.payload === null || slot.initiator === null || slot.openedAt === null) return null;

  const record: ProposalRecord = {
    id: uuid(),
    kind: slot.kind,
    round: slot.round,
    payload: slot.payload,
    initiator: slot.initiator,
    accumulatedPower: slot.accumulatedPower,
    deposit: slot.deposit,
    outcome,
    openedAt: slot.openedAt,
    closedAt: now,
  };

  governance.history.push(record);
  if (governance.history.length > historyLimit) {
    governance.history.splice(0, governance.history.length - historyLimit);
  }
  return record;
};
