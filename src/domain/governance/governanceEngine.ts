/**
 * Threshold-gated governance over the merchant ledger.
 *
 * One slot per proposal kind. Initiating opens a round and counts the
 * initiator's weight; every vote adds the voter's live weight. After each
 * initiate or vote the engine checks the pass threshold against the live
 * total weight and, when met before the deadline, executes and closes the
 * round. Expired rounds are only closed when the next initiation finds them.
 */

import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import type { Transaction } from '../../infra/storage/stateStore.js';
import { MerchantLedger, type LedgerSettings } from '../ledger/merchantLedger.js';
import type { AssetRegistry } from '../token/assetRegistry.js';
import { dispatchExecution, type ExecutionEffect } from './executionDispatch.js';
import type {
  DepositReceipt,
  GovernanceState,
  ProposalKind,
  ProposalPayload,
  ProposalRecord,
  ProposalSlot,
  WithdrawFundsPayload,
} from './governanceTypes.js';
import { closeRound, hasVoted, isPastDeadline, openRound, recordVote } from './proposalSlot.js';
import { passThreshold, tokenVotingPower, type VotingPowerSource } from './votingPower.js';

export interface GovernanceSettings {
  governanceAddress: string;
  votingWindowMs: number;
  maxMajorityPercentage: number;
  depositAsset: string;
  historyLimit: number;
  ledger: LedgerSettings;
}

/** A proposal as submitted; a withdrawal may leave the beneficiary to default to the initiator. */
export type ProposalDraft =
  | Exclude<ProposalPayload, WithdrawFundsPayload>
  | (Omit<WithdrawFundsPayload, 'beneficiary'> & { beneficiary?: string });

export interface InitiationResult {
  slot: ProposalSlot;
  weight: bigint;
  threshold: bigint;
  superseded: ProposalRecord | null;
  effect: ExecutionEffect | null;
}

export interface VoteResult {
  slot: ProposalSlot;
  weight: bigint;
  threshold: bigint;
  effect: ExecutionEffect | null;
}

export class GovernanceEngine {
  private readonly ledger: MerchantLedger;

  constructor(
    private readonly tx: Transaction,
    private readonly assets: AssetRegistry,
    private readonly settings: GovernanceSettings,
  ) {
    this.ledger = new MerchantLedger(tx, assets, settings.ledger);
  }

  private get governance(): GovernanceState {
    return this.tx.state.governance;
  }

  private power(): VotingPowerSource {
    return tokenVotingPower(this.assets.voting(this.tx));
  }

  threshold(): bigint {
    return passThreshold(this.power().totalWeight(), this.governance.majorityPercentage);
  }

  initiate(caller: string, draft: ProposalDraft, deposit?: bigint): InitiationResult {
    const weight = this.power().weight(caller);
    if (weight === 0n) {
      throw domainError(ErrorCode.Unauthorized, `${caller} holds no voting weight.`);
    }

    const slot = this.governance.slots[draft.kind];
    let superseded: ProposalRecord | null = null;
    if (slot.active) {
      if (!isPastDeadline(slot, this.tx.now)) {
        throw domainError(ErrorCode.ProposalAlreadyActive, `A ${draft.kind} proposal is already open.`, {
          kind: draft.kind,
          round: slot.round,
          deadline: slot.deadline,
        });
      }
      superseded = this.expire(slot);
    }

    const payload = this.validate(caller, draft);
    const receipt = this.takeDeposit(caller, deposit);

    openRound(this.governance, slot, {
      payload,
      initiator: caller,
      deposit: receipt,
      now: this.tx.now,
      votingWindowMs: this.settings.votingWindowMs,
    });
    recordVote(this.governance, slot, caller, weight, this.tx.now);
    this.tx.state.metrics.proposalsInitiated += 1;
    this.tx.state.metrics.votesCast += 1;
    this.tx.emit('proposal.initiated', {
      kind: slot.kind,
      round: slot.round,
      initiator: caller,
      deadline: slot.deadline,
    });
    this.tx.emit('proposal.vote_cast', { kind: slot.kind, round: slot.round, voter: caller, weight: weight.toString() });

    const threshold = this.threshold();
    const effect = this.tryExecute(slot.kind);
    return { slot, weight, threshold, superseded, effect };
  }

  vote(kind: ProposalKind, caller: string): VoteResult {
    const slot = this.governance.slots[kind];
    if (!slot.active) {
      throw domainError(ErrorCode.NoActiveProposal, `No ${kind} proposal is open.`, { kind });
    }
    if (isPastDeadline(slot, this.tx.now)) {
      throw domainError(ErrorCode.ProposalExpired, `The ${kind} proposal closed for voting at its deadline.`, {
        kind,
        round: slot.round,
        deadline: slot.deadline,
      });
    }

    const weight = this.power().weight(caller);
    if (weight === 0n) {
      throw domainError(ErrorCode.Unauthorized, `${caller} holds no voting weight.`);
    }
    if (hasVoted(this.governance, slot, caller)) {
      throw domainError(ErrorCode.AlreadyVoted, `${caller} already voted in round ${slot.round}.`, {
        kind,
        round: slot.round,
      });
    }

    recordVote(this.governance, slot, caller, weight, this.tx.now);
    this.tx.state.metrics.votesCast += 1;
    this.tx.emit('proposal.vote_cast', { kind, round: slot.round, voter: caller, weight: weight.toString() });

    const threshold = this.threshold();
    const effect = this.tryExecute(kind);
    return { slot, weight, threshold, effect };
  }

  /**
   * Executes the open round of `kind` when it has reached the threshold.
   * Past the deadline this does nothing; it never throws for timing.
   */
  tryExecute(kind: ProposalKind): ExecutionEffect | null {
    const slot = this.governance.slots[kind];
    if (!slot.active || slot.payload === null || slot.initiator === null) return null;
    if (isPastDeadline(slot, this.tx.now)) return null;
    if (slot.accumulatedPower < this.threshold()) return null;

    const effect = dispatchExecution(slot.payload, {
      tx: this.tx,
      ledger: this.ledger,
      governanceAddress: this.settings.governanceAddress,
      initiator: slot.initiator,
    });

    closeRound(this.governance, slot, 'executed', this.tx.now, this.settings.historyLimit);
    this.tx.state.metrics.proposalsExecuted += 1;
    this.tx.emit('proposal.executed', {
      kind,
      round: slot.round,
      accumulatedPower: slot.accumulatedPower.toString(),
    });
    this.tx.emit('proposal.ended', { kind, round: slot.round, executed: true });
    return effect;
  }

  private expire(slot: ProposalSlot): ProposalRecord | null {
    const record = closeRound(this.governance, slot, 'expired', this.tx.now, this.settings.historyLimit);
    this.tx.state.metrics.proposalsExpired += 1;
    this.tx.emit('proposal.ended', { kind: slot.kind, round: slot.round, executed: false });
    return record;
  }

  private validate(caller: string, draft: ProposalDraft): ProposalPayload {
    switch (draft.kind) {
      case 'add_merchant':
        if (this.ledger.isMerchant(draft.merchant)) {
          throw domainError(ErrorCode.DuplicateMerchant, `Merchant ${draft.merchant} is already registered.`, {
            merchant: draft.merchant,
          });
        }
        return draft;
      case 'modify_merchant':
        if (!this.ledger.isMerchant(draft.merchant)) {
          throw domainError(ErrorCode.NotRegisteredMerchant, `${draft.merchant} is not a registered merchant.`, {
            merchant: draft.merchant,
          });
        }
        return draft;
      case 'change_parameter': {
        const value = draft.majorityPercentage;
        if (!Number.isInteger(value) || value <= 0 || value > this.settings.maxMajorityPercentage) {
          throw domainError(
            ErrorCode.ParameterOutOfRange,
            `Majority percentage must be an integer in (0, ${this.settings.maxMajorityPercentage}].`,
            { majorityPercentage: value },
          );
        }
        return draft;
      }
      case 'withdraw_funds':
        return { kind: draft.kind, asset: draft.asset, beneficiary: draft.beneficiary ?? caller };
    }
  }

  /**
   * Pulls the optional deposit into the treasury. A short allowance or
   * balance does not fail the initiation; the receipt records zero received.
   */
  private takeDeposit(caller: string, amount: bigint | undefined): DepositReceipt | null {
    if (amount === undefined || amount === 0n) return null;

    const asset = this.settings.depositAsset;
    const token = this.assets.bind(this.tx, asset);
    const spender = this.settings.governanceAddress;
    const covered = token.allowance(caller, spender) >= amount && token.balanceOf(caller) >= amount;

    if (!covered) {
      this.tx.state.metrics.depositsSkipped += 1;
      this.tx.emit('proposal.deposit', { from: caller, asset, requested: amount.toString(), received: '0' });
      return { asset, requested: amount, received: 0n, accepted: false };
    }

    token.transferFrom(spender, caller, this.settings.ledger.treasuryAddress, amount);
    this.tx.state.metrics.depositsAccepted += 1;
    this.tx.emit('proposal.deposit', { from: caller, asset, requested: amount.toString(), received: amount.toString() });
    return { asset, requested: amount, received: amount, accepted: true };
  }
}
