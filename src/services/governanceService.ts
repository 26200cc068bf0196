/**
 * Governance service.
 *
 * Entry points for initiating and voting on proposals. Each call is one
 * store transaction: it either commits in full or leaves nothing behind.
 */

import type { AppConfig } from '../config.js';
import {
  GovernanceEngine,
  type GovernanceSettings,
  type InitiationResult,
  type ProposalDraft,
  type VoteResult,
} from '../domain/governance/governanceEngine.js';
import {
  PROPOSAL_KINDS,
  type GovernanceState,
  type ProposalKind,
  type ProposalRecord,
  type SlotView,
} from '../domain/governance/governanceTypes.js';
import { slotStatus, votersOf } from '../domain/governance/proposalSlot.js';
import { passThreshold } from '../domain/governance/votingPower.js';
import type { AssetRegistry } from '../domain/token/assetRegistry.js';
import type { StateStore } from '../infra/storage/stateStore.js';
import type { AppState } from '../types.js';
import { ownValue } from '../utils/records.js';
import type { AuditTrail } from './auditTrail.js';

export interface InitiateProposalInput {
  caller: string;
  proposal: ProposalDraft;
  deposit?: bigint;
}

export interface GovernanceParameters {
  majorityPercentage: number;
  maxMajorityPercentage: number;
  votingWindowMs: number;
  votingAsset: string;
  depositAsset: string;
  totalWeight: bigint;
  threshold: bigint;
}

export const governanceSettingsFrom = (config: AppConfig): GovernanceSettings => ({
  governanceAddress: config.governance.address,
  votingWindowMs: config.governance.votingWindowMs,
  maxMajorityPercentage: config.governance.maxMajorityPercentage,
  depositAsset: config.governance.depositAsset,
  historyLimit: config.governance.historyLimit,
  ledger: {
    ownerAddress: config.ledger.ownerAddress,
    governanceAddress: config.governance.address,
    treasuryAddress: config.ledger.treasuryAddress,
    rebateCeiling: config.ledger.rebateCeiling,
    registrationGrant: config.ledger.registrationGrant,
  },
});

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly assets: AssetRegistry,
    private readonly settings: GovernanceSettings,
    private readonly audit: AuditTrail,
  ) {}

  /**
   * Open a proposal of the draft's kind and count the caller's weight.
   * Executes immediately when that weight alone meets the threshold.
   */
  async initiate(input: InitiateProposalInput): Promise<InitiationResult> {
    const context = { caller: input.caller, kind: input.proposal.kind };
    let result: InitiationResult;
    try {
      result = this.store.transaction((tx) => (
        new GovernanceEngine(tx, this.assets, this.settings).initiate(input.caller, input.proposal, input.deposit)
      ));
    } catch (error) {
      await this.audit.rejectedCall('governance.initiate.rejected', error, context);
      throw error;
    }

    await this.audit.accepted('governance.proposal.initiated', {
      ...context,
      round: result.slot.round,
      weight: result.weight.toString(),
      executed: result.effect !== null,
      supersededRound: result.superseded?.round ?? null,
    });
    return result;
  }

  /**
   * Add the caller's live weight to the open round of `kind`.
   */
  async vote(kind: ProposalKind, caller: string): Promise<VoteResult> {
    let result: VoteResult;
    try {
      result = this.store.transaction((tx) => new GovernanceEngine(tx, this.assets, this.settings).vote(kind, caller));
    } catch (error) {
      await this.audit.rejectedCall('governance.vote.rejected', error, { kind, caller });
      throw error;
    }

    await this.audit.accepted('governance.vote.cast', {
      kind,
      caller,
      round: result.slot.round,
      weight: result.weight.toString(),
      accumulatedPower: result.slot.accumulatedPower.toString(),
      executed: result.effect !== null,
    });
    return result;
  }

  listSlots(): SlotView[] {
    return this.store.read((state, now) => PROPOSAL_KINDS.map((kind) => this.view(state, kind, now)));
  }

  getSlot(kind: ProposalKind): SlotView {
    return this.store.read((state, now) => this.view(state, kind, now));
  }

  /**
   * Closed rounds, newest first.
   */
  history(filter?: { kind?: ProposalKind; limit?: number }): ProposalRecord[] {
    return this.store.read((state) => {
      const records = filter?.kind
        ? state.governance.history.filter((record) => record.kind === filter.kind)
        : state.governance.history;
      return [...records].reverse().slice(0, filter?.limit ?? records.length);
    });
  }

  parameters(): GovernanceParameters {
    return this.store.read((state) => {
      const totalWeight = this.totalWeight(state);
      return {
        majorityPercentage: state.governance.majorityPercentage,
        maxMajorityPercentage: this.settings.maxMajorityPercentage,
        votingWindowMs: this.settings.votingWindowMs,
        votingAsset: this.assets.names.votingAsset,
        depositAsset: this.settings.depositAsset,
        totalWeight,
        threshold: passThreshold(totalWeight, state.governance.majorityPercentage),
      };
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private totalWeight(state: AppState): bigint {
    return ownValue(state.assets, this.assets.names.votingAsset)?.totalSupply ?? 0n;
  }

  private view(state: AppState, kind: ProposalKind, now: number): SlotView {
    const governance: GovernanceState = state.governance;
    const slot = governance.slots[kind];
    return {
      ...slot,
      status: slotStatus(slot, now),
      threshold: passThreshold(this.totalWeight(state), governance.majorityPercentage),
      voters: slot.active ? votersOf(governance, slot) : [],
    };
  }
}
