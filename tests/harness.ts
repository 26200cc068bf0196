import type { GenesisAllocation } from '../src/config.js';
import type { GovernanceSettings } from '../src/domain/governance/governanceEngine.js';
import { MerchantLedger, type LedgerSettings } from '../src/domain/ledger/merchantLedger.js';
import { AssetRegistry } from '../src/domain/token/assetRegistry.js';
import { EventBus, type EventType } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { createDefaultState } from '../src/infra/storage/defaultState.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { AssetService } from '../src/services/assetService.js';
import { AuditTrail } from '../src/services/auditTrail.js';
import { GovernanceService } from '../src/services/governanceService.js';
import { MerchantService } from '../src/services/merchantService.js';
import { ownValue } from '../src/utils/records.js';

export const T0 = 1_700_000_000_000;
export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export const ledgerSettings: LedgerSettings = {
  ownerAddress: 'owner',
  governanceAddress: 'governance',
  treasuryAddress: 'ledger-treasury',
  rebateCeiling: 10,
  registrationGrant: 0n,
};

export const governanceSettings: GovernanceSettings = {
  governanceAddress: 'governance',
  votingWindowMs: WEEK_MS,
  maxMajorityPercentage: 30,
  depositAsset: 'VOTE',
  historyLimit: 200,
  ledger: ledgerSettings,
};

export interface HarnessOptions {
  genesis?: GenesisAllocation[];
  majorityPercentage?: number;
  ledger?: Partial<LedgerSettings>;
  governance?: Partial<Omit<GovernanceSettings, 'ledger'>>;
}

export const vote = (account: string, amount: bigint): GenesisAllocation => ({ asset: 'VOTE', account, amount });
export const credit = (account: string, amount: bigint): GenesisAllocation => ({ asset: 'CREDIT', account, amount });

/**
 * Wires an in-memory store, a private event bus and every service around a
 * hand-driven clock.
 */
export function createHarness(options: HarnessOptions = {}) {
  let now = T0;
  const time = {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };

  const bus = new EventBus();
  const assets = new AssetRegistry({ votingAsset: 'VOTE', ledgerAsset: 'CREDIT', nativeAsset: 'native' });
  const store = new StateStore({
    stateFilePath: null,
    defaults: () => createDefaultState({
      assets: assets.list(),
      majorityPercentage: options.majorityPercentage ?? 15,
      genesis: options.genesis,
    }),
    clock: time.now,
    bus,
  });

  const ledger: LedgerSettings = { ...ledgerSettings, ...options.ledger };
  const settings: GovernanceSettings = { ...governanceSettings, ...options.governance, ledger };
  const logger = new EventLogger(null);
  const audit = new AuditTrail(logger);

  const events: Array<{ type: EventType; data: unknown }> = [];
  bus.on('*', (type, data) => {
    events.push({ type, data });
  });

  return {
    time,
    bus,
    assets,
    store,
    logger,
    audit,
    events,
    settings,
    governance: new GovernanceService(store, assets, settings, audit),
    merchants: new MerchantService(store, assets, ledger, audit),
    assetService: new AssetService(store, assets, ledger.treasuryAddress, audit),
    /** Registers a merchant directly as the ledger owner. */
    addMerchant: (merchant: string, printQuota: bigint, guardian = 'guardian') => store.transaction((tx) => (
      new MerchantLedger(tx, assets, ledger).add('owner', { merchant, name: merchant, printQuota, guardian })
    )),
    balance: (asset: string, account: string): bigint => {
      const token = ownValue(store.snapshot().assets, asset);
      return (token && ownValue(token.balances, account)) ?? 0n;
    },
  };
}

/** Runs synchronous work and hands back whatever it threw, or null. */
export function thrownBy(work: () => unknown): unknown {
  try {
    work();
  } catch (error) {
    return error;
  }
  return null;
}

export type Harness = ReturnType<typeof createHarness>;
