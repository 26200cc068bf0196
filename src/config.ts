import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseAmount = (input: string | undefined, fallback: bigint): bigint => {
  if (input === undefined || !/^\d+$/.test(input.trim())) return fallback;
  return BigInt(input.trim());
};

/**
 * Majority percentage from the environment: an integer in (0, max].
 * Anything else stops startup.
 */
export const parseMajorityPercentage = (input: string | undefined, fallback: number, max: number): number => {
  if (input === undefined || input.trim() === '') return fallback;
  const n = Number(input);
  if (!Number.isInteger(n) || n <= 0 || n > max) {
    throw new Error(`MAJORITY_PERCENTAGE must be an integer in (0, ${max}], got "${input}".`);
  }
  return n;
};

export interface GenesisAllocation {
  asset: string;
  account: string;
  amount: bigint;
}

/**
 * Parses `asset:account:amount` triples separated by commas.
 * Malformed entries are dropped.
 */
export const parseAllocations = (input: string | undefined): GenesisAllocation[] => {
  if (!input) return [];

  return input
    .split(',')
    .map((entry) => entry.trim().split(':'))
    .flatMap(([asset, account, amount]) => {
      if (!asset || !account || !amount || !/^\d+$/.test(amount)) return [];
      return [{ asset, account, amount: BigInt(amount) }];
    });
};

const SEVEN_DAYS_MS = 7 * 24 * 60 * 60 * 1000;
const MAX_MAJORITY_PERCENTAGE = 30;
/** Highest rebate percentage a merchant may carry. */
export const REBATE_CEILING = 10;

const votingAsset = process.env.VOTING_ASSET ?? 'VOTE';

export const config = {
  app: {
    name: 'quota-ledger',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
    websocketEnabled: parseBool(process.env.WEBSOCKET_ENABLED, true),
  },
  paths: {
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  assets: {
    votingAsset,
    ledgerAsset: process.env.LEDGER_ASSET ?? 'CREDIT',
    nativeAsset: 'native',
    genesis: parseAllocations(process.env.GENESIS_ALLOCATIONS),
  },
  governance: {
    address: process.env.GOVERNANCE_ADDRESS ?? 'governance',
    votingWindowMs: parseNumber(process.env.VOTING_WINDOW_MS, SEVEN_DAYS_MS),
    majorityPercentage: parseMajorityPercentage(process.env.MAJORITY_PERCENTAGE, 15, MAX_MAJORITY_PERCENTAGE),
    maxMajorityPercentage: MAX_MAJORITY_PERCENTAGE,
    depositAsset: process.env.DEPOSIT_ASSET ?? votingAsset,
    historyLimit: parseNumber(process.env.PROPOSAL_HISTORY_LIMIT, 200),
  },
  ledger: {
    ownerAddress: process.env.LEDGER_OWNER ?? 'owner',
    treasuryAddress: process.env.LEDGER_TREASURY ?? 'ledger-treasury',
    rebateCeiling: REBATE_CEILING,
    registrationGrant: parseAmount(process.env.REGISTRATION_GRANT, 0n),
  },
};

export type AppConfig = typeof config;
