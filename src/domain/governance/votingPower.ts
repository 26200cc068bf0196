import type { TokenBook } from '../token/tokenBook.js';

/**
 * Read-only view of voting weight. Weight is the account's live balance at
 * the moment it is read; nothing is snapshotted at initiation.
 */
export interface VotingPowerSource {
  weight(account: string): bigint;
  totalWeight(): bigint;
}

export const tokenVotingPower = (token: Pick<TokenBook, 'balanceOf' | 'totalSupply'>): VotingPowerSource => ({
  weight: (account) => token.balanceOf(account),
  totalWeight: () => token.totalSupply(),
});

/** Floor of `totalWeight * percentage / 100`. */
export const passThreshold = (totalWeight: bigint, majorityPercentage: number): bigint => (
  (totalWeight * BigInt(majorityPercentage)) / 100n
);
