// ─── quota-ledger: SDK Quick-Start ────────────────────────────────────────
// Full flow: propose merchant → vote → mint to a user → user pays → inspect counters
//
// Assumes the server was started with genesis voting weight, e.g.
//   GENESIS_ALLOCATIONS=VOTE:alice:600,VOTE:bob:400
//
// Usage:
//   npm run quickstart                                     # uses localhost:8787
//   API_URL=https://your-server.com npm run quickstart
// ────────────────────────────────────────────────────────────────────────────

import { QuotaLedgerAPIError, QuotaLedgerClient } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';

async function main(): Promise<void> {
  console.log(`\nquota-ledger quick-start`);
  console.log(`   API: ${API_URL}\n`);

  const client = new QuotaLedgerClient({ baseUrl: API_URL });
  const alice = client.as('alice');
  const bob = client.as('bob');
  const shop = client.as('corner-shop');

  const health = await client.health();
  console.log(`Health: ${health.status} (${health.env})`);

  const params = await client.parameters();
  console.log(`Threshold: ${params.threshold} of ${params.totalWeight} (${params.majorityPercentage}%)`);

  // ── 1. Propose a merchant and gather votes ────────────────────────────
  const opened = await alice.initiate('add_merchant', {
    merchant: 'corner-shop',
    name: 'Corner Shop',
    printQuota: '1000',
  });
  console.log(`Proposal round ${opened.proposal.round} opened, executed=${opened.executed}`);

  if (!opened.executed) {
    const voted = await bob.vote('add_merchant');
    console.log(`Bob voted with ${voted.weight}; executed=${voted.executed}`);
  }

  // ── 2. Mint and take a payment ────────────────────────────────────────
  const minted = await shop.mint('carol', '250');
  console.log(`Minted ${minted.amount} to ${minted.user}; headroom ${minted.headroom}`);

  const paid = await shop.pay('carol', '100');
  console.log(`Carol paid ${paid.amount}; burned ${paid.burned}, rebate ${paid.rebateAmount}`);

  const merchant = await client.getMerchant('corner-shop');
  console.log(`Counters: cash=${merchant.totalCashReceived} recycled=${merchant.totalRecycled} outstanding=${merchant.outstanding}`);
}

main().catch((error) => {
  if (error instanceof QuotaLedgerAPIError) {
    console.error(`API error ${error.status} ${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
