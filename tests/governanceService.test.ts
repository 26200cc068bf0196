import { describe, expect, it } from 'vitest';
import { createHarness, T0, vote, WEEK_MS } from './harness.js';

const addShop = { kind: 'add_merchant', merchant: 'shop', name: 'Shop', printQuota: 500n } as const;

describe('GovernanceService initiation and voting', () => {
  it('executes once accumulated weight reaches the threshold', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('bob', 60n), vote('carol', 840n)] });

    const opened = await h.governance.initiate({ caller: 'alice', proposal: addShop });
    expect(opened.weight).toBe(100n);
    expect(opened.threshold).toBe(150n);
    expect(opened.effect).toBeNull();
    expect(opened.slot).toMatchObject({
      round: 1,
      active: true,
      accumulatedPower: 100n,
      initiator: 'alice',
      openedAt: T0,
      deadline: T0 + WEEK_MS,
    });
    expect(h.merchants.get('shop')).toBeNull();

    h.events.length = 0;
    const voted = await h.governance.vote('add_merchant', 'bob');

    expect(voted.weight).toBe(60n);
    expect(voted.slot.accumulatedPower).toBe(160n);
    expect(voted.slot.active).toBe(false);
    expect(voted.effect).toMatchObject({
      kind: 'add_merchant',
      merchant: { address: 'shop', name: 'Shop', printQuota: 500n, guardian: 'alice' },
    });
    expect(h.events.map((event) => event.type)).toEqual([
      'proposal.vote_cast',
      'merchant.added',
      'proposal.executed',
      'proposal.ended',
    ]);
    expect(h.events[3].data).toEqual({ kind: 'add_merchant', round: 1, executed: true });

    const [record] = h.governance.history();
    expect(record).toMatchObject({ kind: 'add_merchant', round: 1, outcome: 'executed', accumulatedPower: 160n });
    expect(h.store.snapshot().metrics).toMatchObject({ proposalsInitiated: 1, votesCast: 2, proposalsExecuted: 1 });
  });

  it('executes at initiation when the initiator alone meets the threshold', async () => {
    const h = createHarness({ genesis: [vote('alice', 200n), vote('carol', 800n)] });

    const result = await h.governance.initiate({
      caller: 'alice',
      proposal: { kind: 'change_parameter', majorityPercentage: 20 },
    });

    expect(result.effect).toEqual({ kind: 'change_parameter', previous: 15, next: 20 });
    expect(result.slot.active).toBe(false);
    expect(h.governance.parameters()).toMatchObject({ majorityPercentage: 20, totalWeight: 1000n, threshold: 200n });
  });

  it('rejects voting after the deadline and lets a new round start', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('bob', 20n), vote('carol', 880n)] });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    h.time.set(T0 + WEEK_MS);
    const atDeadline = await h.governance.vote('add_merchant', 'bob');
    expect(atDeadline.slot.accumulatedPower).toBe(120n);
    expect(h.governance.getSlot('add_merchant').status).toBe('voting');

    h.time.set(T0 + WEEK_MS + 1);
    expect(h.governance.getSlot('add_merchant').status).toBe('expired');
    await expect(h.governance.vote('add_merchant', 'carol')).rejects.toMatchObject({
      code: 'proposal_expired',
      statusCode: 409,
    });

    const reopened = await h.governance.initiate({ caller: 'alice', proposal: addShop });

    expect(reopened.slot).toMatchObject({ round: 2, active: true, accumulatedPower: 100n, openedAt: T0 + WEEK_MS + 1 });
    expect(reopened.superseded).toMatchObject({ round: 1, outcome: 'expired', accumulatedPower: 120n });
    expect(Object.keys(h.store.snapshot().governance.votes)).toEqual(['add_merchant:2:alice']);
    expect(h.store.snapshot().metrics.proposalsExpired).toBe(1);
    expect(h.events).toContainEqual({ type: 'proposal.ended', data: { kind: 'add_merchant', round: 1, executed: false } });
  });

  it('refuses a second open proposal of the same kind but not of another kind', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('bob', 60n), vote('carol', 840n)] });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    await expect(h.governance.initiate({
      caller: 'bob',
      proposal: { ...addShop, merchant: 'other' },
    })).rejects.toMatchObject({ code: 'proposal_already_active' });

    const other = await h.governance.initiate({
      caller: 'bob',
      proposal: { kind: 'change_parameter', majorityPercentage: 25 },
    });
    expect(other.slot).toMatchObject({ kind: 'change_parameter', round: 1, active: true });
  });

  it('counts each voter once per round', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    await expect(h.governance.vote('add_merchant', 'alice')).rejects.toMatchObject({ code: 'already_voted' });
    expect(h.governance.getSlot('add_merchant').voters).toEqual(['alice']);
  });

  it('requires voting weight and an open round', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });

    await expect(h.governance.vote('add_merchant', 'alice')).rejects.toMatchObject({ code: 'no_active_proposal' });
    await expect(h.governance.initiate({ caller: 'mallory', proposal: addShop })).rejects.toMatchObject({
      code: 'unauthorized',
      statusCode: 403,
    });

    await h.governance.initiate({ caller: 'alice', proposal: addShop });
    await expect(h.governance.vote('add_merchant', 'mallory')).rejects.toMatchObject({ code: 'unauthorized' });
    expect(h.audit.counts().rejectionsByCode).toEqual({ no_active_proposal: 1, unauthorized: 2 });
  });

  it('validates payloads when the proposal is opened', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });
    h.addMerchant('shop', 10n);

    await expect(h.governance.initiate({ caller: 'alice', proposal: addShop })).rejects.toMatchObject({
      code: 'duplicate_merchant',
    });
    await expect(h.governance.initiate({
      caller: 'alice',
      proposal: { kind: 'modify_merchant', merchant: 'ghost', guardian: 'alice', frozen: false, printQuota: 1n, rebate: 0 },
    })).rejects.toMatchObject({ code: 'not_registered_merchant' });

    for (const majorityPercentage of [0, 31, 12.5]) {
      await expect(h.governance.initiate({
        caller: 'alice',
        proposal: { kind: 'change_parameter', majorityPercentage },
      })).rejects.toMatchObject({ code: 'parameter_out_of_range', statusCode: 422 });
    }

    expect(h.governance.listSlots().every((slot) => slot.round === 0 && slot.status === 'idle')).toBe(true);
  });
});

describe('GovernanceService weight and threshold', () => {
  it('reads the threshold from the live total weight', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('bob', 60n), vote('carol', 840n)] });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    h.store.transaction((tx) => h.assets.voting(tx).mint('dave', 1_000n));
    const voted = await h.governance.vote('add_merchant', 'bob');

    expect(voted.threshold).toBe(300n);
    expect(voted.effect).toBeNull();
    expect(voted.slot.accumulatedPower).toBe(160n);
  });

  it('counts live balances, so weight moved between accounts counts again', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    await h.assetService.transfer('alice', 'VOTE', 'dave', 100n);
    const voted = await h.governance.vote('add_merchant', 'dave');

    expect(voted.weight).toBe(100n);
    expect(voted.slot.accumulatedPower).toBe(200n);
  });

  it('executes when accumulated weight equals the threshold exactly', async () => {
    const h = createHarness({
      genesis: [vote('alice', 100n), vote('bob', 49n), vote('dave', 1n), vote('carol', 850n)],
    });
    await h.governance.initiate({ caller: 'alice', proposal: addShop });

    const below = await h.governance.vote('add_merchant', 'bob');
    expect(below.threshold).toBe(150n);
    expect(below.slot.accumulatedPower).toBe(149n);
    expect(below.effect).toBeNull();
    expect(below.slot.active).toBe(true);

    const exact = await h.governance.vote('add_merchant', 'dave');
    expect(exact.slot.accumulatedPower).toBe(150n);
    expect(exact.effect).toMatchObject({ kind: 'add_merchant', merchant: { address: 'shop' } });
    expect(h.merchants.get('shop')).not.toBeNull();
  });

  it('gives no weight to accounts named after inherited object properties', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });

    for (const caller of ['constructor', 'toString', 'hasOwnProperty']) {
      await expect(h.governance.initiate({
        caller,
        proposal: { kind: 'add_merchant', merchant: 'intruder', name: 'Intruder', printQuota: 1_000_000n },
      })).rejects.toMatchObject({ code: 'unauthorized' });
    }

    await h.governance.initiate({ caller: 'alice', proposal: addShop });
    await expect(h.governance.vote('add_merchant', 'constructor')).rejects.toMatchObject({ code: 'unauthorized' });

    expect(h.merchants.get('intruder')).toBeNull();
    expect(h.governance.getSlot('add_merchant')).toMatchObject({ round: 1, accumulatedPower: 100n, voters: ['alice'] });
  });
});

describe('GovernanceService deposits', () => {
  it('pulls an approved deposit into the treasury after reading the initiator weight', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });
    await h.assetService.approve('alice', 'VOTE', 'governance', 10n);

    const result = await h.governance.initiate({ caller: 'alice', proposal: addShop, deposit: 10n });

    expect(result.weight).toBe(100n);
    expect(result.slot.deposit).toEqual({ asset: 'VOTE', requested: 10n, received: 10n, accepted: true });
    expect(h.balance('VOTE', 'alice')).toBe(90n);
    expect(h.balance('VOTE', 'ledger-treasury')).toBe(10n);
    expect(h.store.snapshot().metrics.depositsAccepted).toBe(1);
  });

  it('opens the proposal anyway when the deposit is not covered', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n), vote('carol', 900n)] });

    const result = await h.governance.initiate({ caller: 'alice', proposal: addShop, deposit: 10n });

    expect(result.slot.active).toBe(true);
    expect(result.slot.deposit).toEqual({ asset: 'VOTE', requested: 10n, received: 0n, accepted: false });
    expect(h.balance('VOTE', 'alice')).toBe(100n);
    expect(h.store.snapshot().metrics.depositsSkipped).toBe(1);
    expect(h.events).toContainEqual({
      type: 'proposal.deposit',
      data: { from: 'alice', asset: 'VOTE', requested: '10', received: '0' },
    });
  });
});

describe('GovernanceService execution', () => {
  it('withdraws treasury funds to the initiator when no beneficiary is given', async () => {
    const h = createHarness({
      genesis: [vote('alice', 200n), vote('carol', 780n), vote('ledger-treasury', 20n)],
    });

    const result = await h.governance.initiate({ caller: 'alice', proposal: { kind: 'withdraw_funds', asset: 'VOTE' } });

    expect(result.effect).toEqual({
      kind: 'withdraw_funds',
      withdrawal: { asset: 'VOTE', beneficiary: 'alice', amount: 20n },
    });
    expect(h.balance('VOTE', 'alice')).toBe(220n);
    expect(h.governance.history()[0].payload).toEqual({ kind: 'withdraw_funds', asset: 'VOTE', beneficiary: 'alice' });
  });

  it('rolls the whole call back when the passed action fails', async () => {
    const h = createHarness({ genesis: [vote('alice', 200n), vote('carol', 800n)] });

    await expect(h.governance.initiate({
      caller: 'alice',
      proposal: { kind: 'withdraw_funds', asset: 'CREDIT', beneficiary: 'bob' },
    })).rejects.toMatchObject({ code: 'invalid_amount' });

    expect(h.governance.getSlot('withdraw_funds')).toMatchObject({ round: 0, active: false, status: 'idle' });
    expect(h.store.snapshot().metrics.proposalsInitiated).toBe(0);
    expect(h.events).toEqual([]);
  });

  it('reports a withdrawal of an asset named after an inherited property as withdraw_failed', async () => {
    const h = createHarness({ genesis: [vote('alice', 200n), vote('carol', 800n)] });

    await expect(h.governance.initiate({
      caller: 'alice',
      proposal: { kind: 'withdraw_funds', asset: 'toString' },
    })).rejects.toMatchObject({ code: 'withdraw_failed', statusCode: 502, details: { asset: 'toString', cause: 'unknown_asset' } });

    expect(h.governance.getSlot('withdraw_funds')).toMatchObject({ round: 0, active: false });
  });

  it('applies a modify_merchant proposal as a controller', async () => {
    const h = createHarness({ genesis: [vote('alice', 200n), vote('carol', 800n)] });
    h.addMerchant('shop', 10n, 'keeper');

    await h.governance.initiate({
      caller: 'alice',
      proposal: { kind: 'modify_merchant', merchant: 'shop', guardian: 'new-keeper', frozen: true, printQuota: 40n, rebate: 5 },
    });

    expect(h.merchants.get('shop')).toMatchObject({ guardian: 'new-keeper', frozen: true, printQuota: 40n, rebate: 5 });
  });
});

describe('GovernanceService history', () => {
  it('keeps the newest closed rounds up to the limit', async () => {
    const h = createHarness({
      genesis: [vote('alice', 400n), vote('carol', 600n)],
      governance: { historyLimit: 2 },
    });

    for (const majorityPercentage of [20, 25, 30]) {
      await h.governance.initiate({ caller: 'alice', proposal: { kind: 'change_parameter', majorityPercentage } });
    }

    expect(h.governance.history().map((record) => record.round)).toEqual([3, 2]);
    expect(h.governance.history({ limit: 1 }).map((record) => record.round)).toEqual([3]);
    expect(h.governance.history({ kind: 'add_merchant' })).toEqual([]);
  });

  it('logs rejected calls as warnings', async () => {
    const h = createHarness({ genesis: [vote('alice', 100n)] });

    await expect(h.governance.vote('withdraw_funds', 'alice')).rejects.toMatchObject({ code: 'no_active_proposal' });

    const last = h.logger.entries().at(-1);
    expect(last).toMatchObject({
      level: 'warn',
      event: 'governance.vote.rejected',
      data: { kind: 'withdraw_funds', caller: 'alice', code: 'no_active_proposal' },
    });
  });
});
