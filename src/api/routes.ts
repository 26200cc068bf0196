import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import type { ProposalDraft } from '../domain/governance/governanceEngine.js';
import { PROPOSAL_KINDS, ProposalKind } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { StateStore } from '../infra/storage/stateStore.js';
import type { AssetService } from '../services/assetService.js';
import type { GovernanceService } from '../services/governanceService.js';
import type { MerchantService } from '../services/merchantService.js';
import type { RuntimeMetrics } from '../types.js';
import { toWire } from '../utils/json.js';
import { isReservedKey } from '../utils/records.js';
import { resolveCaller } from './auth.js';

interface RouteDeps {
  config: AppConfig;
  store: StateStore;
  governanceService: GovernanceService;
  merchantService: MerchantService;
  assetService: AssetService;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const amount = z.string().regex(/^\d+$/, 'expected a non-negative integer string').transform((value) => BigInt(value));
const account = z.string().min(1).max(128).refine((value) => !isReservedKey(value), 'reserved name');

const kindSchema = z.enum([
  ProposalKind.AddMerchant,
  ProposalKind.ModifyMerchant,
  ProposalKind.ChangeParameter,
  ProposalKind.WithdrawFunds,
]);

interface ProposalRequest {
  proposal: ProposalDraft;
  deposit?: bigint;
}

const proposalSchemas: Record<ProposalKind, z.ZodType<ProposalRequest, z.ZodTypeDef, unknown>> = {
  add_merchant: z.object({
    merchant: account,
    name: z.string().min(1).max(120),
    printQuota: amount,
    deposit: amount.optional(),
  }).transform(({ deposit, ...fields }) => ({
    deposit,
    proposal: { kind: ProposalKind.AddMerchant, ...fields },
  })),
  modify_merchant: z.object({
    merchant: account,
    guardian: account,
    frozen: z.boolean(),
    printQuota: amount,
    rebate: z.number().int().nonnegative(),
    deposit: amount.optional(),
  }).transform(({ deposit, ...fields }) => ({
    deposit,
    proposal: { kind: ProposalKind.ModifyMerchant, ...fields },
  })),
  change_parameter: z.object({
    majorityPercentage: z.number(),
    deposit: amount.optional(),
  }).transform(({ deposit, ...fields }) => ({
    deposit,
    proposal: { kind: ProposalKind.ChangeParameter, ...fields },
  })),
  withdraw_funds: z.object({
    asset: z.string().min(1).max(32).refine((value) => !isReservedKey(value), 'reserved name'),
    beneficiary: account.optional(),
    deposit: amount.optional(),
  }).transform(({ deposit, ...fields }) => ({
    deposit,
    proposal: { kind: ProposalKind.WithdrawFunds, ...fields },
  })),
};

const historyQuerySchema = z.object({
  kind: kindSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

const merchantUpdateSchema = z.object({
  guardian: account.optional(),
  frozen: z.boolean().optional(),
  printQuota: amount.optional(),
  rebate: z.number().int().nonnegative().optional(),
}).refine((update) => Object.values(update).some((value) => value !== undefined), {
  message: 'at least one field required',
});

const mintSchema = z.object({ user: account, amount });
const paymentSchema = z.object({ user: account, amount });
const transferSchema = z.object({ to: account, amount });
const approvalSchema = z.object({ spender: account, amount });

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, error: z.ZodError, message = 'Invalid request payload.'): FastifyReply => (
  reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()))
);

const parseKind = (reply: FastifyReply, raw: unknown): ProposalKind | null => {
  const parse = kindSchema.safeParse(raw);
  if (!parse.success) {
    void reply.code(404).send(toErrorEnvelope(
      ErrorCode.InvalidPayload,
      `Unknown proposal kind. Expected one of ${PROPOSAL_KINDS.join(', ')}.`,
    ));
    return null;
  }
  return parse.data;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/health', async () => ({
    name: deps.config.app.name,
    status: 'ok',
    env: deps.config.app.env,
    uptimeSeconds: deps.getRuntimeMetrics().uptimeSeconds,
  }));

  app.get('/metrics', async () => toWire({
    state: deps.store.snapshot().metrics,
    runtime: deps.getRuntimeMetrics(),
  }));

  // ─── Governance ───────────────────────────────────────────────────────

  app.get('/governance/parameters', async () => toWire(deps.governanceService.parameters()));

  app.get('/governance/proposals', async () => toWire({
    proposals: deps.governanceService.listSlots(),
  }));

  app.get('/governance/proposals/:kind', async (request, reply) => {
    const kind = parseKind(reply, (request.params as { kind: string }).kind);
    if (!kind) return undefined;
    return toWire(deps.governanceService.getSlot(kind));
  });

  app.post('/governance/proposals/:kind', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const kind = parseKind(reply, (request.params as { kind: string }).kind);
    if (!kind) return undefined;

    const parse = proposalSchemas[kind].safeParse(request.body ?? {});
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      const result = await deps.governanceService.initiate({
        caller,
        proposal: parse.data.proposal,
        deposit: parse.data.deposit,
      });
      return reply.code(201).send(toWire({
        proposal: result.slot,
        weight: result.weight,
        threshold: result.threshold,
        executed: result.effect !== null,
        effect: result.effect,
        superseded: result.superseded,
      }));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/governance/proposals/:kind/votes', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const kind = parseKind(reply, (request.params as { kind: string }).kind);
    if (!kind) return undefined;

    try {
      const result = await deps.governanceService.vote(kind, caller);
      return toWire({
        proposal: result.slot,
        weight: result.weight,
        threshold: result.threshold,
        executed: result.effect !== null,
        effect: result.effect,
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/governance/history', async (request, reply) => {
    const parse = historyQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, parse.error, 'Invalid query params.');
    return toWire({ history: deps.governanceService.history(parse.data) });
  });

  // ─── Merchants ────────────────────────────────────────────────────────

  app.get('/merchants', async () => toWire({ merchants: deps.merchantService.list() }));

  app.get('/merchants/:address', async (request, reply) => {
    const { address } = request.params as { address: string };
    const merchant = deps.merchantService.get(address);
    if (!merchant) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.NotRegisteredMerchant, 'Merchant not found.'));
    }
    return toWire(merchant);
  });

  app.patch('/merchants/:address', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { address } = request.params as { address: string };
    const parse = merchantUpdateSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      return toWire(await deps.merchantService.modify(caller, address, parse.data));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.delete('/merchants/:address', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { address } = request.params as { address: string };
    try {
      return toWire(await deps.merchantService.remove(caller, address));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/merchants/:address/mint', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { address } = request.params as { address: string };
    if (caller !== address) {
      return reply.code(403).send(toErrorEnvelope(ErrorCode.Unauthorized, 'Only the merchant itself may mint.'));
    }

    const parse = mintSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      return toWire(await deps.merchantService.mint(caller, parse.data.user, parse.data.amount));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/merchants/:address/payments', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { address } = request.params as { address: string };
    if (caller !== address) {
      return reply.code(403).send(toErrorEnvelope(ErrorCode.Unauthorized, 'Only the merchant itself may take payments.'));
    }

    const parse = paymentSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      return toWire(await deps.merchantService.pay(caller, parse.data.user, parse.data.amount));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Assets ───────────────────────────────────────────────────────────

  app.get('/assets', async () => ({ assets: deps.assetService.list() }));

  app.get('/assets/:asset', async (request, reply) => {
    const { asset } = request.params as { asset: string };
    try {
      return toWire(deps.assetService.describe(asset));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/assets/:asset/balances/:account', async (request, reply) => {
    const params = request.params as { asset: string; account: string };
    try {
      return toWire({
        asset: params.asset,
        account: params.account,
        balance: deps.assetService.balanceOf(params.asset, params.account),
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/assets/:asset/transfers', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { asset } = request.params as { asset: string };
    const parse = transferSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      await deps.assetService.transfer(caller, asset, parse.data.to, parse.data.amount);
      return toWire({
        asset,
        from: caller,
        to: parse.data.to,
        amount: parse.data.amount,
        balance: deps.assetService.balanceOf(asset, caller),
      });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/assets/:asset/approvals', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return undefined;

    const { asset } = request.params as { asset: string };
    const parse = approvalSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      await deps.assetService.approve(caller, asset, parse.data.spender, parse.data.amount);
      return toWire({ asset, owner: caller, spender: parse.data.spender, amount: parse.data.amount });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });
}
