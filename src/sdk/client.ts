// ─── QuotaLedgerClient ─────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the quota-ledger API.
// Works in Node.js 18+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  AssetSummary,
  BalanceResponse,
  GovernanceParameters,
  HealthResponse,
  InitiateResponse,
  Merchant,
  MerchantUpdate,
  MintReceipt,
  PaymentReceipt,
  ProposalInputs,
  ProposalKind,
  ProposalRecord,
  SlotView,
  VoteResponse,
} from './types.js';

export class QuotaLedgerAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'QuotaLedgerAPIError';
  }
}

export interface QuotaLedgerClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Account the client acts as; sent as x-caller-address. */
  caller?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (body: unknown): body is APIErrorEnvelope => (
  typeof body === 'object'
  && body !== null
  && 'error' in body
  && typeof body.error === 'object'
  && body.error !== null
);

export class QuotaLedgerClient {
  private readonly baseUrl: string;
  private readonly caller?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(opts: QuotaLedgerClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.caller = opts.caller;
    this._fetch = opts.fetch ?? globalThis.fetch;
  }

  /** Same server, different acting account. */
  as(caller: string): QuotaLedgerClient {
    return new QuotaLedgerClient({ baseUrl: this.baseUrl, caller, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(hasBody: boolean): Record<string, string> {
    const h: Record<string, string> = hasBody ? { 'content-type': 'application/json' } : {};
    if (this.caller) h['x-caller-address'] = this.caller;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: unknown;
      try {
        errorBody = await res.json();
      } catch {
        errorBody = undefined;
      }
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new QuotaLedgerAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  // ─── Governance ───────────────────────────────────────────────────────

  async parameters(): Promise<GovernanceParameters> {
    return this.request<GovernanceParameters>('GET', '/governance/parameters');
  }

  async listProposals(): Promise<SlotView[]> {
    const result = await this.request<{ proposals: SlotView[] }>('GET', '/governance/proposals');
    return result.proposals;
  }

  async getProposal(kind: ProposalKind): Promise<SlotView> {
    return this.request<SlotView>('GET', `/governance/proposals/${kind}`);
  }

  /**
   * Initiate a proposal as the client's caller. `deposit` is optional and
   * best-effort: without allowance the proposal still opens.
   */
  async initiate<K extends ProposalKind>(
    kind: K,
    input: ProposalInputs[K],
    opts?: { deposit?: string },
  ): Promise<InitiateResponse> {
    return this.request<InitiateResponse>('POST', `/governance/proposals/${kind}`, {
      ...input,
      ...(opts?.deposit === undefined ? {} : { deposit: opts.deposit }),
    });
  }

  async vote(kind: ProposalKind): Promise<VoteResponse> {
    return this.request<VoteResponse>('POST', `/governance/proposals/${kind}/votes`, {});
  }

  async history(opts?: { kind?: ProposalKind; limit?: number }): Promise<ProposalRecord[]> {
    const params = new URLSearchParams();
    if (opts?.kind) params.set('kind', opts.kind);
    if (opts?.limit) params.set('limit', String(opts.limit));
    const qs = params.toString();

    const result = await this.request<{ history: ProposalRecord[] }>('GET', `/governance/history${qs ? `?${qs}` : ''}`);
    return result.history;
  }

  // ─── Merchants ────────────────────────────────────────────────────────

  async listMerchants(): Promise<Merchant[]> {
    const result = await this.request<{ merchants: Merchant[] }>('GET', '/merchants');
    return result.merchants;
  }

  async getMerchant(address: string): Promise<Merchant> {
    return this.request<Merchant>('GET', `/merchants/${encodeURIComponent(address)}`);
  }

  async modifyMerchant(address: string, update: MerchantUpdate): Promise<Merchant> {
    return this.request<Merchant>('PATCH', `/merchants/${encodeURIComponent(address)}`, update);
  }

  async removeMerchant(address: string): Promise<Merchant> {
    return this.request<Merchant>('DELETE', `/merchants/${encodeURIComponent(address)}`);
  }

  /** Mint as the client's caller, which must be the merchant. */
  async mint(user: string, amount: string): Promise<MintReceipt> {
    return this.request<MintReceipt>('POST', `/merchants/${encodeURIComponent(this.caller ?? '')}/mint`, { user, amount });
  }

  /** Take a payment as the client's caller, which must be the merchant. */
  async pay(user: string, amount: string): Promise<PaymentReceipt> {
    return this.request<PaymentReceipt>('POST', `/merchants/${encodeURIComponent(this.caller ?? '')}/payments`, { user, amount });
  }

  // ─── Assets ───────────────────────────────────────────────────────────

  async getAsset(asset: string): Promise<AssetSummary> {
    return this.request<AssetSummary>('GET', `/assets/${encodeURIComponent(asset)}`);
  }

  async balanceOf(asset: string, account: string): Promise<string> {
    const result = await this.request<BalanceResponse>(
      'GET',
      `/assets/${encodeURIComponent(asset)}/balances/${encodeURIComponent(account)}`,
    );
    return result.balance;
  }

  async transfer(asset: string, to: string, amount: string): Promise<void> {
    await this.request('POST', `/assets/${encodeURIComponent(asset)}/transfers`, { to, amount });
  }

  async approve(asset: string, spender: string, amount: string): Promise<void> {
    await this.request('POST', `/assets/${encodeURIComponent(asset)}/approvals`, { spender, amount });
  }

  // ─── System ───────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>('GET', '/health');
  }
}
