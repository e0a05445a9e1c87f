// ---------------------------------------------------------------------------
// GoCardless Client – Main Client
// ---------------------------------------------------------------------------
// The primary entry point: `client.mandates.create(…)`, one lazily created
// service per API resource, all sharing a single HTTP transport.
// ---------------------------------------------------------------------------

import { HttpClient } from "./http";
import { BankDetailsLookupsService } from "./resources/bank-details-lookups";
import {
  CustomerBankAccountsService,
} from "./resources/customer-bank-accounts";
import { CustomersService } from "./resources/customers";
import { MandatesService } from "./resources/mandates";
import { PaymentsService } from "./resources/payments";
import { RedirectFlowsService } from "./resources/redirect-flows";
import { WebhooksResource } from "./resources/webhooks";
import type { GoCardlessConfig } from "./types";

/**
 * The GoCardless API client.
 *
 * @example
 * ```ts
 * import { GoCardlessClient } from 'gocardless-client';
 *
 * const client = new GoCardlessClient({
 *   accessToken: process.env.GOCARDLESS_ACCESS_TOKEN,
 *   environment: 'sandbox',
 * });
 *
 * const flow = await client.redirectFlows.create({
 *   session_token: 'session-1',
 *   success_redirect_url: 'https://example.com/confirm',
 * });
 * ```
 *
 * @example
 * ```ts
 * // Walk every active mandate, one page at a time under the hood
 * for await (const mandate of client.mandates.all({ status: ['active'] })) {
 *   console.log(mandate.reference);
 * }
 * ```
 */
export class GoCardlessClient {
  /** Shared transport for every service. */
  private readonly http: HttpClient;

  /**
   * Static webhook verification utility; needs no client instance.
   *
   * @example
   * ```ts
   * const events = GoCardlessClient.webhooks.parse(
   *   rawBody,
   *   req.headers['webhook-signature'],
   *   process.env.GOCARDLESS_WEBHOOK_SECRET,
   * );
   * ```
   */
  static readonly webhooks = new WebhooksResource();

  // ── Services (lazy-initialised) ──────────────────────────────────────────
  private _customers?: CustomersService;
  private _customerBankAccounts?: CustomerBankAccountsService;
  private _mandates?: MandatesService;
  private _payments?: PaymentsService;
  private _redirectFlows?: RedirectFlowsService;
  private _bankDetailsLookups?: BankDetailsLookupsService;

  /**
   * @param config - Only `accessToken` is required.
   * @throws {InvalidApiUsageError} if the access token is blank.
   */
  constructor(config: GoCardlessConfig) {
    this.http = new HttpClient(config);
  }

  // ── Service accessors ────────────────────────────────────────────────────

  /** Contact details for your customers. */
  get customers(): CustomersService {
    if (!this._customers) {
      this._customers = new CustomersService(this.http);
    }
    return this._customers;
  }

  /** Bank accounts belonging to your customers. */
  get customerBankAccounts(): CustomerBankAccountsService {
    if (!this._customerBankAccounts) {
      this._customerBankAccounts = new CustomerBankAccountsService(this.http);
    }
    return this._customerBankAccounts;
  }

  /** Direct Debit mandates. */
  get mandates(): MandatesService {
    if (!this._mandates) {
      this._mandates = new MandatesService(this.http);
    }
    return this._mandates;
  }

  get payments(): PaymentsService {
    if (!this._payments) {
      this._payments = new PaymentsService(this.http);
    }
    return this._payments;
  }

  /** Hosted payment pages for setting up mandates. */
  get redirectFlows(): RedirectFlowsService {
    if (!this._redirectFlows) {
      this._redirectFlows = new RedirectFlowsService(this.http);
    }
    return this._redirectFlows;
  }

  get bankDetailsLookups(): BankDetailsLookupsService {
    if (!this._bankDetailsLookups) {
      this._bankDetailsLookups = new BankDetailsLookupsService(this.http);
    }
    return this._bankDetailsLookups;
  }
}
