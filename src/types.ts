// ---------------------------------------------------------------------------
// GoCardless Client – Type Definitions
// ---------------------------------------------------------------------------
// These types mirror the GoCardless Pro REST API (version 2015-07-06) JSON
// shapes exactly, snake_case field names included. Request types describe
// what goes inside the envelope (`{"customers": {...}}`); resource types
// describe what comes back out of it.
// ---------------------------------------------------------------------------

// ── Shared ─────────────────────────────────────────────────────────────────
/** Key-value store of custom data. Up to 3 keys, values up to 500 chars. */
export type Metadata = Record<string, string>;

/** A Direct Debit scheme supported by the API. */
export type Scheme = "autogiro" | "bacs" | "sepa_core";

/** ISO 4217 currencies the API collects in. */
export type Currency = "GBP" | "EUR" | "SEK";

/** Range filter on `created_at`, sent as `created_at[gt]=…` etc. */
export interface CreatedAtFilter {
  gt?: string | Date;
  gte?: string | Date;
  lt?: string | Date;
  lte?: string | Date;
}

/** Cursor parameters common to every list endpoint. */
export interface CursorParams {
  /** Cursor pointing to the start of the desired set. */
  after?: string;
  /** Cursor pointing to the end of the desired set. */
  before?: string;
  /** Number of records to return (max 500). */
  limit?: number;
}

/** Pagination metadata returned alongside list queries. */
export interface ListMeta {
  readonly cursors: {
    readonly before: string | null;
    readonly after: string | null;
  };
  readonly limit: number;
}

/** `meta` as it arrives on the wire; any part of it may be absent. */
export interface ListMetaPayload {
  readonly cursors?: {
    readonly before?: string | null;
    readonly after?: string | null;
  };
  readonly limit?: number;
}

/** One page of a cursor-paginated list endpoint. */
export interface ListResponse<T> {
  readonly data: readonly T[];
  readonly meta: ListMeta;
}

// ── Customers ──────────────────────────────────────────────────────────────
/** Contact details for a customer. */
export interface Customer {
  /** Unique identifier, beginning with "CU". */
  readonly id: string;
  readonly created_at: string;
  readonly email: string | null;
  readonly given_name: string | null;
  readonly family_name: string | null;
  readonly company_name: string | null;
  readonly address_line1: string | null;
  readonly address_line2: string | null;
  readonly address_line3: string | null;
  readonly city: string | null;
  readonly region: string | null;
  readonly postal_code: string | null;
  /** ISO 3166-1 alpha-2 code. */
  readonly country_code: string | null;
  /** ISO 639-1 code used for notification emails. */
  readonly language: string | null;
  readonly swedish_identity_number: string | null;
  readonly metadata: Metadata;
}

/** Fields accepted when creating or updating a customer. */
export interface CustomerCreateParams {
  address_line1?: string;
  address_line2?: string;
  address_line3?: string;
  city?: string;
  /** Required unless `given_name` and `family_name` are provided. */
  company_name?: string;
  country_code?: string;
  email?: string;
  /** Required unless `company_name` is provided. */
  family_name?: string;
  /** Required unless `company_name` is provided. */
  given_name?: string;
  /** One of "en", "fr", "de", "pt", "es", "it", "nl", "sv". */
  language?: string;
  metadata?: Metadata;
  postal_code?: string;
  region?: string;
  /**
   * Swedish customers only. Must be supplied if the bank account is
   * denominated in SEK, and cannot be changed once set.
   */
  swedish_identity_number?: string;
}

export type CustomerUpdateParams = CustomerCreateParams;

export interface CustomerListParams extends CursorParams {
  created_at?: CreatedAtFilter;
}

// ── Customer bank accounts ─────────────────────────────────────────────────
export interface CustomerBankAccount {
  /** Unique identifier, beginning with "BA". */
  readonly id: string;
  readonly created_at: string;
  readonly account_holder_name: string;
  /** Last two digits of the account number. */
  readonly account_number_ending: string;
  readonly bank_name: string;
  readonly country_code: string;
  readonly currency: Currency;
  /** Disabled accounts cannot be used for new mandates. */
  readonly enabled: boolean;
  readonly metadata: Metadata;
  readonly links: {
    readonly customer: string;
  };
}

export interface CustomerBankAccountCreateParams {
  /** Name of the account holder, as known by the bank. Max 18 characters. */
  account_holder_name: string;
  account_number?: string;
  bank_code?: string;
  branch_code?: string;
  country_code?: string;
  currency?: Currency;
  /** International Bank Account Number. Alternatively use local details. */
  iban?: string;
  metadata?: Metadata;
  links: {
    customer?: string;
    /** Token from a bank account set up with a publishable key. */
    customer_bank_account_token?: string;
  };
}

export interface CustomerBankAccountUpdateParams {
  metadata?: Metadata;
}

export interface CustomerBankAccountListParams extends CursorParams {
  created_at?: CreatedAtFilter;
  customer?: string;
  enabled?: boolean;
}

// ── Mandates ───────────────────────────────────────────────────────────────
export type MandateStatus =
  | "pending_customer_approval"
  | "pending_submission"
  | "submitted"
  | "active"
  | "failed"
  | "cancelled"
  | "expired";

export interface Mandate {
  /** Unique identifier, beginning with "MD". */
  readonly id: string;
  readonly created_at: string;
  /** Earliest date a newly created payment could be charged. */
  readonly next_possible_charge_date: string | null;
  /** Unique reference, shown on the customer's bank statement. */
  readonly reference: string;
  readonly scheme: Scheme;
  readonly status: MandateStatus;
  readonly metadata: Metadata;
  readonly links: {
    readonly creditor: string;
    readonly customer_bank_account: string;
    /** Present once a mandate has been replaced (e.g. bank switch). */
    readonly new_mandate?: string;
  };
}

export interface MandateCreateParams {
  /** Generated by the API when omitted. */
  reference?: string;
  scheme?: Scheme;
  metadata?: Metadata;
  links: {
    /** Only needed for accounts managing several creditors. */
    creditor?: string;
    customer_bank_account: string;
  };
}

export interface MandateUpdateParams {
  metadata?: Metadata;
}

export interface MandateListParams extends CursorParams {
  created_at?: CreatedAtFilter;
  customer?: string;
  customer_bank_account?: string;
  reference?: string;
  status?: MandateStatus[];
}

/** Body of the cancel and reinstate actions. */
export interface MandateActionParams {
  metadata?: Metadata;
}

// ── Payments ───────────────────────────────────────────────────────────────
export type PaymentStatus =
  | "pending_customer_approval"
  | "pending_submission"
  | "submitted"
  | "confirmed"
  | "paid_out"
  | "cancelled"
  | "customer_approval_denied"
  | "failed"
  | "charged_back";

export interface Payment {
  /** Unique identifier, beginning with "PM". */
  readonly id: string;
  readonly created_at: string;
  /** Amount in the lowest denomination (e.g. pence). */
  readonly amount: number;
  readonly amount_refunded: number;
  /** A future date (YYYY-MM-DD) on which the payment is collected. */
  readonly charge_date: string;
  readonly currency: Currency;
  readonly description: string | null;
  readonly reference: string | null;
  readonly status: PaymentStatus;
  readonly metadata: Metadata;
  readonly links: {
    readonly creditor: string;
    readonly mandate: string;
    readonly payout?: string;
    readonly subscription?: string;
  };
}

export interface PaymentCreateParams {
  amount: number;
  currency: Currency;
  /** Defaults to the mandate's `next_possible_charge_date`. */
  charge_date?: string;
  description?: string;
  metadata?: Metadata;
  reference?: string;
  links: {
    mandate: string;
  };
}

export interface PaymentUpdateParams {
  metadata?: Metadata;
}

export interface PaymentListParams extends CursorParams {
  created_at?: CreatedAtFilter;
  creditor?: string;
  currency?: Currency;
  customer?: string;
  mandate?: string;
  status?: PaymentStatus;
  subscription?: string;
}

export interface PaymentCancelParams {
  metadata?: Metadata;
}

export interface PaymentRetryParams {
  metadata?: Metadata;
  /** A future date on which the retried payment should be collected. */
  charge_date?: string;
}

// ── Redirect flows ─────────────────────────────────────────────────────────
export interface RedirectFlow {
  /** Unique identifier, beginning with "RE". */
  readonly id: string;
  readonly created_at: string;
  /** Shown on the hosted payment pages. */
  readonly description: string | null;
  /** The hosted payment page to send the customer to. */
  readonly redirect_url: string;
  /** Restricts the pages to one scheme when set. */
  readonly scheme: Scheme | null;
  /** Must be supplied again on completion. */
  readonly session_token: string;
  readonly success_redirect_url: string;
  readonly links: {
    readonly creditor: string;
    /** Only present once the flow has been completed. */
    readonly customer?: string;
    readonly customer_bank_account?: string;
    readonly mandate?: string;
  };
}

/** Customer details used to pre-fill the hosted payment pages. */
export interface PrefilledCustomer {
  address_line1?: string;
  address_line2?: string;
  address_line3?: string;
  city?: string;
  company_name?: string;
  country_code?: string;
  email?: string;
  family_name?: string;
  given_name?: string;
  language?: string;
  postal_code?: string;
  region?: string;
  swedish_identity_number?: string;
}

export interface RedirectFlowCreateParams {
  description?: string;
  prefilled_customer?: PrefilledCustomer;
  scheme?: Scheme;
  /** The customer's session ID in your integration. */
  session_token: string;
  /** Must begin with `https` in the live environment. */
  success_redirect_url: string;
  links?: {
    creditor?: string;
  };
}

export interface RedirectFlowCompleteParams {
  session_token: string;
}

// ── Bank details lookups ───────────────────────────────────────────────────
export interface BankDetailsLookup {
  /** Empty if the account is not reachable by any scheme. */
  readonly available_debit_schemes: readonly Scheme[];
  readonly bank_name: string | null;
  /** ISO 9362 SWIFT BIC. */
  readonly bic: string | null;
}

export interface BankDetailsLookupCreateParams {
  account_number?: string;
  bank_code?: string;
  branch_code?: string;
  country_code?: string;
  iban?: string;
}

// ── Webhooks ───────────────────────────────────────────────────────────────
export type EventResourceType =
  | "mandates"
  | "payments"
  | "payouts"
  | "refunds"
  | "subscriptions"
  | "customers";

/** A single event delivered inside a webhook's `events` array. */
export interface WebhookEvent {
  /** Unique identifier, beginning with "EV". */
  readonly id: string;
  readonly created_at: string;
  /** What happened to the resource (e.g. `"created"`, `"failed"`). */
  readonly action: string;
  readonly resource_type: EventResourceType;
  /** IDs of the resources involved, keyed by resource name. */
  readonly links: Readonly<Record<string, string>>;
  readonly details: {
    readonly origin: "bank" | "api" | "gocardless" | "customer";
    readonly cause: string;
    readonly description: string;
    readonly scheme?: Scheme;
    readonly reason_code?: string;
  };
  readonly metadata: Metadata;
}

// ── Logging ────────────────────────────────────────────────────────────────
/** Minimal logger contract; pass your own (pino, winston, console…). */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ── Client Config ──────────────────────────────────────────────────────────
export type Environment = "live" | "sandbox";

/** Configuration options for initialising the GoCardless client. */
export interface GoCardlessConfig {
  /** Your access token. **Never expose in client-side code.** */
  accessToken: string;
  /**
   * Which API environment to talk to.
   * @default "live"
   */
  environment?: Environment;
  /**
   * Override the base URL (takes precedence over `environment`).
   * Useful for local development against a stub server.
   */
  baseUrl?: string;
  /**
   * Per-attempt request timeout in milliseconds.
   * @default 30_000
   */
  timeout?: number;
  /**
   * Maximum number of automatic retries on 429 / 5xx / network errors.
   * Uses exponential back-off with jitter.
   * @default 3
   */
  maxRetries?: number;
  /**
   * When a create call collides with an earlier one using the same
   * idempotency key, the API answers 409. By default the client then
   * fetches and returns the resource created earlier; set this to `true`
   * to receive the `IdempotentCreationConflictError` instead.
   * @default false
   */
  raiseOnIdempotencyConflict?: boolean;
  /**
   * Value of the `GoCardless-Version` header.
   * @default "2015-07-06"
   */
  apiVersion?: string;
  /** Receives transport diagnostics. Silent by default. */
  logger?: Logger;
}

/** Per-call overrides accepted by every service operation. */
export interface RequestOptions {
  /** Used verbatim instead of a generated key (create endpoints only). */
  idempotencyKey?: string;
  /** Extra headers merged over the defaults. */
  headers?: Record<string, string>;
  /** Override the per-attempt timeout (ms). */
  timeout?: number;
}

// ── Error ──────────────────────────────────────────────────────────────────
/** One entry of the `errors` array in an API error body. */
export interface ApiErrorDetail {
  readonly message: string;
  readonly reason?: string;
  readonly field?: string;
  readonly request_pointer?: string;
  readonly links?: Readonly<Record<string, string>>;
}

/** Shape of the `error` object returned by the API. */
export interface ApiErrorBody {
  readonly message: string;
  readonly type: string;
  readonly code?: number;
  readonly request_id?: string;
  readonly documentation_url?: string;
  readonly errors?: readonly ApiErrorDetail[];
}
