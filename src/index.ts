// ---------------------------------------------------------------------------
// GoCardless Client – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// The HttpClient transport stays internal.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { GoCardlessClient } from "./client";

// ── Services ───────────────────────────────────────────────────────────────
export type {
  BankDetailsLookupsService,
} from "./resources/bank-details-lookups";
export type {
  CustomerBankAccountsService,
} from "./resources/customer-bank-accounts";
export type { CustomersService } from "./resources/customers";
export type { MandatesService } from "./resources/mandates";
export type { PaymentsService } from "./resources/payments";
export type { RedirectFlowsService } from "./resources/redirect-flows";
export type { WebhooksResource } from "./resources/webhooks";

// ── Error classes ──────────────────────────────────────────────────────────
export {
  GoCardlessError,
  GoCardlessInternalError,
  InvalidApiUsageError,
  InvalidStateError,
  IdempotentCreationConflictError,
  ValidationFailedError,
  ApiConnectionError,
  InvalidSignatureError,
} from "./errors";
export type { GoCardlessErrorType } from "./errors";

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  // Config
  GoCardlessConfig,
  Environment,
  RequestOptions,
  Logger,
  // Shared
  Metadata,
  Scheme,
  Currency,
  CreatedAtFilter,
  CursorParams,
  ListMeta,
  ListMetaPayload,
  ListResponse,
  // Customers
  Customer,
  CustomerCreateParams,
  CustomerUpdateParams,
  CustomerListParams,
  // Customer bank accounts
  CustomerBankAccount,
  CustomerBankAccountCreateParams,
  CustomerBankAccountUpdateParams,
  CustomerBankAccountListParams,
  // Mandates
  Mandate,
  MandateStatus,
  MandateCreateParams,
  MandateUpdateParams,
  MandateListParams,
  MandateActionParams,
  // Payments
  Payment,
  PaymentStatus,
  PaymentCreateParams,
  PaymentUpdateParams,
  PaymentListParams,
  PaymentCancelParams,
  PaymentRetryParams,
  // Redirect flows
  RedirectFlow,
  PrefilledCustomer,
  RedirectFlowCreateParams,
  RedirectFlowCompleteParams,
  // Bank details lookups
  BankDetailsLookup,
  BankDetailsLookupCreateParams,
  // Webhooks
  WebhookEvent,
  EventResourceType,
  // Error body
  ApiErrorBody,
  ApiErrorDetail,
} from "./types";

// ── Version ────────────────────────────────────────────────────────────────
export { SDK_VERSION } from "./http";
