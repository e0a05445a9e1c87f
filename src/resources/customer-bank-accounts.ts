// ---------------------------------------------------------------------------
// GoCardless Client – Customer Bank Accounts Service
// ---------------------------------------------------------------------------

import { generateIdempotencyKey, requestSettings } from "../http";
import type { HttpClient } from "../http";
import { paginate, toListResponse } from "../pagination";
import type {
  CustomerBankAccount,
  CustomerBankAccountCreateParams,
  CustomerBankAccountListParams,
  CustomerBankAccountUpdateParams,
  ListMetaPayload,
  ListResponse,
  RequestOptions,
} from "../types";

interface BankAccountEnvelope {
  customer_bank_accounts: CustomerBankAccount;
}

interface BankAccountListEnvelope {
  customer_bank_accounts?: CustomerBankAccount[];
  meta?: ListMetaPayload;
}

/**
 * Service for customer bank accounts.
 *
 * A bank account can be created from local details (`account_number`,
 * `bank_code`, `branch_code`), an `iban`, or a token obtained with a
 * publishable key. Bank account details cannot be changed after creation;
 * disable the account and create a new one instead.
 */
export class CustomerBankAccountsService {
  constructor(private readonly http: HttpClient) {}

  async create(
    params: CustomerBankAccountCreateParams,
    options: RequestOptions = {},
  ): Promise<CustomerBankAccount> {
    const res = await this.http.request<BankAccountEnvelope>(
      "POST",
      "/customer_bank_accounts",
      {
        body: { customer_bank_accounts: params },
        ...requestSettings(options),
        idempotencyKey: options.idempotencyKey ?? generateIdempotencyKey(),
        onIdempotencyConflict: async (id) => ({
          customer_bank_accounts: await this.get(id, {
            headers: options.headers,
            timeout: options.timeout,
          }),
        }),
      },
    );
    return res.customer_bank_accounts;
  }

  async list(
    params: CustomerBankAccountListParams = {},
    options: RequestOptions = {},
  ): Promise<ListResponse<CustomerBankAccount>> {
    const res = await this.http.request<BankAccountListEnvelope>(
      "GET",
      "/customer_bank_accounts",
      { query: params, ...requestSettings(options) },
    );
    return toListResponse(res.customer_bank_accounts, res.meta);
  }

  all(
    params: CustomerBankAccountListParams = {},
    options: RequestOptions = {},
  ): AsyncGenerator<CustomerBankAccount, void, undefined> {
    return paginate(
      (page: CustomerBankAccountListParams) => this.list(page, options),
      params,
    );
  }

  /** @param identity - Unique identifier, beginning with "BA". */
  async get(
    identity: string,
    options: RequestOptions = {},
  ): Promise<CustomerBankAccount> {
    const res = await this.http.request<BankAccountEnvelope>(
      "GET",
      "/customer_bank_accounts/:identity",
      { params: { identity }, ...requestSettings(options) },
    );
    return res.customer_bank_accounts;
  }

  /** Only `metadata` can be updated. */
  async update(
    identity: string,
    params: CustomerBankAccountUpdateParams = {},
    options: RequestOptions = {},
  ): Promise<CustomerBankAccount> {
    const res = await this.http.request<BankAccountEnvelope>(
      "PUT",
      "/customer_bank_accounts/:identity",
      {
        params: { identity },
        body: { customer_bank_accounts: params },
        ...requestSettings(options),
      },
    );
    return res.customer_bank_accounts;
  }

  /**
   * Immediately cancel all mandates attached to the account and disable it.
   * A disabled account cannot be re-enabled.
   */
  async disable(
    identity: string,
    options: RequestOptions = {},
  ): Promise<CustomerBankAccount> {
    const res = await this.http.request<BankAccountEnvelope>(
      "POST",
      "/customer_bank_accounts/:identity/actions/disable",
      { params: { identity }, ...requestSettings(options) },
    );
    return res.customer_bank_accounts;
  }
}
