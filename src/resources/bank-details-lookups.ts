// ---------------------------------------------------------------------------
// GoCardless Client – Bank Details Lookups Service
// ---------------------------------------------------------------------------
// Checks bank details before a customer bank account is created, and
// reports which schemes can debit the account.
// ---------------------------------------------------------------------------

import { requestSettings } from "../http";
import type { HttpClient } from "../http";
import type {
  BankDetailsLookup,
  BankDetailsLookupCreateParams,
  RequestOptions,
} from "../types";

interface BankDetailsLookupEnvelope {
  bank_details_lookups: BankDetailsLookup;
}

/** Look up the name and reachability of a bank. */
export class BankDetailsLookupsService {
  constructor(private readonly http: HttpClient) {}

  /**
   * Check bank details and return the schemes that can reach the account.
   *
   * Pass local details (`account_number`, `bank_code`, `branch_code` and
   * `country_code`) or an `iban`. Invalid details fail with
   * `ValidationFailedError`.
   */
  async create(
    params: BankDetailsLookupCreateParams,
    options: RequestOptions = {},
  ): Promise<BankDetailsLookup> {
    const res = await this.http.request<BankDetailsLookupEnvelope>(
      "POST",
      "/bank_details_lookups",
      {
        body: { bank_details_lookups: params },
        ...requestSettings(options),
      },
    );
    return res.bank_details_lookups;
  }
}
