// ---------------------------------------------------------------------------
// GoCardless Client – Customers Service
// ---------------------------------------------------------------------------
// Customer objects hold the contact details for a customer. A customer can
// have several bank accounts, which in turn can have several mandates.
// ---------------------------------------------------------------------------

import { generateIdempotencyKey, requestSettings } from "../http";
import type { HttpClient } from "../http";
import { paginate, toListResponse } from "../pagination";
import type {
  Customer,
  CustomerCreateParams,
  CustomerListParams,
  CustomerUpdateParams,
  ListMetaPayload,
  ListResponse,
  RequestOptions,
} from "../types";

interface CustomerEnvelope {
  customers: Customer;
}

interface CustomerListEnvelope {
  customers?: Customer[];
  meta?: ListMetaPayload;
}

/**
 * Service for customer resources.
 *
 * Note: `swedish_identity_number` may only be supplied for Swedish
 * customers, and must be supplied to set up an Autogiro mandate.
 *
 * @example
 * ```ts
 * const customer = await client.customers.create({
 *   email: 'user@example.com',
 *   given_name: 'Frank',
 *   family_name: 'Osborne',
 *   country_code: 'GB',
 * });
 * ```
 */
export class CustomersService {
  constructor(private readonly http: HttpClient) {}

  /**
   * Create a new customer.
   *
   * Retrying with the same `idempotencyKey` returns the customer created
   * by the first call rather than a duplicate.
   */
  async create(
    params: CustomerCreateParams = {},
    options: RequestOptions = {},
  ): Promise<Customer> {
    const res = await this.http.request<CustomerEnvelope>(
      "POST",
      "/customers",
      {
        body: { customers: params },
        ...requestSettings(options),
        idempotencyKey: options.idempotencyKey ?? generateIdempotencyKey(),
        onIdempotencyConflict: async (id) => ({
          customers: await this.get(id, {
            headers: options.headers,
            timeout: options.timeout,
          }),
        }),
      },
    );
    return res.customers;
  }

  /** Return one cursor-paginated page of your customers. */
  async list(
    params: CustomerListParams = {},
    options: RequestOptions = {},
  ): Promise<ListResponse<Customer>> {
    const res = await this.http.request<CustomerListEnvelope>(
      "GET",
      "/customers",
      {
        query: params,
        ...requestSettings(options),
      },
    );
    return toListResponse(res.customers, res.meta);
  }

  /**
   * Iterate over every customer, fetching further pages as needed.
   * Behaves like {@link list} but paginates for you.
   */
  all(
    params: CustomerListParams = {},
    options: RequestOptions = {},
  ): AsyncGenerator<Customer, void, undefined> {
    return paginate(
      (page: CustomerListParams) => this.list(page, options),
      params,
    );
  }

  /**
   * Retrieve the details of an existing customer.
   *
   * @param identity - Unique identifier, beginning with "CU".
   */
  async get(identity: string, options: RequestOptions = {}): Promise<Customer> {
    const res = await this.http.request<CustomerEnvelope>(
      "GET",
      "/customers/:identity",
      {
        params: { identity },
        ...requestSettings(options),
      },
    );
    return res.customers;
  }

  /**
   * Update a customer. Supports all of the fields supported when creating
   * a customer.
   *
   * @param identity - Unique identifier, beginning with "CU".
   */
  async update(
    identity: string,
    params: CustomerUpdateParams = {},
    options: RequestOptions = {},
  ): Promise<Customer> {
    const res = await this.http.request<CustomerEnvelope>(
      "PUT",
      "/customers/:identity",
      {
        params: { identity },
        body: { customers: params },
        ...requestSettings(options),
      },
    );
    return res.customers;
  }
}
