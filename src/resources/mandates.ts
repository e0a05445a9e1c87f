// ---------------------------------------------------------------------------
// GoCardless Client – Mandates Service
// ---------------------------------------------------------------------------
// A mandate is the customer's authorisation to collect payments from a
// bank account. Mandates move through `pending_submission → submitted →
// active`, and can be cancelled, fail, or expire.
// ---------------------------------------------------------------------------

import { generateIdempotencyKey, requestSettings } from "../http";
import type { HttpClient } from "../http";
import { paginate, toListResponse } from "../pagination";
import type {
  ListMetaPayload,
  ListResponse,
  Mandate,
  MandateActionParams,
  MandateCreateParams,
  MandateListParams,
  MandateUpdateParams,
  RequestOptions,
} from "../types";

interface MandateEnvelope {
  mandates: Mandate;
}

interface MandateListEnvelope {
  mandates?: Mandate[];
  meta?: ListMetaPayload;
}

/**
 * Service for mandates.
 *
 * @example
 * ```ts
 * const mandate = await client.mandates.create({
 *   scheme: 'bacs',
 *   links: { customer_bank_account: 'BA123' },
 * });
 *
 * await client.mandates.cancel(mandate.id, { metadata: { reason: 'closed' } });
 * ```
 */
export class MandatesService {
  constructor(private readonly http: HttpClient) {}

  async create(
    params: MandateCreateParams,
    options: RequestOptions = {},
  ): Promise<Mandate> {
    const res = await this.http.request<MandateEnvelope>("POST", "/mandates", {
      body: { mandates: params },
      ...requestSettings(options),
      idempotencyKey: options.idempotencyKey ?? generateIdempotencyKey(),
      onIdempotencyConflict: async (id) => ({
        mandates: await this.get(id, {
          headers: options.headers,
          timeout: options.timeout,
        }),
      }),
    });
    return res.mandates;
  }

  async list(
    params: MandateListParams = {},
    options: RequestOptions = {},
  ): Promise<ListResponse<Mandate>> {
    const res = await this.http.request<MandateListEnvelope>(
      "GET",
      "/mandates",
      {
        query: params,
        ...requestSettings(options),
      },
    );
    return toListResponse(res.mandates, res.meta);
  }

  all(
    params: MandateListParams = {},
    options: RequestOptions = {},
  ): AsyncGenerator<Mandate, void, undefined> {
    return paginate(
      (page: MandateListParams) => this.list(page, options),
      params,
    );
  }

  /** @param identity - Unique identifier, beginning with "MD". */
  async get(identity: string, options: RequestOptions = {}): Promise<Mandate> {
    const res = await this.http.request<MandateEnvelope>(
      "GET",
      "/mandates/:identity",
      {
        params: { identity },
        ...requestSettings(options),
      },
    );
    return res.mandates;
  }

  /** Only `metadata` can be updated. */
  async update(
    identity: string,
    params: MandateUpdateParams = {},
    options: RequestOptions = {},
  ): Promise<Mandate> {
    const res = await this.http.request<MandateEnvelope>(
      "PUT",
      "/mandates/:identity",
      {
        params: { identity },
        body: { mandates: params },
        ...requestSettings(options),
      },
    );
    return res.mandates;
  }

  /**
   * Cancel a mandate and all pending payments against it.
   *
   * Fails with `InvalidStateError` unless the mandate is
   * `pending_submission`, `submitted` or `active`.
   */
  async cancel(
    identity: string,
    params: MandateActionParams = {},
    options: RequestOptions = {},
  ): Promise<Mandate> {
    return this.action(identity, "cancel", params, options);
  }

  /**
   * Reinstate a cancelled or expired mandate. The mandate returns to
   * `pending_submission`.
   */
  async reinstate(
    identity: string,
    params: MandateActionParams = {},
    options: RequestOptions = {},
  ): Promise<Mandate> {
    return this.action(identity, "reinstate", params, options);
  }

  private async action(
    identity: string,
    name: "cancel" | "reinstate",
    params: MandateActionParams,
    options: RequestOptions,
  ): Promise<Mandate> {
    const res = await this.http.request<MandateEnvelope>(
      "POST",
      `/mandates/:identity/actions/${name}`,
      {
        params: { identity },
        body: { data: params },
        ...requestSettings(options),
      },
    );
    return res.mandates;
  }
}
