// ---------------------------------------------------------------------------
// GoCardless Client – Payments Service
// ---------------------------------------------------------------------------
// Payments collect a fixed amount from a customer's bank account against a
// mandate. Amounts are in the lowest denomination of the currency.
// ---------------------------------------------------------------------------

import { generateIdempotencyKey, requestSettings } from "../http";
import type { HttpClient } from "../http";
import { paginate, toListResponse } from "../pagination";
import type {
  ListMetaPayload,
  ListResponse,
  Payment,
  PaymentCancelParams,
  PaymentCreateParams,
  PaymentListParams,
  PaymentRetryParams,
  PaymentUpdateParams,
  RequestOptions,
} from "../types";

interface PaymentEnvelope {
  payments: Payment;
}

interface PaymentListEnvelope {
  payments?: Payment[];
  meta?: ListMetaPayload;
}

/**
 * Service for payments.
 *
 * @example
 * ```ts
 * // Collect £10.00 against a mandate
 * const payment = await client.payments.create({
 *   amount: 1000,
 *   currency: 'GBP',
 *   links: { mandate: 'MD123' },
 * });
 *
 * // Every failed payment from a mandate
 * const failed = client.payments.all({ mandate: 'MD123', status: 'failed' });
 * for await (const p of failed) {
 *   console.log(p.id, p.charge_date);
 * }
 * ```
 */
export class PaymentsService {
  constructor(private readonly http: HttpClient) {}

  /**
   * Create a payment. Retrying with the same `idempotencyKey` returns the
   * payment created by the first call, so a payment is never taken twice.
   */
  async create(
    params: PaymentCreateParams,
    options: RequestOptions = {},
  ): Promise<Payment> {
    const res = await this.http.request<PaymentEnvelope>("POST", "/payments", {
      body: { payments: params },
      ...requestSettings(options),
      idempotencyKey: options.idempotencyKey ?? generateIdempotencyKey(),
      onIdempotencyConflict: async (id) => ({
        payments: await this.get(id, {
          headers: options.headers,
          timeout: options.timeout,
        }),
      }),
    });
    return res.payments;
  }

  /** Return one cursor-paginated page of your payments. */
  async list(
    params: PaymentListParams = {},
    options: RequestOptions = {},
  ): Promise<ListResponse<Payment>> {
    const res = await this.http.request<PaymentListEnvelope>(
      "GET",
      "/payments",
      {
        query: params,
        ...requestSettings(options),
      },
    );
    return toListResponse(res.payments, res.meta);
  }

  all(
    params: PaymentListParams = {},
    options: RequestOptions = {},
  ): AsyncGenerator<Payment, void, undefined> {
    return paginate(
      (page: PaymentListParams) => this.list(page, options),
      params,
    );
  }

  /** @param identity - Unique identifier, beginning with "PM". */
  async get(identity: string, options: RequestOptions = {}): Promise<Payment> {
    const res = await this.http.request<PaymentEnvelope>(
      "GET",
      "/payments/:identity",
      {
        params: { identity },
        ...requestSettings(options),
      },
    );
    return res.payments;
  }

  /** Only `metadata` can be updated. */
  async update(
    identity: string,
    params: PaymentUpdateParams = {},
    options: RequestOptions = {},
  ): Promise<Payment> {
    const res = await this.http.request<PaymentEnvelope>(
      "PUT",
      "/payments/:identity",
      {
        params: { identity },
        body: { payments: params },
        ...requestSettings(options),
      },
    );
    return res.payments;
  }

  /**
   * Cancel a payment. Only payments in `pending_submission` can be
   * cancelled; anything else fails with `InvalidStateError`.
   */
  async cancel(
    identity: string,
    params: PaymentCancelParams = {},
    options: RequestOptions = {},
  ): Promise<Payment> {
    const res = await this.http.request<PaymentEnvelope>(
      "POST",
      "/payments/:identity/actions/cancel",
      {
        params: { identity },
        body: { data: params },
        ...requestSettings(options),
      },
    );
    return res.payments;
  }

  /** Retry a `failed` payment, optionally on a new `charge_date`. */
  async retry(
    identity: string,
    params: PaymentRetryParams = {},
    options: RequestOptions = {},
  ): Promise<Payment> {
    const res = await this.http.request<PaymentEnvelope>(
      "POST",
      "/payments/:identity/actions/retry",
      {
        params: { identity },
        body: { data: params },
        ...requestSettings(options),
      },
    );
    return res.payments;
  }
}
