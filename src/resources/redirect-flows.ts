// ---------------------------------------------------------------------------
// GoCardless Client – Redirect Flows Service
// ---------------------------------------------------------------------------
// Redirect flows send a customer to hosted payment pages to set up a
// mandate. The overall flow is:
//
//   1. `create` a flow and redirect the customer to its `redirect_url`.
//   2. The customer enters their details and is sent back to your
//      `success_redirect_url` with `redirect_flow_id=RE123` in the query.
//   3. `complete` the flow, which creates a customer, bank account and
//      mandate and links them on the returned flow.
//
// Flows expire 30 minutes after creation and cannot be completed after.
// ---------------------------------------------------------------------------

import { generateIdempotencyKey, requestSettings } from "../http";
import type { HttpClient } from "../http";
import type {
  RedirectFlow,
  RedirectFlowCompleteParams,
  RedirectFlowCreateParams,
  RequestOptions,
} from "../types";

interface RedirectFlowEnvelope {
  redirect_flows: RedirectFlow;
}

/**
 * Service for redirect flows.
 *
 * @example
 * ```ts
 * const flow = await client.redirectFlows.create({
 *   description: 'Wine boxes',
 *   session_token: req.session.id,
 *   success_redirect_url: 'https://example.com/pay/confirm',
 * });
 * res.redirect(flow.redirect_url);
 *
 * // …later, on /pay/confirm?redirect_flow_id=RE123
 * const completed = await client.redirectFlows.complete('RE123', {
 *   session_token: req.session.id,
 * });
 * console.log(completed.links.mandate);
 * ```
 */
export class RedirectFlowsService {
  constructor(private readonly http: HttpClient) {}

  async create(
    params: RedirectFlowCreateParams,
    options: RequestOptions = {},
  ): Promise<RedirectFlow> {
    const res = await this.http.request<RedirectFlowEnvelope>(
      "POST",
      "/redirect_flows",
      {
        body: { redirect_flows: params },
        ...requestSettings(options),
        idempotencyKey: options.idempotencyKey ?? generateIdempotencyKey(),
        onIdempotencyConflict: async (id) => ({
          redirect_flows: await this.get(id, {
            headers: options.headers,
            timeout: options.timeout,
          }),
        }),
      },
    );
    return res.redirect_flows;
  }

  /** @param identity - Unique identifier, beginning with "RE". */
  async get(
    identity: string,
    options: RequestOptions = {},
  ): Promise<RedirectFlow> {
    const res = await this.http.request<RedirectFlowEnvelope>(
      "GET",
      "/redirect_flows/:identity",
      { params: { identity }, ...requestSettings(options) },
    );
    return res.redirect_flows;
  }

  /**
   * Complete a flow once the customer has returned to your site.
   *
   * `session_token` must match the one the flow was created with.
   */
  async complete(
    identity: string,
    params: RedirectFlowCompleteParams,
    options: RequestOptions = {},
  ): Promise<RedirectFlow> {
    const res = await this.http.request<RedirectFlowEnvelope>(
      "POST",
      "/redirect_flows/:identity/actions/complete",
      {
        params: { identity },
        body: { data: params },
        ...requestSettings(options),
      },
    );
    return res.redirect_flows;
  }
}
