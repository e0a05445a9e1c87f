// ---------------------------------------------------------------------------
// GoCardless Client – Webhook Verification Utility
// ---------------------------------------------------------------------------
// Static helper for verifying incoming webhooks. Needs no HTTP client or
// access token, only the endpoint's secret.
//
// Each delivery is a POST whose body is `{"events": [...]}`, signed with
// HMAC-SHA256 over the raw body and sent as lowercase hex in the
// `Webhook-Signature` header.
//
// Usage:
//   ```ts
//   const events = GoCardlessClient.webhooks.parse(
//     rawBody,                             // The raw request body string
//     req.headers['webhook-signature'],    // The signature header
//     process.env.GOCARDLESS_WEBHOOK_SECRET,
//   );
//   ```
// ---------------------------------------------------------------------------

import { createHmac, timingSafeEqual } from "node:crypto";

import { InvalidSignatureError } from "../errors";
import type { WebhookEvent } from "../types";

const HEX_REGEX = /^[0-9a-f]+$/i;

/**
 * Verifies webhook signatures and extracts the events they carry.
 */
export class WebhooksResource {
  /**
   * Verify the signature and parse the webhook body.
   *
   * @param rawBody - The raw request body (NOT parsed JSON).
   * @param signatureHeader - The `Webhook-Signature` header value.
   * @param secret - The secret of the webhook endpoint.
   * @returns The events in delivery order.
   * @throws {InvalidSignatureError} If the signature does not match or the
   *   body is not a webhook payload.
   */
  parse(
    rawBody: string | Buffer,
    signatureHeader: string | undefined,
    secret: string,
  ): WebhookEvent[] {
    if (!this.isValidSignature(rawBody, signatureHeader, secret)) {
      throw new InvalidSignatureError("Signature did not match");
    }

    const text =
      typeof rawBody === "string" ? rawBody : rawBody.toString("utf8");
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidSignatureError(
        `Webhook body is not valid JSON: ${reason}`,
      );
    }

    if (
      typeof payload !== "object" ||
      payload === null ||
      !("events" in payload) ||
      !Array.isArray(payload.events)
    ) {
      throw new InvalidSignatureError("Webhook body has no `events` array");
    }

    return payload.events;
  }

  /**
   * Check a `Webhook-Signature` header against the body, in constant time.
   * Returns `false` for a missing or malformed header.
   */
  isValidSignature(
    rawBody: string | Buffer,
    signatureHeader: string | undefined,
    secret: string,
  ): boolean {
    const signature = signatureHeader?.trim();
    if (!signature || !HEX_REGEX.test(signature)) return false;

    const expected = this.computeSignature(rawBody, secret);
    const given = Buffer.from(signature.toLowerCase(), "hex");
    const wanted = Buffer.from(expected, "hex");

    return given.length === wanted.length && timingSafeEqual(given, wanted);
  }

  /** HMAC-SHA256 of the body → lowercase hex. */
  computeSignature(rawBody: string | Buffer, secret: string): string {
    return createHmac("sha256", secret).update(rawBody).digest("hex");
  }
}
