// ---------------------------------------------------------------------------
// GoCardless Client – HTTP Transport Unit Tests
// ---------------------------------------------------------------------------
// Tests the internal HTTP client including:
//   - Authentication and version headers
//   - Request construction (path templating, body, query params)
//   - Retry logic and when a request is safe to retry
//   - Idempotency keys and conflict resolution
//   - Timeout handling
//   - Error parsing and classification
// ---------------------------------------------------------------------------

import { afterEach, describe, expect, test, vi } from "vitest";
import {
  HttpClient,
  buildPath,
  generateIdempotencyKey,
  serializeQuery,
} from "../../src/http";
import {
  ApiConnectionError,
  GoCardlessError,
  GoCardlessInternalError,
  IdempotentCreationConflictError,
  InvalidApiUsageError,
  ValidationFailedError,
} from "../../src/errors";
import type { GoCardlessConfig, Logger } from "../../src/types";

// ── Helpers ────────────────────────────────────────────────────────────────

function mockResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function textResponse(text: string, status: number): Response {
  return new Response(text, {
    status,
    headers: { "Content-Type": "text/html" },
  });
}

function createClient(overrides: Partial<GoCardlessConfig> = {}): HttpClient {
  return new HttpClient({
    accessToken: "test-token",
    baseUrl: "https://api.gocardless.test",
    timeout: 5_000,
    maxRetries: 0,
    ...overrides,
  });
}

/** Stub `fetch` so every call answers with a fresh copy of `body`. */
function stubFetch(body: unknown = {}, status = 200) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
    mockResponse(body, status),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function conflictBody(id: string) {
  return {
    error: {
      message: "A resource has already been created with this idempotency key",
      type: "invalid_state",
      code: 409,
      request_id: "req-conflict",
      errors: [
        {
          reason: "idempotent_creation_conflict",
          message: "A resource has already been created with this idempotency key",
          links: { conflicting_resource_id: id },
        },
      ],
    },
  };
}

// ── Tests ──────────────────────────────────────────────────────────────────

describe("HttpClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ── Constructor ──────────────────────────────────────────────────────

  describe("constructor validation", () => {
    test("should throw InvalidApiUsageError for an empty access token", () => {
      expect(() => createClient({ accessToken: "" })).toThrow(InvalidApiUsageError);
    });

    test("should throw for a whitespace-only access token with status 401", () => {
      try {
        createClient({ accessToken: "   " });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidApiUsageError);
        expect((err as InvalidApiUsageError).statusCode).toBe(401);
      }
    });

    test("should trim whitespace from the access token", async () => {
      const fetchMock = stubFetch();
      await createClient({ accessToken: "  test-token  " }).request("GET", "/customers");

      const [, init] = fetchMock.mock.calls[0];
      expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-token");
    });

    test("should strip trailing slashes from baseUrl", async () => {
      const fetchMock = stubFetch();
      await createClient({ baseUrl: "https://api.test.com///" }).request("GET", "/customers");

      expect(fetchMock.mock.calls[0][0]).toBe("https://api.test.com/customers");
    });

    test("should default to the live environment", async () => {
      const fetchMock = stubFetch();
      await new HttpClient({ accessToken: "test-token" }).request("GET", "/customers");

      expect(fetchMock.mock.calls[0][0]).toBe("https://api.gocardless.com/customers");
    });

    test("should use the sandbox URL for the sandbox environment", async () => {
      const fetchMock = stubFetch();
      await new HttpClient({ accessToken: "test-token", environment: "sandbox" }).request(
        "GET",
        "/customers",
      );

      expect(fetchMock.mock.calls[0][0]).toBe("https://api-sandbox.gocardless.com/customers");
    });

    test("should prefer baseUrl over environment", async () => {
      const fetchMock = stubFetch();
      await new HttpClient({
        accessToken: "test-token",
        environment: "sandbox",
        baseUrl: "http://localhost:4010",
      }).request("GET", "/customers");

      expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:4010/customers");
    });
  });

  // ── Request Construction ─────────────────────────────────────────────

  describe("request construction", () => {
    test("should send the default headers", async () => {
      const fetchMock = stubFetch();
      await createClient().request("GET", "/customers");

      const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
      expect(headers.get("Authorization")).toBe("Bearer test-token");
      expect(headers.get("GoCardless-Version")).toBe("2015-07-06");
      expect(headers.get("Accept")).toBe("application/json");
      expect(headers.get("Content-Type")).toBe("application/json");
      expect(headers.get("User-Agent")).toBe("gocardless-client-node/0.1.0");
      expect(headers.get("Idempotency-Key")).toBeNull();
    });

    test("should send a custom API version", async () => {
      const fetchMock = stubFetch();
      await createClient({ apiVersion: "2020-01-01" }).request("GET", "/customers");

      const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
      expect(headers.get("GoCardless-Version")).toBe("2020-01-01");
    });

    test("should let custom headers override defaults", async () => {
      const fetchMock = stubFetch();
      await createClient().request("GET", "/customers", {
        headers: { Accept: "text/plain", "X-Trace": "abc" },
      });

      const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
      expect(headers.get("Accept")).toBe("text/plain");
      expect(headers.get("X-Trace")).toBe("abc");
    });

    test("should serialize the body as JSON for PUT", async () => {
      const fetchMock = stubFetch();
      await createClient().request("PUT", "/customers/:identity", {
        params: { identity: "CU123" },
        body: { customers: { email: "a@example.com" } },
      });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://api.gocardless.test/customers/CU123");
      expect(init?.method).toBe("PUT");
      expect(JSON.parse(String(init?.body))).toEqual({
        customers: { email: "a@example.com" },
      });
    });

    test("should never send a body with GET", async () => {
      const fetchMock = stubFetch();
      await createClient().request("GET", "/customers", { body: { ignored: true } });

      expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
    });

    test("should append serialized query params", async () => {
      const fetchMock = stubFetch();
      await createClient().request("GET", "/mandates", {
        query: {
          limit: 2,
          status: ["active", "submitted"],
          created_at: { gte: "2024-01-01T00:00:00Z" },
          after: undefined,
        },
      });

      const url = new URL(fetchMock.mock.calls[0][0]);
      expect(url.pathname).toBe("/mandates");
      expect(url.searchParams.get("limit")).toBe("2");
      expect(url.searchParams.get("status")).toBe("active,submitted");
      expect(url.searchParams.get("created_at[gte]")).toBe("2024-01-01T00:00:00Z");
      expect(url.searchParams.has("after")).toBe(false);
    });

    test("should send the Idempotency-Key header when given", async () => {
      const fetchMock = stubFetch();
      await createClient().request("POST", "/customers", {
        body: {},
        idempotencyKey: "key-1",
      });

      const headers = new Headers(fetchMock.mock.calls[0][1]?.headers);
      expect(headers.get("Idempotency-Key")).toBe("key-1");
    });

    test("should reject an empty path parameter before any request", async () => {
      const fetchMock = stubFetch();
      await expect(
        createClient().request("GET", "/customers/:identity", { params: { identity: "" } }),
      ).rejects.toThrow(InvalidApiUsageError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  // ── Responses ────────────────────────────────────────────────────────

  describe("response handling", () => {
    test("should return parsed JSON", async () => {
      stubFetch({ customers: { id: "CU123" } });
      const res = await createClient().request<{ customers: { id: string } }>(
        "GET",
        "/customers/:identity",
        { params: { identity: "CU123" } },
      );
      expect(res.customers.id).toBe("CU123");
    });

    test("should return an empty object for 204", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response(null, { status: 204 })),
      );
      const res = await createClient().request("PUT", "/customers/:identity", {
        params: { identity: "CU1" },
      });
      expect(res).toEqual({});
    });

    test("should map a validation_failed envelope to ValidationFailedError", async () => {
      stubFetch(
        {
          error: {
            message: "Validation failed",
            type: "validation_failed",
            code: 422,
            request_id: "req-422",
            documentation_url: "https://developer.gocardless.com/api-reference#validation_failed",
            errors: [{ field: "email", message: "is invalid", request_pointer: "/customers/email" }],
          },
        },
        422,
      );

      const err = await createClient()
        .request("POST", "/customers", { body: {} })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationFailedError);
      const failure = err as ValidationFailedError;
      expect(failure.message).toBe("Validation failed");
      expect(failure.statusCode).toBe(422);
      expect(failure.requestId).toBe("req-422");
      expect(failure.errors).toEqual([
        { field: "email", message: "is invalid", request_pointer: "/customers/email" },
      ]);
    });

    test("should fall back to the status for non-JSON error bodies", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => textResponse("<html>Bad Gateway</html>", 502)),
      );

      const err = await createClient()
        .request("GET", "/customers")
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(GoCardlessInternalError);
      expect((err as GoCardlessInternalError).statusCode).toBe(502);
      expect((err as GoCardlessInternalError).message).toBe("Request failed with HTTP 502");
    });
  });

  // ── Retries ──────────────────────────────────────────────────────────

  describe("retry behaviour", () => {
    test("should NOT retry on 4xx client errors", async () => {
      const fetchMock = stubFetch(
        { error: { message: "Resource not found", type: "invalid_api_usage" } },
        404,
      );

      await expect(
        createClient({ maxRetries: 2 }).request("GET", "/customers/:identity", {
          params: { identity: "CU404" },
        }),
      ).rejects.toThrow(InvalidApiUsageError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("should retry GET on 500 and return the eventual success", async () => {
      const fetchMock = vi
        .fn()
        .mockImplementationOnce(async () =>
          mockResponse({ error: { message: "Internal error", type: "gocardless" } }, 500),
        )
        .mockImplementationOnce(async () => mockResponse({ customers: [] }));
      vi.stubGlobal("fetch", fetchMock);

      const res = await createClient({ maxRetries: 2 }).request("GET", "/customers");

      expect(res).toEqual({ customers: [] });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    test("should throw the last error after retries are exhausted", async () => {
      const fetchMock = stubFetch(
        { error: { message: "Service unavailable", type: "gocardless" } },
        503,
      );

      await expect(
        createClient({ maxRetries: 1 }).request("GET", "/customers"),
      ).rejects.toThrow("Service unavailable");
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    test.each([501, 505, 520])("should retry GET on %i", async (status) => {
      const fetchMock = vi
        .fn()
        .mockImplementationOnce(async () => textResponse("<html>Unavailable</html>", status))
        .mockImplementationOnce(async () => mockResponse({ customers: [] }));
      vi.stubGlobal("fetch", fetchMock);

      const res = await createClient({ maxRetries: 2 }).request("GET", "/customers");

      expect(res).toEqual({ customers: [] });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    test("should NOT retry a 2xx whose body is not JSON", async () => {
      const fetchMock = vi.fn(async () => textResponse("<html>ok</html>", 200));
      vi.stubGlobal("fetch", fetchMock);

      const err = await createClient({ maxRetries: 2 })
        .request("GET", "/customers")
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(GoCardlessError);
      expect(err).not.toBeInstanceOf(ApiConnectionError);
      const failure = err as GoCardlessError;
      expect(failure.type).toBe("unknown_error");
      expect(failure.statusCode).toBe(200);
      expect(failure.message).toBe("Response body is not valid JSON (HTTP 200)");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("should resolve an empty 2xx body to an empty object", async () => {
      vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 200 })));

      const res = await createClient().request("GET", "/payments/:identity", {
        params: { identity: "PM1" },
      });

      expect(res).toEqual({});
    });

    test("should NOT retry a POST without an idempotency key", async () => {
      const fetchMock = stubFetch({ error: { message: "boom", type: "gocardless" } }, 500);

      await expect(
        createClient({ maxRetries: 3 }).request("POST", "/mandates/:identity/actions/cancel", {
          params: { identity: "MD1" },
          body: { data: {} },
        }),
      ).rejects.toThrow(GoCardlessInternalError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    test("should reuse the same idempotency key across retries", async () => {
      const fetchMock = vi
        .fn()
        .mockImplementationOnce(async () => {
          throw new TypeError("fetch failed");
        })
        .mockImplementationOnce(async () => mockResponse({ customers: { id: "CU1" } }));
      vi.stubGlobal("fetch", fetchMock);

      await createClient({ maxRetries: 1 }).request("POST", "/customers", {
        body: { customers: {} },
        idempotencyKey: "key-retry",
      });

      expect(fetchMock).toHaveBeenCalledTimes(2);
      const first = new Headers(fetchMock.mock.calls[0][1].headers);
      const second = new Headers(fetchMock.mock.calls[1][1].headers);
      expect(first.get("Idempotency-Key")).toBe("key-retry");
      expect(second.get("Idempotency-Key")).toBe("key-retry");
    });

    test("should honour Retry-After on 429", async () => {
      const fetchMock = vi
        .fn()
        .mockImplementationOnce(async () =>
          mockResponse(
            { error: { message: "Rate limit exceeded", type: "invalid_api_usage" } },
            429,
            { "Retry-After": "1" },
          ),
        )
        .mockImplementationOnce(async () => mockResponse({ ok: true }));
      vi.stubGlobal("fetch", fetchMock);

      const started = Date.now();
      await createClient({ maxRetries: 1 }).request("GET", "/payments");

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(Date.now() - started).toBeGreaterThanOrEqual(950);
    });

    test("should wrap network failures in ApiConnectionError", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => {
          throw new TypeError("getaddrinfo ENOTFOUND");
        }),
      );

      const err = await createClient()
        .request("GET", "/customers")
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ApiConnectionError);
      expect((err as ApiConnectionError).statusCode).toBe(0);
      expect((err as ApiConnectionError).message).toBe("Network error: getaddrinfo ENOTFOUND");
    });

    test("should log each retry through the injected logger", async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const fetchMock = vi
        .fn()
        .mockImplementationOnce(async () =>
          mockResponse({ error: { message: "boom", type: "gocardless" } }, 500),
        )
        .mockImplementationOnce(async () => mockResponse({}));
      vi.stubGlobal("fetch", fetchMock);

      await createClient({ maxRetries: 1, logger }).request("GET", "/customers");

      expect(logger.debug).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Retrying request",
        expect.objectContaining({ method: "GET", attempt: 1, statusCode: 500 }),
      );
    });
  });

  // ── Timeout ──────────────────────────────────────────────────────────

  describe("timeout", () => {
    test("should abort and report a timeout", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(
          (_url: string, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener("abort", () => {
                const abort = new Error("This operation was aborted");
                abort.name = "AbortError";
                reject(abort);
              });
            }),
        ),
      );

      await expect(
        createClient().request("GET", "/customers", { timeout: 50 }),
      ).rejects.toThrow("Request timed out after 50ms");
    });
  });

  // ── Idempotency conflicts ────────────────────────────────────────────

  describe("idempotent creation conflicts", () => {
    test("should resolve a conflict through onIdempotencyConflict", async () => {
      stubFetch(conflictBody("CU999"), 409);
      const onIdempotencyConflict = vi.fn(async (id: string) => ({ customers: { id } }));

      const res = await createClient().request("POST", "/customers", {
        body: {},
        idempotencyKey: "key-dup",
        onIdempotencyConflict,
      });

      expect(onIdempotencyConflict).toHaveBeenCalledWith("CU999");
      expect(res).toEqual({ customers: { id: "CU999" } });
    });

    test("should raise the conflict when configured to", async () => {
      stubFetch(conflictBody("CU999"), 409);

      const err = await createClient({ raiseOnIdempotencyConflict: true })
        .request("POST", "/customers", {
          body: {},
          idempotencyKey: "key-dup",
          onIdempotencyConflict: async (id: string) => ({ id }),
        })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(IdempotentCreationConflictError);
      expect((err as IdempotentCreationConflictError).conflictingResourceId).toBe("CU999");
    });

    test("should raise the conflict when no resolver is given", async () => {
      stubFetch(conflictBody("MD1"), 409);

      await expect(
        createClient().request("POST", "/mandates", { body: {}, idempotencyKey: "k" }),
      ).rejects.toThrow(IdempotentCreationConflictError);
    });
  });
});

// ── Pure helpers ───────────────────────────────────────────────────────────

describe("buildPath", () => {
  test("should substitute and encode path parameters", () => {
    expect(buildPath("/customers/:identity", { identity: "CU 1/2" })).toBe(
      "/customers/CU%201%2F2",
    );
  });

  test("should leave templates without parameters untouched", () => {
    expect(buildPath("/bank_details_lookups", {})).toBe("/bank_details_lookups");
  });

  test("should throw when a parameter is missing", () => {
    expect(() => buildPath("/mandates/:identity/actions/cancel", {})).toThrow(
      'A value for path parameter "identity" is required.',
    );
  });
});

describe("serializeQuery", () => {
  test("should flatten dates, arrays, nested objects and drop empty values", () => {
    expect(
      serializeQuery({
        limit: 50,
        created_at: { gt: new Date("2024-01-01T00:00:00Z"), lt: undefined },
        status: ["active", "submitted"],
        enabled: false,
        before: null,
        customer: undefined,
      }),
    ).toEqual([
      ["limit", "50"],
      ["created_at[gt]", "2024-01-01T00:00:00.000Z"],
      ["status", "active,submitted"],
      ["enabled", "false"],
    ]);
  });

  test("should omit empty arrays", () => {
    expect(serializeQuery({ status: [] })).toEqual([]);
  });
});

describe("generateIdempotencyKey", () => {
  test("should produce distinct UUIDs", () => {
    const a = generateIdempotencyKey();
    const b = generateIdempotencyKey();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(a).not.toBe(b);
  });
});
