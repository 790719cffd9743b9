// ---------------------------------------------------------------------------
// Tessera SDK – HTTP Transport Unit Tests
// ---------------------------------------------------------------------------
// Tests the fetch-backed transport including:
//   - Authentication and identification headers
//   - URL construction against the versioned base URL
//   - Query and form encoding
//   - Error parsing and classification (no retries)
//   - Timeout handling
//   - Response validation
//   - Request logging
// ---------------------------------------------------------------------------

import { describe, test, expect, vi } from "vitest";
import { z } from "zod";
import {
  TesseraAPIError,
  TesseraAuthenticationError,
  TesseraConnectionError,
  TesseraNotFoundError,
  TesseraRateLimitError,
  TesseraSerializationError,
} from "../../src/errors";
import { HttpClient } from "../../src/http";
import { createConsoleLogger } from "../../src/logger";
import type { Logger } from "../../src/logger";
import type { TesseraConfig } from "../../src/types";
import { SDK_VERSION } from "../../src/version";

// ── Helpers ────────────────────────────────────────────────────────────────

const okSchema = z.object({ ok: z.boolean() });

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" },
  });
}

function textResponse(text: string, status: number, statusText: string): Response {
  return new Response(text, {
    status,
    statusText,
    headers: { "Content-Type": "text/plain" },
  });
}

function mockFetch(response: () => Response = () => jsonResponse({ ok: true })) {
  return vi.fn<typeof fetch>(async () => response());
}

function createClient(
  fetchImpl: typeof fetch,
  overrides: Partial<TesseraConfig> = {},
): HttpClient {
  return new HttpClient({
    apiKey: "sk_test_key",
    baseUrl: "https://mock.tessera.test",
    logger: createConsoleLogger("silent"),
    ...overrides,
    fetch: fetchImpl,
  });
}

function sentUrl(fetchImpl: ReturnType<typeof mockFetch>): string {
  return String(fetchImpl.mock.calls[0][0]);
}

function sentInit(fetchImpl: ReturnType<typeof mockFetch>): RequestInit {
  return fetchImpl.mock.calls[0][1] ?? {};
}

function sentHeaders(fetchImpl: ReturnType<typeof mockFetch>): Headers {
  return new Headers(sentInit(fetchImpl).headers);
}

// ── Tests ──────────────────────────────────────────────────────────────────

describe("HttpClient", () => {
  // ── Constructor ──────────────────────────────────────────────────────

  describe("constructor validation", () => {
    test("should throw TesseraAuthenticationError for empty apiKey", () => {
      expect(() => createClient(mockFetch(), { apiKey: "" })).toThrow(TesseraAuthenticationError);
    });

    test("should throw for whitespace-only apiKey", () => {
      expect(() => createClient(mockFetch(), { apiKey: "   " })).toThrow(TesseraAuthenticationError);
    });

    test("should trim whitespace from apiKey", async () => {
      const fetchImpl = mockFetch();
      const client = createClient(fetchImpl, { apiKey: "  sk_test_spaced  " });

      await client.get("things", okSchema);

      expect(sentHeaders(fetchImpl).get("Authorization")).toBe("Bearer sk_test_spaced");
    });

    test("should strip trailing slashes from baseUrl", async () => {
      const fetchImpl = mockFetch();
      const client = createClient(fetchImpl, { baseUrl: "https://api.test.com///" });

      await client.get("things", okSchema);

      expect(sentUrl(fetchImpl)).toBe("https://api.test.com/v1/things");
    });

    test("should use the default baseUrl when not provided", async () => {
      const fetchImpl = mockFetch();
      const client = new HttpClient({
        apiKey: "sk_test",
        fetch: fetchImpl,
        logger: createConsoleLogger("silent"),
      });

      await client.get("things", okSchema);

      expect(sentUrl(fetchImpl)).toBe("https://api.tessera.dev/v1/things");
    });
  });

  // ── Headers ──────────────────────────────────────────────────────────

  describe("headers", () => {
    test("should send auth, accept and user-agent headers", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).get("things", okSchema);

      const headers = sentHeaders(fetchImpl);
      expect(headers.get("Authorization")).toBe("Bearer sk_test_key");
      expect(headers.get("Accept")).toBe("application/json");
      expect(headers.get("User-Agent")).toBe(`tessera-node/${SDK_VERSION}`);
      expect(headers.has("Content-Type")).toBe(false);
    });

    test("should append app info to the user-agent", async () => {
      const fetchImpl = mockFetch();
      const client = createClient(fetchImpl, {
        appInfo: { name: "shopfront", version: "2.1.0", url: "https://shop.example.com" },
      });

      await client.get("things", okSchema);

      expect(sentHeaders(fetchImpl).get("User-Agent")).toBe(
        `tessera-node/${SDK_VERSION} shopfront/2.1.0 (https://shop.example.com)`,
      );
    });

    test("should send version and account headers when configured", async () => {
      const fetchImpl = mockFetch();
      const client = createClient(fetchImpl, { apiVersion: "2024-06-01", account: "acct_42" });

      await client.get("things", okSchema);

      const headers = sentHeaders(fetchImpl);
      expect(headers.get("Tessera-Version")).toBe("2024-06-01");
      expect(headers.get("Tessera-Account")).toBe("acct_42");
    });

    test("should omit version and account headers by default", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).get("things", okSchema);

      const headers = sentHeaders(fetchImpl);
      expect(headers.has("Tessera-Version")).toBe(false);
      expect(headers.has("Tessera-Account")).toBe(false);
    });
  });

  // ── Methods & URLs ───────────────────────────────────────────────────

  describe("request construction", () => {
    test("get should resolve relative paths under /v1/", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).get("things?starting_after=b", okSchema);

      expect(sentUrl(fetchImpl)).toBe("https://mock.tessera.test/v1/things?starting_after=b");
      expect(sentInit(fetchImpl).method).toBe("GET");
      expect(sentInit(fetchImpl).body).toBeUndefined();
    });

    test("should accept paths with a leading slash", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).get("/checkout/sessions", okSchema);

      expect(sentUrl(fetchImpl)).toBe("https://mock.tessera.test/v1/checkout/sessions");
    });

    test("getQuery should append encoded params", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).getQuery(
        "subscriptions",
        { limit: 2, created: { gte: 5 } },
        okSchema,
      );

      expect(sentUrl(fetchImpl)).toBe(
        "https://mock.tessera.test/v1/subscriptions?limit=2&created[gte]=5",
      );
    });

    test("getQuery should not add a question mark for empty params", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).getQuery("subscriptions", {}, okSchema);

      expect(sentUrl(fetchImpl)).toBe("https://mock.tessera.test/v1/subscriptions");
    });

    test("postForm should send a form-encoded body", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).postForm(
        "payment_methods/pm_1/attach",
        { customer: "cus_1" },
        okSchema,
      );

      const init = sentInit(fetchImpl);
      expect(init.method).toBe("POST");
      expect(init.body).toBe("customer=cus_1");
      expect(sentHeaders(fetchImpl).get("Content-Type")).toBe("application/x-www-form-urlencoded");
    });

    test("post should send no body", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).post("payment_methods/pm_1/detach", okSchema);

      expect(sentInit(fetchImpl).method).toBe("POST");
      expect(sentInit(fetchImpl).body).toBeUndefined();
      expect(sentHeaders(fetchImpl).has("Content-Type")).toBe(false);
    });

    test("delete should use the DELETE method", async () => {
      const fetchImpl = mockFetch();
      await createClient(fetchImpl).delete("subscriptions/sub_1", okSchema);

      expect(sentInit(fetchImpl).method).toBe("DELETE");
    });

    test("should return the parsed body", async () => {
      const result = await createClient(mockFetch()).get("things", okSchema);

      expect(result).toEqual({ ok: true });
    });
  });

  // ── Error handling ───────────────────────────────────────────────────

  describe("error handling", () => {
    test("should map 404 to TesseraNotFoundError with the API message", async () => {
      const body = { error: { type: "invalid_request_error", message: "No such subscription: 'sub_x'" } };
      const client = createClient(mockFetch(() => jsonResponse(body, 404, "Not Found")));

      const request = client.get("subscriptions/sub_x", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraNotFoundError);
      await expect(request).rejects.toMatchObject({
        statusCode: 404,
        code: "not_found_error",
        message: "No such subscription: 'sub_x'",
        raw: body,
      });
    });

    test("should fall back to the status text for non-JSON error bodies", async () => {
      const client = createClient(
        mockFetch(() => textResponse("upstream exploded", 500, "Internal Server Error")),
      );

      const request = client.get("things", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraAPIError);
      await expect(request).rejects.toMatchObject({
        message: "Internal Server Error",
        raw: undefined,
      });
    });

    test("should describe the status when there is no body or status text", async () => {
      const client = createClient(mockFetch(() => new Response(null, { status: 503 })));

      await expect(client.get("things", okSchema)).rejects.toThrow(
        "Request failed with status 503",
      );
    });

    test("should not retry rate-limited requests", async () => {
      const fetchImpl = mockFetch(() => jsonResponse({ error: { message: "Slow down" } }, 429, "Too Many Requests"));
      const client = createClient(fetchImpl);

      await expect(client.get("things", okSchema)).rejects.toBeInstanceOf(TesseraRateLimitError);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    test("should wrap network failures in TesseraConnectionError", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const client = createClient(fetchImpl);

      const request = client.get("things", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraConnectionError);
      await expect(request).rejects.toThrow("Network error: fetch failed");
    });

    test("should abort and report timeouts", async () => {
      const fetchImpl = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              const error = new Error("This operation was aborted");
              error.name = "AbortError";
              reject(error);
            });
          }),
      );
      const client = createClient(fetchImpl, { timeout: 20 });

      const request = client.get("things", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraConnectionError);
      await expect(request).rejects.toThrow("Request timed out after 20ms");
    });

    test("should reject success bodies that are not JSON", async () => {
      const client = createClient(mockFetch(() => textResponse("<html>", 200, "OK")));

      const request = client.get("things", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraSerializationError);
      await expect(request).rejects.toMatchObject({ statusCode: 200 });
    });

    test("should reject bodies that do not match the schema", async () => {
      const client = createClient(mockFetch(() => jsonResponse({ ok: "yes" })));

      const request = client.get("things", okSchema);

      await expect(request).rejects.toBeInstanceOf(TesseraSerializationError);
      await expect(request).rejects.toThrow(
        "Unexpected response body for GET things: ok: Expected boolean, received string",
      );
    });

    test("should reject unencodable form params before sending", async () => {
      const fetchImpl = mockFetch();
      const client = createClient(fetchImpl);

      await expect(
        client.postForm("things", { callback: () => 1 }, okSchema),
      ).rejects.toBeInstanceOf(TesseraSerializationError);
      expect(fetchImpl).not.toHaveBeenCalled();
    });
  });

  // ── Logging ──────────────────────────────────────────────────────────

  describe("logging", () => {
    function createLogger() {
      return {
        debug: vi.fn<Logger["debug"]>(),
        info: vi.fn<Logger["info"]>(),
        warn: vi.fn<Logger["warn"]>(),
        error: vi.fn<Logger["error"]>(),
      };
    }

    test("should log each request and response at debug level", async () => {
      const logger = createLogger();
      const client = createClient(mockFetch(), { logger });

      await client.getQuery("things", { limit: 1 }, okSchema);

      expect(logger.debug.mock.calls).toEqual([
        ["→ GET /v1/things?limit=1"],
        ["← GET /v1/things?limit=1 200"],
      ]);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    test("should warn about failed requests", async () => {
      const logger = createLogger();
      const client = createClient(
        mockFetch(() => jsonResponse({ error: { message: "gone" } }, 404, "Not Found")),
        { logger },
      );

      await expect(client.get("things", okSchema)).rejects.toBeInstanceOf(TesseraNotFoundError);

      expect(logger.warn).toHaveBeenCalledWith("✗ GET /v1/things", {
        code: "not_found_error",
        statusCode: 404,
        message: "gone",
      });
    });
  });
});
