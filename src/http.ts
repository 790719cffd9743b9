// ---------------------------------------------------------------------------
// Tessera SDK – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin HTTP client built on `fetch()`. Handles:
//   - Bearer token authentication
//   - Form encoding of request params (bracket notation)
//   - Timeouts via AbortController
//   - Structured error mapping via TesseraError
//   - Response validation against zod schemas
//
// There are no retries: every failure reaches the caller on the first
// attempt. Consumers interact via the higher-level Tessera client class.
// ---------------------------------------------------------------------------

import {
  TesseraConnectionError,
  TesseraError,
  TesseraSerializationError,
} from "./errors";
import { createConsoleLogger } from "./logger";
import type { Logger } from "./logger";
import { encodeQuery } from "./params";
import { errorBodySchema } from "./schemas";
import type { Schema } from "./schemas";
import type { TesseraConfig } from "./types";
import { SDK_VERSION } from "./version";

/** Supported HTTP methods. */
export type HttpMethod = "GET" | "POST" | "DELETE";

/** Path prefix of the API version this client speaks. */
export const API_VERSION_PREFIX = "/v1/";

const DEFAULT_BASE_URL = "https://api.tessera.dev";
const DEFAULT_TIMEOUT_MS = 30_000;

/** Regex to match trailing slashes for base URL normalization. */
const TRAILING_SLASH_REGEX = /\/+$/;
const LEADING_SLASH_REGEX = /^\/+/;

/**
 * Everything the resources need from a transport. Paths are relative to
 * the versioned base URL (`customers`, not `/v1/customers`).
 */
export interface Transport {
  get<T>(path: string, schema: Schema<T>): Promise<T>;
  getQuery<T>(path: string, params: object, schema: Schema<T>): Promise<T>;
  postForm<T>(path: string, params: object, schema: Schema<T>): Promise<T>;
  post<T>(path: string, schema: Schema<T>): Promise<T>;
  delete<T>(path: string, schema: Schema<T>): Promise<T>;
}

/** The slice of a transport that pagination relies on. */
export type PageTransport = Pick<Transport, "get">;

/** Options forwarded to an individual request. */
export interface RequestOptions {
  /** Params sent as an `application/x-www-form-urlencoded` body. */
  form?: object;
}

/**
 * `fetch`-backed transport used by every resource module.
 *
 * Encapsulates authentication, encoding and error parsing so that
 * resource methods only need to declare *what* to call, not *how*.
 */
export class HttpClient implements Transport {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly apiVersion?: string;
  private readonly account?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: TesseraConfig) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw TesseraError.generate(
        401,
        undefined,
        "An API key is required. Pass it as `apiKey` in the Tessera config.",
      );
    }

    this.apiKey = config.apiKey.trim();
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(
      TRAILING_SLASH_REGEX,
      "",
    );
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.apiVersion = config.apiVersion;
    this.account = config.account;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? createConsoleLogger(config.logLevel);

    let userAgent = `tessera-node/${SDK_VERSION}`;
    if (config.appInfo) {
      const { name, version, url } = config.appInfo;
      userAgent += ` ${version ? `${name}/${version}` : name}`;
      if (url) userAgent += ` (${url})`;
    }
    this.userAgent = userAgent;
  }

  // ── Transport ────────────────────────────────────────────────────────────

  async get<T>(path: string, schema: Schema<T>): Promise<T> {
    return this.request("GET", path, schema);
  }

  async getQuery<T>(
    path: string,
    params: object,
    schema: Schema<T>,
  ): Promise<T> {
    const query = encodeQuery(params);
    return this.request("GET", query ? `${path}?${query}` : path, schema);
  }

  async postForm<T>(
    path: string,
    params: object,
    schema: Schema<T>,
  ): Promise<T> {
    return this.request("POST", path, schema, { form: params });
  }

  async post<T>(path: string, schema: Schema<T>): Promise<T> {
    return this.request("POST", path, schema);
  }

  async delete<T>(path: string, schema: Schema<T>): Promise<T> {
    return this.request("DELETE", path, schema);
  }

  // ── Public request method ────────────────────────────────────────────────

  /**
   * Execute an HTTP request and validate the response body.
   *
   * @returns The response body as parsed by `schema`.
   * @throws  {TesseraError} on any non-2xx response, network failure,
   *          or body that does not match `schema`.
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    schema: Schema<T>,
    opts: RequestOptions = {},
  ): Promise<T> {
    const url = this.buildUrl(path);
    const body = opts.form !== undefined ? encodeQuery(opts.form) : undefined;
    const target = `${method} ${url.pathname}${url.search}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    this.logger.debug(`→ ${target}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers: this.buildHeaders(body !== undefined),
        body,
        signal: controller.signal,
      });
    } catch (error) {
      const failure = isAbortError(error)
        ? new TesseraConnectionError(
            `Request timed out after ${this.timeout}ms`,
          )
        : new TesseraConnectionError(
            `Network error: ${error instanceof Error ? error.message : String(error)}`,
          );
      this.logger.warn(`✗ ${target}`, { code: failure.code, message: failure.message });
      throw failure;
    } finally {
      clearTimeout(timer);
    }

    this.logger.debug(`← ${target} ${response.status}`);

    // ── Non-2xx: parse error body ──
    if (!response.ok) {
      let payload: unknown;
      try {
        payload = await this.readJson(response);
      } catch {
        // Body is not JSON – fall back to the status text
        payload = undefined;
      }
      const parsed = errorBodySchema.safeParse(payload);
      const error = TesseraError.generate(
        response.status,
        parsed.success ? parsed.data : undefined,
        response.statusText || undefined,
      );
      this.logger.warn(`✗ ${target}`, {
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      throw error;
    }

    // ── 2xx success ──
    const payload = await this.readJson(response);
    const result = schema.safeParse(payload);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
        .join("; ");
      const error = new TesseraSerializationError(
        `Unexpected response body for ${method} ${path}: ${issues}`,
        response.status,
      );
      this.logger.warn(`✗ ${target}`, { code: error.code, message: error.message });
      throw error;
    }
    return result.data;
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  /** Resolve a version-relative path against the base URL. */
  private buildUrl(path: string): URL {
    return new URL(
      `${this.baseUrl}${API_VERSION_PREFIX}${path.replace(LEADING_SLASH_REGEX, "")}`,
    );
  }

  /** Build the headers sent with every request. */
  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: "application/json",
      "User-Agent": this.userAgent,
    };

    if (hasBody) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
    }
    if (this.apiVersion) {
      headers["Tessera-Version"] = this.apiVersion;
    }
    if (this.account) {
      headers["Tessera-Account"] = this.account;
    }

    return headers;
  }

  /** Read a body as JSON. An empty body reads as `undefined`. */
  private async readJson(response: Response): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TesseraConnectionError(
        `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (text.length === 0) return undefined;

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new TesseraSerializationError(
        `Response body is not valid JSON (HTTP ${response.status})`,
        response.status,
      );
    }
  }
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
