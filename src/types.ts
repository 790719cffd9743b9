// ---------------------------------------------------------------------------
// Tessera SDK – Type Definitions
// ---------------------------------------------------------------------------
// Response types are inferred from the zod schemas in `schemas.ts`, so the
// runtime check and the static type can never drift apart. Request params
// use the API's wire names (snake_case) and are encoded as-is.
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type { LogLevel, Logger } from "./logger";
import type {
  billingPortalSessionSchema,
  checkoutSessionSchema,
  customerSchema,
  errorBodySchema,
  paymentMethodSchema,
  subscriptionScheduleSchema,
  subscriptionSchema,
  subscriptionStatusSchema,
  usageRecordSchema,
  usageRecordSummarySchema,
} from "./schemas";

// ── Shared ─────────────────────────────────────────────────────────────────

/** Seconds since the Unix epoch. */
export type Timestamp = number;

export type Metadata = Record<string, string>;

/** Either the id of an object or, when expanded, the object itself. */
export type Expandable<T extends { id: string }> = string | T;

/** Bounds for range filters such as `created`. */
export interface RangeBounds<T> {
  gt?: T;
  gte?: T;
  lt?: T;
  lte?: T;
}

/** A range filter: an exact value or a set of bounds. */
export type RangeQuery<T> = T | RangeBounds<T>;

/** Cursor parameters accepted by every list endpoint. */
export interface ListParams {
  /** Page size, 1–100. The API defaults to 10. */
  limit?: number;
  /** Return objects after this id. Set by the SDK on continuation. */
  starting_after?: string;
  /** Return objects before this id. */
  ending_before?: string;
  /** Fields to expand in every returned object. */
  expand?: readonly string[];
}

/** Optional `expand` list for retrieve calls. */
export interface RetrieveParams {
  expand?: readonly string[];
}

// ── Objects ────────────────────────────────────────────────────────────────

export type Customer = z.infer<typeof customerSchema>;
export type CheckoutSession = z.infer<typeof checkoutSessionSchema>;
export type BillingPortalSession = z.infer<typeof billingPortalSessionSchema>;
export type PaymentMethod = z.infer<typeof paymentMethodSchema>;
export type SubscriptionStatus = z.infer<typeof subscriptionStatusSchema>;
export type Subscription = z.infer<typeof subscriptionSchema>;
export type SubscriptionSchedule = z.infer<typeof subscriptionScheduleSchema>;
export type UsageRecord = z.infer<typeof usageRecordSchema>;
export type UsageRecordSummary = z.infer<typeof usageRecordSummarySchema>;

// ── Checkout ───────────────────────────────────────────────────────────────

export interface CheckoutSessionLineItem {
  /** Id of an existing price. Use instead of `amount`/`currency`/`name`. */
  price?: string;
  /** The amount to be collected per unit, in the smallest currency unit. */
  amount?: number;
  /** Three-letter ISO currency code, lowercase. */
  currency?: string;
  name?: string;
  description?: string;
  images?: readonly string[];
  quantity: number;
}

/** Parameters for `checkout.sessions.create`. */
export interface CreateCheckoutSessionParams {
  /** Where the customer lands after a successful payment. */
  success_url: string;
  /** Where the customer lands if they cancel. */
  cancel_url: string;
  mode?: "payment" | "setup" | "subscription";
  payment_method_types?: readonly string[];
  /** Your own reference (cart or order id) for reconciling the session. */
  client_reference_id?: string;
  customer?: string;
  customer_email?: string;
  billing_address_collection?: "auto" | "required";
  line_items?: readonly CheckoutSessionLineItem[];
  locale?: string;
  submit_type?: "auto" | "book" | "donate" | "pay";
  metadata?: Metadata;
}

// ── Billing portal ─────────────────────────────────────────────────────────

/** Parameters for `billingPortal.sessions.create`. */
export interface CreateBillingPortalSessionParams {
  customer: string;
  /**
   * Where the portal's "return" link points. Required unless the portal
   * configuration defines a default.
   */
  return_url?: string;
  /** Portal configuration id. The account default is used when omitted. */
  configuration?: string;
}

// ── Payment methods ────────────────────────────────────────────────────────

export interface AttachPaymentMethodParams {
  customer: string;
}

export interface ListPaymentMethodsParams extends ListParams {
  customer?: string;
  type?: string;
}

// ── Subscriptions ──────────────────────────────────────────────────────────

export interface ListSubscriptionsParams extends ListParams {
  customer?: string;
  price?: string;
  status?: SubscriptionStatus | "all" | "ended";
  created?: RangeQuery<Timestamp>;
}

export interface CancelSubscriptionScheduleParams {
  /** Bill pending usage immediately. */
  invoice_now?: boolean;
  /** Create prorations for the unused period. */
  prorate?: boolean;
}

export interface ReleaseSubscriptionScheduleParams {
  preserve_cancel_date?: boolean;
}

// ── Metered usage ──────────────────────────────────────────────────────────

/** `increment` adds to the usage at `timestamp`; `set` overwrites it. */
export type UsageRecordAction = "increment" | "set";

export interface CreateUsageRecordParams {
  quantity: number;
  timestamp: Timestamp | "now";
  action?: UsageRecordAction;
}

export type ListUsageRecordSummariesParams = ListParams;

// ── Client Config ──────────────────────────────────────────────────────────

/** Identifies the application built on top of the SDK in `User-Agent`. */
export interface AppInfo {
  name: string;
  version?: string;
  url?: string;
}

/** Configuration options for initialising the Tessera client. */
export interface TesseraConfig {
  /** Secret API key (`sk_...`). **Never expose in client-side code.** */
  apiKey: string;
  /**
   * Override the API origin. The `/v1` prefix is added by the SDK.
   * @default "https://api.tessera.dev"
   */
  baseUrl?: string;
  /**
   * Request timeout in milliseconds.
   * @default 30_000
   */
  timeout?: number;
  /** Pin the API version, sent as `Tessera-Version`. */
  apiVersion?: string;
  /** Act on behalf of a connected account, sent as `Tessera-Account`. */
  account?: string;
  appInfo?: AppInfo;
  /**
   * `fetch` implementation used for every request. Swap it for an
   * instrumented or recorded one.
   * @default globalThis.fetch
   */
  fetch?: typeof fetch;
  /** Receives request logs. Takes precedence over `logLevel`. */
  logger?: Logger;
  /**
   * Minimum level for the built-in console logger.
   * @default process.env.TESSERA_LOG_LEVEL ?? "warn"
   */
  logLevel?: LogLevel;
}

// ── Error ──────────────────────────────────────────────────────────────────

/** Shape of the error body returned by the API. */
export type TesseraErrorBody = z.infer<typeof errorBodySchema>;
