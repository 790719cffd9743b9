// ---------------------------------------------------------------------------
// Tessera SDK – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { Tessera } from "./client";

// ── Transport ──────────────────────────────────────────────────────────────
export { HttpClient, API_VERSION_PREFIX } from "./http";
export type { Transport, PageTransport, HttpMethod } from "./http";

// ── Pagination ─────────────────────────────────────────────────────────────
export { Page, fetchNextPage, objectListItem, listSchema } from "./pagination";
export type { ListItemType, ListObject } from "./pagination";

// ── Params ─────────────────────────────────────────────────────────────────
export { encodeQuery, range, expandableId, expandedObject } from "./params";

// ── Logging ────────────────────────────────────────────────────────────────
export { createConsoleLogger, parseLogLevel } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";

// ── Error classes ──────────────────────────────────────────────────────────
export {
  TesseraError,
  TesseraAuthenticationError,
  TesseraPermissionError,
  TesseraInvalidRequestError,
  TesseraNotFoundError,
  TesseraRateLimitError,
  TesseraAPIError,
  TesseraConnectionError,
  TesseraSerializationError,
  TesseraUnsupportedVersionError,
  TesseraProtocolError,
  errorCodeFromStatus,
} from "./errors";
export type { TesseraErrorCode } from "./errors";

// ── Schemas & item types ───────────────────────────────────────────────────
export * as schemas from "./schemas";
export type { Schema } from "./schemas";
export { paymentMethodItem } from "./resources/payment-methods";
export { subscriptionItem } from "./resources/subscriptions";
export { usageRecordSummaryItem } from "./resources/usage-records";

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  // Config
  TesseraConfig,
  AppInfo,
  // Shared
  Timestamp,
  Metadata,
  Expandable,
  RangeBounds,
  RangeQuery,
  ListParams,
  RetrieveParams,
  // Objects
  Customer,
  CheckoutSession,
  BillingPortalSession,
  PaymentMethod,
  Subscription,
  SubscriptionStatus,
  SubscriptionSchedule,
  UsageRecord,
  UsageRecordAction,
  UsageRecordSummary,
  // Params
  CheckoutSessionLineItem,
  CreateCheckoutSessionParams,
  CreateBillingPortalSessionParams,
  AttachPaymentMethodParams,
  ListPaymentMethodsParams,
  ListSubscriptionsParams,
  CancelSubscriptionScheduleParams,
  ReleaseSubscriptionScheduleParams,
  CreateUsageRecordParams,
  ListUsageRecordSummariesParams,
  // Error body
  TesseraErrorBody,
} from "./types";

// ── Version ────────────────────────────────────────────────────────────────
export { SDK_VERSION } from "./version";
