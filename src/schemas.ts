// ---------------------------------------------------------------------------
// Tessera SDK – Response Schemas
// ---------------------------------------------------------------------------
// zod schemas for every object the API returns. They check the fields the
// SDK relies on and let everything else through untouched, so new API
// fields never break an older client.
// ---------------------------------------------------------------------------

import { z } from "zod";

/** A schema producing `T` from an untyped JSON body. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const timestamp = z.number().int();
const metadata = z.record(z.string());

/** Field that holds an id, or the object itself when expanded. */
export function expandable<T extends z.ZodTypeAny>(object: T) {
  return z.union([z.string(), object]);
}

// ── Error body ─────────────────────────────────────────────────────────────

export const errorBodySchema = z.object({
  error: z
    .object({
      type: z.string().optional(),
      code: z.string().optional(),
      message: z.string().optional(),
      param: z.string().optional(),
    })
    .passthrough(),
});

// ── Customer ───────────────────────────────────────────────────────────────

export const customerSchema = z
  .object({
    id: z.string(),
    object: z.literal("customer"),
    created: timestamp,
    livemode: z.boolean(),
    email: z.string().nullish(),
    name: z.string().nullish(),
    metadata: metadata.optional(),
  })
  .passthrough();

// ── Checkout ───────────────────────────────────────────────────────────────

export const checkoutSessionSchema = z
  .object({
    id: z.string(),
    object: z.literal("checkout.session"),
    livemode: z.boolean(),
    mode: z.enum(["payment", "setup", "subscription"]),
    url: z.string().nullish(),
    status: z.string().nullish(),
    payment_status: z.string().nullish(),
    customer: expandable(customerSchema).nullish(),
    customer_email: z.string().nullish(),
    client_reference_id: z.string().nullish(),
    success_url: z.string().nullish(),
    cancel_url: z.string().nullish(),
    metadata: metadata.nullish(),
  })
  .passthrough();

// ── Billing portal ─────────────────────────────────────────────────────────

export const billingPortalSessionSchema = z
  .object({
    id: z.string(),
    object: z.literal("billing_portal.session"),
    created: timestamp,
    customer: z.string(),
    livemode: z.boolean(),
    return_url: z.string().nullish(),
    url: z.string(),
    configuration: z.string().nullish(),
  })
  .passthrough();

// ── Payment methods ────────────────────────────────────────────────────────

export const paymentMethodSchema = z
  .object({
    id: z.string(),
    object: z.literal("payment_method"),
    type: z.string(),
    created: timestamp,
    livemode: z.boolean(),
    customer: expandable(customerSchema).nullable(),
    metadata: metadata.nullish(),
  })
  .passthrough();

// ── Subscriptions ──────────────────────────────────────────────────────────

export const subscriptionStatusSchema = z.enum([
  "incomplete",
  "incomplete_expired",
  "trialing",
  "active",
  "past_due",
  "canceled",
  "unpaid",
  "paused",
]);

export const subscriptionSchema = z
  .object({
    id: z.string(),
    object: z.literal("subscription"),
    status: subscriptionStatusSchema,
    customer: expandable(customerSchema),
    created: timestamp,
    livemode: z.boolean(),
    current_period_start: timestamp,
    current_period_end: timestamp,
    cancel_at_period_end: z.boolean(),
    canceled_at: timestamp.nullish(),
    metadata: metadata.optional(),
  })
  .passthrough();

export const subscriptionScheduleSchema = z
  .object({
    id: z.string(),
    object: z.literal("subscription_schedule"),
    status: z.enum(["not_started", "active", "completed", "released", "canceled"]),
    customer: expandable(customerSchema),
    subscription: expandable(subscriptionSchema).nullish(),
    created: timestamp,
    livemode: z.boolean(),
    canceled_at: timestamp.nullish(),
    released_at: timestamp.nullish(),
  })
  .passthrough();

// ── Metered usage ──────────────────────────────────────────────────────────

export const usageRecordSchema = z
  .object({
    id: z.string(),
    object: z.literal("usage_record"),
    quantity: z.number().int().nonnegative(),
    subscription_item: z.string(),
    timestamp,
    livemode: z.boolean().optional(),
  })
  .passthrough();

export const usageRecordSummarySchema = z
  .object({
    id: z.string(),
    object: z.literal("usage_record_summary"),
    invoice: z.string().nullable(),
    period: z.object({
      start: timestamp.nullable(),
      end: timestamp.nullable(),
    }),
    subscription_item: z.string(),
    total_usage: z.number().int(),
    livemode: z.boolean().optional(),
  })
  .passthrough();
