// ---------------------------------------------------------------------------
// Tessera SDK – Main Client
// ---------------------------------------------------------------------------
// The primary entry point for SDK consumers: `tessera.<resource>.<method>(…)`.
// Resources are created on first access and share one transport.
// ---------------------------------------------------------------------------

import { HttpClient } from "./http";
import type { Transport } from "./http";
import { BillingPortalResource } from "./resources/billing-portal";
import { CheckoutResource } from "./resources/checkout";
import { PaymentMethodsResource } from "./resources/payment-methods";
import { SubscriptionSchedulesResource } from "./resources/subscription-schedules";
import { SubscriptionsResource } from "./resources/subscriptions";
import { UsageRecordsResource } from "./resources/usage-records";
import type { TesseraConfig } from "./types";

/**
 * The Tessera SDK client.
 *
 * @example
 * ```ts
 * import { Tessera } from 'tessera-node';
 *
 * const tessera = new Tessera({ apiKey: process.env.TESSERA_SECRET_KEY ?? '' });
 *
 * const page = await tessera.subscriptions.list({ limit: 100 });
 * const all = await page.collectAll(tessera.transport);
 * console.log(`Found ${all.length} subscriptions`);
 * ```
 */
export class Tessera {
  /** Internal HTTP transport – shared across all resources. */
  private readonly http: HttpClient;

  // ── Resource instances (lazy-initialised) ────────────────────────────────
  private _checkout?: CheckoutResource;
  private _billingPortal?: BillingPortalResource;
  private _paymentMethods?: PaymentMethodsResource;
  private _subscriptions?: SubscriptionsResource;
  private _subscriptionSchedules?: SubscriptionSchedulesResource;
  private _usageRecords?: UsageRecordsResource;

  /**
   * Create a new Tessera client.
   *
   * @param config - Configuration object. Only `apiKey` is required.
   * @throws {TesseraAuthenticationError} if `apiKey` is empty.
   *
   * @example
   * ```ts
   * // Against a local mock, with request logging
   * const tessera = new Tessera({
   *   apiKey: 'sk_test_...',
   *   baseUrl: 'http://localhost:12111',
   *   timeout: 10_000,
   *   logLevel: 'debug',
   * });
   * ```
   */
  constructor(config: TesseraConfig) {
    this.http = new HttpClient(config);
  }

  /**
   * The transport behind every resource. Pass it to `Page.next`,
   * `Page.autoPaginate` and `Page.collectAll` to continue a list.
   */
  get transport(): Transport {
    return this.http;
  }

  // ── Resource accessors ───────────────────────────────────────────────────

  /** Hosted checkout sessions. */
  get checkout(): CheckoutResource {
    if (!this._checkout) {
      this._checkout = new CheckoutResource(this.http);
    }
    return this._checkout;
  }

  /** Customer portal sessions. */
  get billingPortal(): BillingPortalResource {
    if (!this._billingPortal) {
      this._billingPortal = new BillingPortalResource(this.http);
    }
    return this._billingPortal;
  }

  get paymentMethods(): PaymentMethodsResource {
    if (!this._paymentMethods) {
      this._paymentMethods = new PaymentMethodsResource(this.http);
    }
    return this._paymentMethods;
  }

  get subscriptions(): SubscriptionsResource {
    if (!this._subscriptions) {
      this._subscriptions = new SubscriptionsResource(this.http);
    }
    return this._subscriptions;
  }

  get subscriptionSchedules(): SubscriptionSchedulesResource {
    if (!this._subscriptionSchedules) {
      this._subscriptionSchedules = new SubscriptionSchedulesResource(this.http);
    }
    return this._subscriptionSchedules;
  }

  /** Metered usage reporting and per-period summaries. */
  get usageRecords(): UsageRecordsResource {
    if (!this._usageRecords) {
      this._usageRecords = new UsageRecordsResource(this.http);
    }
    return this._usageRecords;
  }
}
