import type { Transport } from "../http";
import { billingPortalSessionSchema } from "../schemas";
import type {
  BillingPortalSession,
  CreateBillingPortalSessionParams,
} from "../types";

/**
 * Customer portal sessions. A session is a short-lived link that lets a
 * customer manage their own subscriptions and billing details.
 */
export class BillingPortalSessionsResource {
  constructor(private readonly http: Transport) {}

  /**
   * Create a portal session for an existing customer.
   *
   * @example
   * ```ts
   * const { url } = await tessera.billingPortal.sessions.create({
   *   customer: 'cus_123',
   *   return_url: 'https://example.com/account',
   * });
   * ```
   */
  async create(
    params: CreateBillingPortalSessionParams,
  ): Promise<BillingPortalSession> {
    return this.http.postForm(
      "billing_portal/sessions",
      params,
      billingPortalSessionSchema,
    );
  }
}

export class BillingPortalResource {
  readonly sessions: BillingPortalSessionsResource;

  constructor(http: Transport) {
    this.sessions = new BillingPortalSessionsResource(http);
  }
}
