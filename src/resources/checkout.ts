// ---------------------------------------------------------------------------
// Tessera SDK – Checkout Resource
// ---------------------------------------------------------------------------
// Hosted checkout sessions, reached as `tessera.checkout.sessions`.
// ---------------------------------------------------------------------------

import type { Transport } from "../http";
import { checkoutSessionSchema } from "../schemas";
import type { CheckoutSession, CreateCheckoutSessionParams } from "../types";

/**
 * Resource class for Checkout Sessions.
 *
 * @example
 * ```ts
 * const session = await tessera.checkout.sessions.create({
 *   success_url: 'https://example.com/thank-you',
 *   cancel_url: 'https://example.com/cart',
 *   mode: 'payment',
 *   line_items: [{ price: 'price_123', quantity: 1 }],
 * });
 *
 * // Redirect the customer to the hosted page
 * console.log(session.url);
 * ```
 */
export class CheckoutSessionsResource {
  constructor(private readonly http: Transport) {}

  /**
   * Create a new checkout session.
   *
   * @returns The created session, including the hosted page `url`.
   * @throws  {TesseraError} if the request fails validation or auth.
   */
  async create(params: CreateCheckoutSessionParams): Promise<CheckoutSession> {
    return this.http.postForm("checkout/sessions", params, checkoutSessionSchema);
  }
}

/** Groups the checkout sub-resources. */
export class CheckoutResource {
  readonly sessions: CheckoutSessionsResource;

  constructor(http: Transport) {
    this.sessions = new CheckoutSessionsResource(http);
  }
}
