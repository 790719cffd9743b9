// ---------------------------------------------------------------------------
// Tessera SDK – Subscriptions Resource
// ---------------------------------------------------------------------------

import type { Transport } from "../http";
import { Page, listSchema, objectListItem } from "../pagination";
import { subscriptionSchema } from "../schemas";
import type {
  ListSubscriptionsParams,
  RetrieveParams,
  Subscription,
} from "../types";

export const subscriptionItem = objectListItem(subscriptionSchema);

/**
 * Resource class for Subscriptions.
 *
 * @example
 * ```ts
 * // Every active subscription created since the start of 2024
 * const page = await tessera.subscriptions.list({
 *   status: 'active',
 *   created: range.gte(1704067200),
 * });
 * for await (const sub of page.autoPaginate(tessera.transport)) {
 *   console.log(sub.id, sub.current_period_end);
 * }
 * ```
 */
export class SubscriptionsResource {
  constructor(private readonly http: Transport) {}

  /** Retrieve a subscription by its ID. */
  async retrieve(id: string, params: RetrieveParams = {}): Promise<Subscription> {
    return this.http.getQuery(
      `subscriptions/${encodeURIComponent(id)}`,
      params,
      subscriptionSchema,
    );
  }

  /**
   * List subscriptions, newest first. By default canceled subscriptions
   * are left out; pass `status: 'all'` to include them.
   */
  async list(params: ListSubscriptionsParams = {}): Promise<Page<Subscription>> {
    const list = await this.http.getQuery(
      "subscriptions",
      params,
      listSchema(subscriptionItem),
    );
    return new Page(subscriptionItem, list).withParams(params);
  }

  /**
   * Cancel a subscription immediately.
   *
   * @returns The subscription, now with status `canceled`.
   */
  async cancel(id: string): Promise<Subscription> {
    return this.http.delete(
      `subscriptions/${encodeURIComponent(id)}`,
      subscriptionSchema,
    );
  }
}
