// ---------------------------------------------------------------------------
// Tessera SDK – Usage Records Resource
// ---------------------------------------------------------------------------
// Metered billing. Usage is reported against a subscription item and read
// back as per-period summaries.
// ---------------------------------------------------------------------------

import type { Transport } from "../http";
import { Page, listSchema, objectListItem } from "../pagination";
import { usageRecordSchema, usageRecordSummarySchema } from "../schemas";
import type {
  CreateUsageRecordParams,
  ListUsageRecordSummariesParams,
  UsageRecord,
  UsageRecordSummary,
} from "../types";

export const usageRecordSummaryItem = objectListItem(usageRecordSummarySchema);

export class UsageRecordsResource {
  constructor(private readonly http: Transport) {}

  /**
   * Report usage for a subscription item at a point in time.
   *
   * @example
   * ```ts
   * await tessera.usageRecords.create('si_123', {
   *   quantity: 42,
   *   timestamp: 'now',
   *   action: 'increment',
   * });
   * ```
   */
  async create(
    subscriptionItemId: string,
    params: CreateUsageRecordParams,
  ): Promise<UsageRecord> {
    return this.http.postForm(
      `subscription_items/${encodeURIComponent(subscriptionItemId)}/usage_records`,
      params,
      usageRecordSchema,
    );
  }

  /**
   * List usage summaries for a subscription item, one per billing period,
   * newest first. The first summary covers the current, still-open period,
   * so its totals can change until that period ends.
   */
  async listSummaries(
    subscriptionItemId: string,
    params: ListUsageRecordSummariesParams = {},
  ): Promise<Page<UsageRecordSummary>> {
    const list = await this.http.getQuery(
      `subscription_items/${encodeURIComponent(subscriptionItemId)}/usage_record_summaries`,
      params,
      listSchema(usageRecordSummaryItem),
    );
    return new Page(usageRecordSummaryItem, list).withParams(params);
  }
}
