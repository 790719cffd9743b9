import type { Transport } from "../http";
import { subscriptionScheduleSchema } from "../schemas";
import type {
  CancelSubscriptionScheduleParams,
  ReleaseSubscriptionScheduleParams,
  SubscriptionSchedule,
} from "../types";

/** Resource class for Subscription Schedules. */
export class SubscriptionSchedulesResource {
  constructor(private readonly http: Transport) {}

  /**
   * Cancel a schedule and its subscription. Only schedules that are
   * `not_started` or `active` can be canceled.
   */
  async cancel(
    id: string,
    params: CancelSubscriptionScheduleParams = {},
  ): Promise<SubscriptionSchedule> {
    return this.http.postForm(
      `subscription_schedules/${encodeURIComponent(id)}/cancel`,
      params,
      subscriptionScheduleSchema,
    );
  }

  /**
   * Release a schedule. The subscription keeps running without it.
   */
  async release(
    id: string,
    params: ReleaseSubscriptionScheduleParams = {},
  ): Promise<SubscriptionSchedule> {
    return this.http.postForm(
      `subscription_schedules/${encodeURIComponent(id)}/release`,
      params,
      subscriptionScheduleSchema,
    );
  }
}
