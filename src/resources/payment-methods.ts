// ---------------------------------------------------------------------------
// Tessera SDK – Payment Methods Resource
// ---------------------------------------------------------------------------

import type { Transport } from "../http";
import { Page, listSchema, objectListItem } from "../pagination";
import { paymentMethodSchema } from "../schemas";
import type {
  AttachPaymentMethodParams,
  ListPaymentMethodsParams,
  PaymentMethod,
  RetrieveParams,
} from "../types";

/** Payment methods paginate by id. */
export const paymentMethodItem = objectListItem(paymentMethodSchema);

/**
 * Resource class for Payment Methods.
 *
 * @example
 * ```ts
 * await tessera.paymentMethods.attach('pm_123', { customer: 'cus_123' });
 *
 * const page = await tessera.paymentMethods.list({ customer: 'cus_123', type: 'card' });
 * const cards = await page.collectAll(tessera.transport);
 * ```
 */
export class PaymentMethodsResource {
  constructor(private readonly http: Transport) {}

  /**
   * Attach a payment method to a customer.
   *
   * @throws {TesseraError} with `not_found_error` if either id is unknown.
   */
  async attach(
    id: string,
    params: AttachPaymentMethodParams,
  ): Promise<PaymentMethod> {
    return this.http.postForm(
      `payment_methods/${encodeURIComponent(id)}/attach`,
      params,
      paymentMethodSchema,
    );
  }

  /** Detach a payment method from its customer. */
  async detach(id: string): Promise<PaymentMethod> {
    return this.http.post(
      `payment_methods/${encodeURIComponent(id)}/detach`,
      paymentMethodSchema,
    );
  }

  /**
   * Retrieve a single payment method by its ID.
   *
   * @param params - Optional `expand` list, e.g. `['customer']`.
   */
  async retrieve(id: string, params: RetrieveParams = {}): Promise<PaymentMethod> {
    return this.http.getQuery(
      `payment_methods/${encodeURIComponent(id)}`,
      params,
      paymentMethodSchema,
    );
  }

  /**
   * List a customer's payment methods, newest first.
   *
   * @returns The first page. Filters are repeated on every later page.
   */
  async list(params: ListPaymentMethodsParams = {}): Promise<Page<PaymentMethod>> {
    const list = await this.http.getQuery(
      "payment_methods",
      params,
      listSchema(paymentMethodItem),
    );
    return new Page(paymentMethodItem, list).withParams(params);
  }
}
