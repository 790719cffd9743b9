// ---------------------------------------------------------------------------
// Tessera SDK – Cursor Pagination
// ---------------------------------------------------------------------------
// List endpoints return one page at a time:
//
//   { "object": "list", "data": [...], "has_more": true, "url": "/v1/…" }
//
// The next page is requested with `starting_after=<cursor of last item>`,
// repeating whatever filters produced the first page. `Page` wraps one such
// response and knows how to fetch the following one, walk the whole
// collection lazily, or collect it eagerly.
// ---------------------------------------------------------------------------

import { z } from "zod";
import {
  TesseraProtocolError,
  TesseraSerializationError,
  TesseraUnsupportedVersionError,
} from "./errors";
import { API_VERSION_PREFIX } from "./http";
import type { PageTransport } from "./http";
import { encodeQuery } from "./params";
import type { Schema } from "./schemas";

/**
 * How a paginated item type is decoded and which cursor continues a list
 * after it. Declared once per item type.
 */
export interface ListItemType<T> {
  readonly schema: Schema<T>;
  /** Pure: must not depend on anything but `item`. */
  cursor(item: T): string;
}

/** Item type for API objects, whose cursor is their `id`. */
export function objectListItem<T extends { id: string }>(
  schema: Schema<T>,
): ListItemType<T> {
  return { schema, cursor: (item) => item.id };
}

/** Wire shape of a list response. */
export interface ListObject<T> {
  readonly data: readonly T[];
  readonly has_more: boolean;
  readonly total_count?: number | null;
  /** Endpoint path including the version prefix, e.g. `/v1/subscriptions`. */
  readonly url: string;
}

const listEnvelopeSchema = z.object({
  object: z.literal("list").optional(),
  data: z.array(z.unknown()),
  has_more: z.boolean(),
  total_count: z.number().int().nonnegative().nullish(),
  url: z.string(),
});

function listObjectSchema<T>(item: Schema<T>): Schema<ListObject<T>> {
  return listEnvelopeSchema.transform((list, ctx): ListObject<T> => {
    const data: T[] = [];
    list.data.forEach((raw, index) => {
      const result = item.safeParse(raw);
      if (result.success) {
        data.push(result.data);
        return;
      }
      for (const issue of result.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["data", index, ...issue.path],
          message: issue.message,
        });
      }
    });
    return { ...list, data };
  });
}

/** Query keys that belong to a single request, never to a whole walk. */
const CURSOR_KEYS = new Set(["starting_after", "ending_before"]);

/**
 * A single page of a cursor-paginated list.
 *
 * Pages are immutable. `params` holds the encoded filters the list was
 * requested with; the API does not echo them, so the SDK stamps them on
 * every page it fetches to keep continuations consistent.
 *
 * @example
 * ```ts
 * const page = await tessera.subscriptions.list({ status: 'active', limit: 50 });
 *
 * for await (const subscription of page.autoPaginate(tessera.transport)) {
 *   console.log(subscription.id);
 * }
 * ```
 */
export class Page<T> implements ListObject<T> {
  readonly data: readonly T[];
  readonly has_more: boolean;
  readonly total_count: number | null;
  readonly url: string;
  readonly params: string | null;
  readonly itemType: ListItemType<T>;

  /**
   * @throws {TesseraProtocolError} if `list` has no items but claims more.
   */
  constructor(
    itemType: ListItemType<T>,
    list: ListObject<T>,
    params: string | null = null,
  ) {
    if (list.data.length === 0 && list.has_more) {
      throw new TesseraProtocolError(
        `List ${list.url} reported more results but returned no items`,
      );
    }

    this.itemType = itemType;
    this.data = [...list.data];
    this.has_more = list.has_more;
    this.total_count = list.total_count ?? null;
    this.url = list.url;
    this.params = params === "" ? null : params;
  }

  /**
   * Validate a raw list body and wrap it.
   *
   * @throws {TesseraSerializationError} if the body is not a list of `T`.
   * @throws {TesseraProtocolError} if it has no items but claims more.
   */
  static parse<T>(
    itemType: ListItemType<T>,
    body: unknown,
    params: string | null = null,
  ): Page<T> {
    const result = listObjectSchema(itemType.schema).safeParse(body);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`)
        .join("; ");
      throw new TesseraSerializationError(`Malformed list body: ${issues}`);
    }
    return new Page(itemType, result.data, params);
  }

  /**
   * Copy of this page that repeats `params` on every continuation.
   * Cursor keys are dropped: the walk supplies its own.
   */
  withParams(params: object): Page<T> {
    const filters = Object.fromEntries(
      Object.entries(params).filter(([key]) => !CURSOR_KEYS.has(key)),
    );
    return new Page(this.itemType, this, encodeQuery(filters));
  }

  /**
   * Fetch the page after this one.
   *
   * An empty page has nothing to continue from; it resolves with another
   * empty page without making a request.
   */
  async next(transport: PageTransport): Promise<Page<T>> {
    if (this.data.length === 0) {
      return new Page(
        this.itemType,
        { data: [], has_more: false, total_count: this.total_count, url: this.url },
        this.params,
      );
    }

    const last = this.data[this.data.length - 1];
    return fetchNextPage(
      transport,
      this.itemType,
      this.url,
      this.itemType.cursor(last),
      this.params,
    );
  }

  /**
   * Walk every item of the list, starting with this page.
   *
   * The next page is requested only once the consumer asks for the item
   * after the last one already fetched. If a request fails, the pending
   * `next()` rejects with its error and the generator is finished.
   */
  async *autoPaginate(transport: PageTransport): AsyncGenerator<T, void, undefined> {
    let page: Page<T> = this;
    for (;;) {
      yield* page.data;
      if (!page.has_more) return;
      page = await page.next(transport);
    }
  }

  /**
   * Fetch every remaining page and return all items in order.
   *
   * Rejects with the first failed request; items gathered so far are
   * discarded.
   */
  async collectAll(transport: PageTransport): Promise<T[]> {
    const items: T[] = [...this.data];
    let page: Page<T> = this;
    while (page.has_more) {
      page = await page.next(transport);
      items.push(...page.data);
    }
    return items;
  }
}

/**
 * Request the page of `url` that follows `cursor`.
 *
 * `url` is the list's own url as returned by the API. It must carry this
 * client's version prefix, which is stripped before the request.
 *
 * @throws {TesseraUnsupportedVersionError} without making a request when
 *         `url` belongs to another API version.
 */
export async function fetchNextPage<T>(
  transport: PageTransport,
  itemType: ListItemType<T>,
  url: string,
  cursor: string,
  params: string | null = null,
): Promise<Page<T>> {
  if (!url.startsWith(API_VERSION_PREFIX)) {
    throw new TesseraUnsupportedVersionError(
      `URL for fetching additional data uses a different API version: ${url}`,
    );
  }

  let path = url.slice(API_VERSION_PREFIX.length);
  path += `${path.includes("?") ? "&" : "?"}starting_after=${encodeURIComponent(cursor)}`;
  if (params) {
    path += `&${params}`;
  }

  const list = await transport.get(path, listObjectSchema(itemType.schema));
  return new Page(itemType, list, params);
}

/** Schema of a list response whose items match `itemType`. */
export function listSchema<T>(itemType: ListItemType<T>): Schema<ListObject<T>> {
  return listObjectSchema(itemType.schema);
}
