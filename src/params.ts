// ---------------------------------------------------------------------------
// Tessera SDK – Request Parameter Helpers
// ---------------------------------------------------------------------------
// Bracket-notation query encoding shared by query strings and form bodies,
// plus small builders for range filters and expandable fields.
// ---------------------------------------------------------------------------

import { TesseraSerializationError } from "./errors";
import type { Expandable, RangeBounds, RangeQuery } from "./types";

/**
 * Encode a params object the way the API parses it.
 *
 * Nested objects become `a[b]=…`, arrays `a[0]=…`. `undefined` and `null`
 * are skipped. Dates are sent as Unix seconds.
 *
 * @example
 * ```ts
 * encodeQuery({ limit: 3, created: { gte: 1700000000 } });
 * // => "limit=3&created[gte]=1700000000"
 * ```
 * @throws {TesseraSerializationError} for functions and symbols.
 */
export function encodeQuery(params: object): string {
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(params)) {
    collectPairs(pairs, key, value);
  }
  return pairs
    .map(([key, value]) => `${encodeKey(key)}=${encodeURIComponent(value)}`)
    .join("&");
}

function collectPairs(
  pairs: Array<[string, string]>,
  key: string,
  value: unknown,
): void {
  if (value === undefined || value === null) return;

  if (value instanceof Date) {
    pairs.push([key, String(Math.floor(value.getTime() / 1000))]);
    return;
  }

  switch (typeof value) {
    case "string":
      pairs.push([key, value]);
      return;
    case "number":
    case "bigint":
    case "boolean":
      pairs.push([key, String(value)]);
      return;
    case "object":
      if (Array.isArray(value)) {
        value.forEach((item: unknown, index) =>
          collectPairs(pairs, `${key}[${index}]`, item),
        );
        return;
      }
      for (const [child, childValue] of Object.entries(value)) {
        collectPairs(pairs, `${key}[${child}]`, childValue);
      }
      return;
    default:
      throw new TesseraSerializationError(
        `Cannot encode a ${typeof value} as query parameter "${key}"`,
      );
  }
}

/** Percent-encode a key but leave its brackets readable. */
function encodeKey(key: string): string {
  return encodeURIComponent(key).replace(/%5B/g, "[").replace(/%5D/g, "]");
}

// ── Range filters ──────────────────────────────────────────────────────────

/**
 * Builders for range filters on list endpoints.
 *
 * @example
 * ```ts
 * await tessera.subscriptions.list({ created: range.gte(1700000000) });
 * ```
 */
export const range = {
  /** Match exactly `value`. */
  eq<T>(value: T): RangeQuery<T> {
    return value;
  },
  gt<T>(value: T): RangeBounds<T> {
    return { gt: value };
  },
  gte<T>(value: T): RangeBounds<T> {
    return { gte: value };
  },
  lt<T>(value: T): RangeBounds<T> {
    return { lt: value };
  },
  lte<T>(value: T): RangeBounds<T> {
    return { lte: value };
  },
};

// ── Expandable fields ──────────────────────────────────────────────────────

/** The id behind an expandable field, whether or not it was expanded. */
export function expandableId<T extends { id: string }>(
  value: Expandable<T>,
): string {
  return typeof value === "string" ? value : value.id;
}

/** The expanded object, or `null` when the API only returned its id. */
export function expandedObject<T extends { id: string }>(
  value: Expandable<T>,
): T | null {
  return typeof value === "string" ? null : value;
}
