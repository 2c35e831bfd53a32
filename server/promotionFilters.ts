import { MAX_INT32 } from "@shared/schema";
import { DataValidationError } from "./errors";

/** Collection filters in precedence order; only the first one present applies. */
export const FILTER_PRECEDENCE = ["id", "active", "name", "product_id", "promotion_type"] as const;
export type FilterParam = (typeof FILTER_PRECEDENCE)[number];

export type PromotionQuery =
  | { kind: "all" }
  | { kind: "id"; id: number }
  | { kind: "active"; active: boolean }
  | { kind: "name"; name: string }
  | { kind: "productId"; productId: number }
  | { kind: "promotionType"; promotionType: string }
  // A filter that cannot match anything, answered without touching storage
  | { kind: "none"; param: FilterParam };

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Strict query-string boolean: true/1/yes and false/0/no, trimmed and
 * case-insensitive. Anything else is null.
 */
export function parseBoolStrict(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/** Whether the value fits the `integer` columns promotions are stored in. */
export function fitsIntegerColumn(value: number): boolean {
  return value >= -MAX_INT32 - 1 && value <= MAX_INT32;
}

function firstValue(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    const first: unknown = raw[0];
    return typeof first === "string" ? first : "";
  }
  return "";
}

// An empty value leaves the filter out, except for promotion_type where it matches nothing
function presentParam(query: Record<string, unknown>): FilterParam | undefined {
  return FILTER_PRECEDENCE.find((param) => {
    if (!Object.prototype.hasOwnProperty.call(query, param) || query[param] === undefined) {
      return false;
    }
    return param === "promotion_type" || firstValue(query[param]) !== "";
  });
}

/**
 * Picks the single filter a collection request asks for. Throws a
 * DataValidationError for an unparsable `active` or `product_id`.
 */
export function resolvePromotionQuery(query: Record<string, unknown>): PromotionQuery {
  const param = presentParam(query);
  if (!param) return { kind: "all" };

  const raw = firstValue(query[param]);

  switch (param) {
    case "id": {
      const id = parseInteger(raw);
      return id !== null && fitsIntegerColumn(id) ? { kind: "id", id } : { kind: "none", param };
    }
    case "active": {
      const active = parseBoolStrict(raw);
      if (active === null) {
        throw new DataValidationError(
          "Invalid value for query parameter 'active'. " +
            "Accepted: true, false, 1, 0, yes, no (case-insensitive). " +
            `Received: '${raw}'`,
          { field: "active" },
        );
      }
      return { kind: "active", active };
    }
    case "name":
      return { kind: "name", name: raw.trim() };
    case "product_id": {
      const productId = parseInteger(raw);
      if (productId === null) {
        throw new DataValidationError(
          `Invalid value for query parameter 'product_id': '${raw}'`,
          { field: "product_id" },
        );
      }
      return fitsIntegerColumn(productId) ? { kind: "productId", productId } : { kind: "none", param };
    }
    case "promotion_type": {
      const promotionType = raw.trim();
      return promotionType ? { kind: "promotionType", promotionType } : { kind: "none", param };
    }
  }
}
