import { z } from "zod";
import {
  MAX_INT32,
  PROMOTION_NAME_MAX_LENGTH,
  PROMOTION_TYPES,
  type PromotionInput,
} from "./schema";
import { isIsoCalendarDate } from "./date-utils";

export const PROMOTION_VALIDATION_ERROR_KINDS = [
  "InvalidAttribute",
  "MissingField",
  "TypeMismatch",
  "InvalidEnum",
  "InvalidRange",
  "InvalidDate",
  "IdMismatch",
] as const;
export type PromotionValidationErrorKind = (typeof PROMOTION_VALIDATION_ERROR_KINDS)[number];

export type PromotionValidationError = {
  kind: PromotionValidationErrorKind;
  field?: string;
  message: string;
};

export type PromotionValidationResult =
  | { success: true; data: PromotionInput }
  | { success: false; error: PromotionValidationError };

const DATE_FIELDS = new Set(["start_date", "end_date"]);

function missing(field: string) {
  return `Invalid promotion: missing ${field}`;
}

function requiredString(field: string) {
  return z.string({
    required_error: missing(field),
    invalid_type_error: `Field '${field}' must be a string`,
  });
}

function requiredInteger(field: string) {
  return z
    .number({
      required_error: missing(field),
      invalid_type_error: `Field '${field}' must be an integer`,
    })
    .int({ message: `Field '${field}' must be an integer` });
}

function isoDate(field: string) {
  const message = `Field '${field}' must be an ISO date (YYYY-MM-DD)`;
  return z
    .string({ required_error: missing(field), invalid_type_error: message })
    .refine(isIsoCalendarDate, { message, params: { kind: "InvalidDate" } });
}

const allowedTypes = [...PROMOTION_TYPES].sort().join(", ");

export const promotionPayloadSchema = z
  .object({
    name: requiredString("name")
      .min(1, { message: "Invalid promotion: name must not be empty" })
      .max(PROMOTION_NAME_MAX_LENGTH, {
        message: `Field 'name' must be at most ${PROMOTION_NAME_MAX_LENGTH} characters`,
      }),
    promotion_type: requiredString("promotion_type").pipe(
      z.enum(PROMOTION_TYPES, {
        errorMap: (_issue, ctx) => ({
          message: `Invalid promotion_type '${String(ctx.data)}'. Allowed: ${allowedTypes}`,
        }),
      }),
    ),
    value: requiredInteger("value")
      .min(0, { message: "Invalid value: must be >= 0" })
      .max(MAX_INT32, { message: `Invalid value: must be <= ${MAX_INT32}` }),
    product_id: requiredInteger("product_id")
      .positive({ message: "Invalid product_id: must be > 0" })
      .max(MAX_INT32, { message: `Invalid product_id: must be <= ${MAX_INT32}` }),
    start_date: isoDate("start_date"),
    end_date: isoDate("end_date"),
  })
  .superRefine((data, ctx) => {
    if (data.start_date > data.end_date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["start_date"],
        message: "Invalid date range: start_date must not be after end_date",
        params: { kind: "InvalidRange" },
      });
    }
  });

function isErrorKind(value: unknown): value is PromotionValidationErrorKind {
  return (
    typeof value === "string" &&
    (PROMOTION_VALIDATION_ERROR_KINDS as readonly string[]).includes(value)
  );
}

function classifyIssue(issue: z.ZodIssue): PromotionValidationErrorKind {
  const field = typeof issue.path[0] === "string" ? issue.path[0] : undefined;
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === z.ZodParsedType.undefined) return "MissingField";
      return field && DATE_FIELDS.has(field) ? "InvalidDate" : "TypeMismatch";
    case z.ZodIssueCode.invalid_enum_value:
      return "InvalidEnum";
    case z.ZodIssueCode.too_small:
      // An empty name is reported as a missing value
      return field === "name" && issue.type === "string" ? "MissingField" : "InvalidRange";
    case z.ZodIssueCode.too_big:
      return "InvalidRange";
    case z.ZodIssueCode.custom: {
      const kind: unknown = issue.params?.kind;
      return isErrorKind(kind) ? kind : "InvalidAttribute";
    }
    default:
      return "InvalidAttribute";
  }
}

/**
 * Map the first Zod issue onto the promotion error taxonomy. Issues arrive in
 * schema field order, so the reported problem is the first failing field.
 */
export function toPromotionValidationError(error: z.ZodError): PromotionValidationError {
  const [issue] = error.issues;
  if (!issue) {
    return { kind: "InvalidAttribute", message: "Invalid promotion" };
  }
  if (issue.path.length === 0) {
    return {
      kind: "InvalidAttribute",
      message: "Invalid attribute: request body must be a JSON object",
    };
  }
  return {
    kind: classifyIssue(issue),
    field: String(issue.path[0]),
    message: issue.message,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validatePromotionInput(data: unknown): PromotionValidationResult {
  if (!isPlainObject(data)) {
    return {
      success: false,
      error: {
        kind: "InvalidAttribute",
        message: "Invalid attribute: request body must be a JSON object",
      },
    };
  }

  const parsed = promotionPayloadSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: toPromotionValidationError(parsed.error) };
  }

  const payload = parsed.data;
  return {
    success: true,
    data: {
      name: payload.name,
      promotionType: payload.promotion_type,
      value: payload.value,
      productId: payload.product_id,
      startDate: payload.start_date,
      endDate: payload.end_date,
    },
  };
}

/**
 * The path identifier is authoritative on update: a body that names a
 * different id is rejected before anything is written.
 */
export function checkIdMatchesPath(
  data: unknown,
  pathId: number,
): PromotionValidationError | null {
  if (!isPlainObject(data) || !("id" in data)) return null;
  if (String(data.id) === String(pathId)) return null;
  return {
    kind: "IdMismatch",
    field: "id",
    message: "ID in body must match resource path",
  };
}
