// backend/services/product/src/validators/product.validator.ts
/**
 * Product input validation.
 *
 * Every field schema takes `unknown` and reports its own message, so the
 * caller gets one list of messages per failing field and the success value is
 * already normalized (trimmed text, canonical 2dp price text, integer quantity).
 * Keys outside the five writable fields (id, _id, timestamps, anything else)
 * are stripped by z.object.
 */

import { z } from "zod";
import type { FieldErrors } from "../errors";

export const NAME_MAX_LENGTH = 200;
export const CATEGORY_MAX_LENGTH = 100;
export const PRICE_MAX_DIGITS = 10;
export const PRICE_DECIMAL_PLACES = 2;
export const QUANTITY_MIN = 0;

export const NON_FIELD_ERRORS = "non_field_errors";

export const MESSAGES = {
  required: "This field is required.",
  null: "This field may not be null.",
  blank: "This field may not be blank.",
  notString: "Not a valid string.",
  maxLength: (n: number) => `Ensure this field has no more than ${n} characters.`,
  nullCharacter: "Null characters are not allowed.",
  surrogate: (codePoint: number) =>
    `Surrogate characters are not allowed: U+${codePoint
      .toString(16)
      .toUpperCase()
      .padStart(4, "0")}.`,
  invalidNumber: "A valid number is required.",
  maxDigits: (n: number) =>
    `Ensure that there are no more than ${n} digits in total.`,
  maxDecimalPlaces: (n: number) =>
    `Ensure that there are no more than ${n} decimal places.`,
  maxWholeDigits: (n: number) =>
    `Ensure that there are no more than ${n} digits before the decimal point.`,
  negativePrice: "Price must be a positive value.",
  invalidInteger: "A valid integer is required.",
  minValue: (n: number) => `Ensure this value is greater than or equal to ${n}.`,
  notAnObject: (got: string) =>
    `Invalid data. Expected a dictionary, but got ${got}.`,
} as const;

// ──────────────────────────────────────────────────────────────────────────────
// Text

type TextOptions = { required: boolean; allowBlank: boolean; maxLength?: number };

/** BSON stores text as UTF-8, which cannot carry an unpaired surrogate. */
function firstLoneSurrogate(chars: string[]): number | null {
  for (const ch of chars) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined && cp >= 0xd800 && cp <= 0xdfff) return cp;
  }
  return null;
}

function zText(opts: TextOptions) {
  return z.unknown().transform((raw, ctx): string => {
    const fail = (message: string) => {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    };

    if (raw === undefined) return opts.required ? fail(MESSAGES.required) : "";
    if (raw === null) return fail(MESSAGES.null);
    if (typeof raw !== "string" && typeof raw !== "number") {
      return fail(MESSAGES.notString);
    }

    const text = String(raw).trim();
    if (text === "" && !opts.allowBlank) return fail(MESSAGES.blank);

    // length in code points, not UTF-16 units
    const chars = [...text];
    const problems: string[] = [];
    if (opts.maxLength !== undefined && chars.length > opts.maxLength) {
      problems.push(MESSAGES.maxLength(opts.maxLength));
    }
    if (text.includes("\u0000")) problems.push(MESSAGES.nullCharacter);
    const surrogate = firstLoneSurrogate(chars);
    if (surrogate !== null) problems.push(MESSAGES.surrogate(surrogate));

    if (problems.length > 0) {
      for (const message of problems) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
      return z.NEVER;
    }
    return text;
  });
}

// ──────────────────────────────────────────────────────────────────────────────
// Price

const DECIMAL_RE = /^([+-]?)(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?$/;

/** sign + significant digits (no leading zeros, "0" for zero) + power of ten */
export type DecimalParts = {
  negative: boolean;
  digits: string;
  exponent: number;
};

export function parseDecimal(text: string): DecimalParts | null {
  const m = DECIMAL_RE.exec(text);
  if (!m) return null;
  const [, sign, intPart = "", fracA, fracB, exp] = m;
  const frac = fracA ?? fracB ?? "";
  const expValue = exp === undefined ? 0 : Number(exp);
  if (!Number.isSafeInteger(expValue)) return null;

  const digits = (intPart + frac).replace(/^0+/, "") || "0";
  return {
    negative: sign === "-",
    digits,
    exponent: expValue - frac.length,
  };
}

/** Digit budget of a decimal value: total, before the point, after the point. */
export function measureDecimal(d: DecimalParts): {
  total: number;
  whole: number;
  places: number;
} {
  const n = d.digits.length;
  if (d.exponent >= 0) {
    const total = n + d.exponent;
    return { total, whole: total, places: 0 };
  }
  const places = -d.exponent;
  if (n > places) return { total: n, whole: n - places, places };
  return { total: places, whole: 0, places };
}

/** Fixed-point text with exactly `places` fraction digits; assumes no rounding is needed. */
export function toFixedText(d: DecimalParts, places: number): string {
  let intDigits: string;
  let fracDigits: string;

  if (d.exponent >= 0) {
    intDigits = d.digits + "0".repeat(d.exponent);
    fracDigits = "";
  } else {
    const shift = -d.exponent;
    const padded = d.digits.padStart(shift + 1, "0");
    intDigits = padded.slice(0, padded.length - shift);
    fracDigits = padded.slice(padded.length - shift);
  }

  intDigits = intDigits.replace(/^0+(?=\d)/, "");
  fracDigits = fracDigits.padEnd(places, "0");
  const isZero = /^0*$/.test(intDigits + fracDigits);
  const sign = d.negative && !isZero ? "-" : "";
  return places > 0 ? `${sign}${intDigits}.${fracDigits}` : `${sign}${intDigits}`;
}

const zPrice = z.unknown().transform((raw, ctx): string => {
  const fail = (message: string) => {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    return z.NEVER;
  };

  if (raw === undefined) return fail(MESSAGES.required);
  if (raw === null) return fail(MESSAGES.null);
  if (typeof raw === "number" && !Number.isFinite(raw)) {
    return fail(MESSAGES.invalidNumber);
  }
  if (typeof raw !== "string" && typeof raw !== "number") {
    return fail(MESSAGES.invalidNumber);
  }

  const parsed = parseDecimal(String(raw).trim());
  if (!parsed) return fail(MESSAGES.invalidNumber);

  const size = measureDecimal(parsed);
  const wholeMax = PRICE_MAX_DIGITS - PRICE_DECIMAL_PLACES;
  if (size.total > PRICE_MAX_DIGITS) {
    return fail(MESSAGES.maxDigits(PRICE_MAX_DIGITS));
  }
  if (size.places > PRICE_DECIMAL_PLACES) {
    return fail(MESSAGES.maxDecimalPlaces(PRICE_DECIMAL_PLACES));
  }
  if (size.whole > wholeMax) return fail(MESSAGES.maxWholeDigits(wholeMax));

  const text = toFixedText(parsed, PRICE_DECIMAL_PLACES);
  if (text.startsWith("-")) return fail(MESSAGES.negativePrice);
  return text;
});

// ──────────────────────────────────────────────────────────────────────────────
// Quantity

const INTEGER_TEXT_RE = /^[+-]?\d+$/;

const zQuantity = z.unknown().transform((raw, ctx): number => {
  const fail = (message: string) => {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    return z.NEVER;
  };

  if (raw === undefined) return fail(MESSAGES.required);
  if (raw === null) return fail(MESSAGES.null);

  let value: number;
  if (typeof raw === "number") {
    // 5.0 is accepted, 5.5 is not
    if (!Number.isSafeInteger(raw)) return fail(MESSAGES.invalidInteger);
    value = raw;
  } else if (typeof raw === "string") {
    const text = raw.trim().replace(/\.0*$/, "");
    if (!INTEGER_TEXT_RE.test(text)) return fail(MESSAGES.invalidInteger);
    value = Number(text);
    if (!Number.isSafeInteger(value)) return fail(MESSAGES.invalidInteger);
  } else {
    return fail(MESSAGES.invalidInteger);
  }

  // -0 arrives as a valid integer and stores as 0
  if (value < QUANTITY_MIN) return fail(MESSAGES.minValue(QUANTITY_MIN));
  return value === 0 ? 0 : value;
});

// ──────────────────────────────────────────────────────────────────────────────
// Schema

export const zProductInput = z.object({
  name: zText({ required: true, allowBlank: false, maxLength: NAME_MAX_LENGTH }),
  description: zText({ required: false, allowBlank: true }),
  price: zPrice,
  quantity: zQuantity,
  category: zText({
    required: false,
    allowBlank: true,
    maxLength: CATEGORY_MAX_LENGTH,
  }),
});

/** The five writable fields, normalized. */
export type ProductFields = z.output<typeof zProductInput>;

const FIELD_ORDER = Object.keys(zProductInput.shape);

function describeType(raw: unknown): string {
  if (raw === null) return "NoneType";
  if (Array.isArray(raw)) return "list";
  switch (typeof raw) {
    case "string":
      return "str";
    case "boolean":
      return "bool";
    case "number":
      return Number.isInteger(raw) ? "int" : "float";
    default:
      return typeof raw;
  }
}

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function groupIssues(issues: z.ZodIssue[]): FieldErrors {
  const byField = new Map<string, string[]>();
  for (const issue of issues) {
    const key = issue.path.length ? String(issue.path[0]) : NON_FIELD_ERRORS;
    const list = byField.get(key) ?? [];
    list.push(issue.message);
    byField.set(key, list);
  }

  const out: FieldErrors = {};
  for (const key of FIELD_ORDER) {
    const messages = byField.get(key);
    if (messages) out[key] = messages;
  }
  for (const [key, messages] of byField) {
    if (!(key in out)) out[key] = messages;
  }
  return out;
}

export type ValidationResult =
  | { ok: true; value: ProductFields }
  | { ok: false; errors: FieldErrors };

/** Validate and normalize a request body. Never throws. */
export function validateProduct(raw: unknown): ValidationResult {
  if (!isPlainObject(raw)) {
    return {
      ok: false,
      errors: { [NON_FIELD_ERRORS]: [MESSAGES.notAnObject(describeType(raw))] },
    };
  }

  const result = zProductInput.safeParse(raw);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, errors: groupIssues(result.error.issues) };
}
