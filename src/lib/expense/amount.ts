import type { DecimalString } from "@/types/expense";

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;
const GROUPED_PATTERN = /^-?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;

export const MIN_AMOUNT_CENTS = 1;
export const MAX_AMOUNT_CENTS = 99_999_999;

interface DecimalParts {
  negative: boolean;
  integer: string;
  fraction: string;
}

/**
 * Normalizes a model-provided amount (JSON number or numeric string) into a canonical decimal
 * string. Leading zeros and trailing fractional zeros are dropped, so "025.50" becomes "25.5".
 * Returns null for anything that is not a plain decimal literal.
 */
export function parseDecimal(value: unknown): DecimalString | null {
  let text: string;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return null;
    }
    text = String(value);
  } else if (typeof value === "string") {
    text = value.trim().replace(/^[¥￥]\s*/, "");
    if (GROUPED_PATTERN.test(text)) {
      text = text.replace(/,/g, "");
    }
  } else {
    return null;
  }

  const parts = splitDecimal(text);
  if (!parts) {
    return null;
  }
  return joinDecimal(parts);
}

export function isPositiveDecimal(value: DecimalString | null | undefined) {
  if (!value) {
    return false;
  }
  const parts = splitDecimal(value);
  return Boolean(parts && !parts.negative && /[1-9]/.test(parts.integer + parts.fraction));
}

/** Exact conversion; null when the value has more than two fractional digits or is too large. */
export function decimalToCents(value: DecimalString): number | null {
  const parts = splitDecimal(value);
  if (!parts || parts.fraction.length > 2 || parts.integer.length > 13) {
    return null;
  }
  const cents = Number(parts.integer) * 100 + Number(parts.fraction.padEnd(2, "0"));
  return parts.negative ? -cents : cents;
}

export function formatCents(cents: number): DecimalString {
  const sign = cents < 0 ? "-" : "";
  const absolute = Math.abs(Math.trunc(cents));
  const integer = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, "0");
  return `${sign}${integer}.${fraction}`;
}

function splitDecimal(text: string): DecimalParts | null {
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const [, sign, integerRaw, fractionRaw = ""] = match;
  const integer = integerRaw.replace(/^0+(?=\d)/, "");
  const fraction = fractionRaw.replace(/0+$/, "");
  const isZero = integer === "0" && fraction === "";
  return { negative: sign === "-" && !isZero, integer, fraction };
}

function joinDecimal(parts: DecimalParts): DecimalString {
  const body = parts.fraction ? `${parts.integer}.${parts.fraction}` : parts.integer;
  return parts.negative ? `-${body}` : body;
}
