import type { DecimalString, ExpenseCategory } from "@/types/expense";
import { parseDecimal } from "@/lib/expense/amount";
import { matchCategory } from "@/lib/expense/categories";

type AnyRecord = Record<string, unknown>;

export const DEFAULT_CONFIDENCE = 0.8;
export const DEFAULT_TITLE = "未知费用";

export interface ParsedExpenseItem {
  amount: DecimalString | null;
  category: ExpenseCategory;
  title: string;
  description: string;
  confidence: number;
  tags: string[];
}

export interface ParsedExpenseContent {
  primary: ParsedExpenseItem;
  alternatives: ParsedExpenseItem[];
}

/**
 * Reads the completion text. Accepts the `expenses` list shape (first item is primary) and the
 * flat legacy shape with an optional `alternatives` list. Returns null when the text is not a
 * JSON object or no primary amount can be read.
 */
export function parseExpenseContent(content: string): ParsedExpenseContent | null {
  const payload = parseJsonObject(stripCodeFence(content));
  if (!payload) {
    return null;
  }

  const listed = Array.isArray(payload.expenses) ? payload.expenses.filter(isRecord) : [];
  const [primarySource, ...rest] =
    listed.length > 0 ? listed : [payload, ...readLegacyAlternatives(payload)];

  if (!primarySource) {
    return null;
  }

  const primary = normalizeExpenseItem(primarySource);
  if (primary.amount === null) {
    return null;
  }

  return {
    primary,
    alternatives: rest.map(normalizeExpenseItem).filter((item) => item.amount !== null),
  };
}

export function normalizeExpenseItem(value: AnyRecord): ParsedExpenseItem {
  const confidence = coerceNumber(value.confidence);
  return {
    amount: parseDecimal(value.amount),
    category: matchCategory(value.category),
    title: normalizeString(value.title) ?? DEFAULT_TITLE,
    description: normalizeString(value.description) ?? "",
    confidence: confidence === null ? DEFAULT_CONFIDENCE : clamp(confidence, 0, 1),
    tags: normalizeStringList(value.tags),
  };
}

export function stripCodeFence(content: string) {
  const trimmed = content.trim();
  const fenced = /^```(?:json|JSON)?\s*([\s\S]*?)\s*```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

function readLegacyAlternatives(payload: AnyRecord) {
  return Array.isArray(payload.alternatives) ? payload.alternatives.filter(isRecord) : [];
}

function parseJsonObject(text: string): AnyRecord | null {
  if (!text) {
    return null;
  }
  const direct = tryParseObject(text);
  if (direct) {
    return direct;
  }
  // 模型偶尔会在 JSON 前后附带说明文字
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start >= 0 && end > start ? tryParseObject(text.slice(start, end + 1)) : null;
}

function tryParseObject(text: string): AnyRecord | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) && !Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function normalizeStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .map((item) => normalizeString(item))
      .filter((item): item is string => !!item);
  }

  if (typeof value === "string") {
    return value
      .split(/[\n,;；、，]+/)
      .map((item) => item.trim())
      .filter(Boolean);
  }

  return [];
}

function normalizeString(value: unknown) {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value.toString();
  }
  return undefined;
}

function coerceNumber(value: unknown) {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value.trim());
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}

function isRecord(value: unknown): value is AnyRecord {
  return typeof value === "object" && value !== null;
}
