import { z } from "zod";
import { EXPENSE_CATEGORIES } from "@/types/expense";
import type {
  AlternativeInterpretation,
  AnalysisResult,
  DecimalString,
  ExpenseCandidate,
  ExpensePatch,
} from "@/types/expense";
import { MAX_AMOUNT_CENTS, MIN_AMOUNT_CENTS, decimalToCents, isPositiveDecimal } from "./amount";
import { ExpenseValidationError, type ExpenseValidationField } from "./errors";

const INVALID_TITLE_CHARACTERS = /[<>|\\/:*?"\u0000-\u001f\u007f]/;

const candidateSchema = z.object({
  amountCents: z
    .number()
    .int("金额最多支持两位小数")
    .min(MIN_AMOUNT_CENTS, "金额必须大于等于 ¥0.01")
    .max(MAX_AMOUNT_CENTS, "金额不能超过 ¥999,999.99"),
  category: z.enum(EXPENSE_CATEGORIES),
  title: z
    .string()
    .trim()
    .min(1, "标题不能为空")
    .max(100, "标题长度不能超过100个字符")
    .refine((value) => !INVALID_TITLE_CHARACTERS.test(value), "标题包含无效字符"),
  description: z.string().trim().max(500, "描述不能超过500个字符"),
  originalVoiceText: z.string(),
  confidence: z.number().min(0, "置信度必须在 0.0 到 1.0 之间").max(1, "置信度必须在 0.0 到 1.0 之间"),
  tags: z.array(z.string().trim()).transform((tags) => dedupeTags(tags)),
  date: z.date(),
});

export type CandidateInput = Omit<ExpenseCandidate, "amountCents"> & {
  amount: DecimalString | null;
};

export function buildExpenseCandidate(input: CandidateInput, now: Date = new Date()) {
  return validateExpenseCandidate(
    {
      ...input,
      amountCents: amountToCents(input.amount),
    },
    now
  );
}

/** Revalidates a candidate (or a candidate with a patch applied) against every field rule. */
export function validateExpenseCandidate(
  candidate: ExpenseCandidate,
  now: Date = new Date()
): ExpenseCandidate {
  const parsed = candidateSchema.safeParse(candidate);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ExpenseValidationError(
      resolveField(issue?.path[0]),
      issue?.message ?? "费用数据不合法"
    );
  }
  assertDateInRange(parsed.data.date, now);
  return parsed.data;
}

export function applyCandidatePatch(
  candidate: ExpenseCandidate,
  patch: ExpensePatch,
  now: Date = new Date()
) {
  return validateExpenseCandidate({ ...candidate, ...patch }, now);
}

export function candidateFromAnalysis(result: AnalysisResult, date: Date = result.timestamp) {
  return buildExpenseCandidate({
    amount: result.extractedAmount,
    category: result.category,
    title: result.title,
    description: result.description,
    originalVoiceText: result.originalText,
    confidence: result.confidence,
    tags: result.tags,
    date,
  });
}

export function candidateFromAlternative(
  alternative: AlternativeInterpretation,
  result: AnalysisResult,
  date: Date = result.timestamp
) {
  return buildExpenseCandidate({
    amount: alternative.amount,
    category: alternative.category,
    title: alternative.title,
    description: alternative.description,
    originalVoiceText: result.originalText,
    confidence: alternative.confidence,
    tags: result.tags,
    date,
  });
}

function amountToCents(amount: DecimalString | null) {
  if (!amount || !isPositiveDecimal(amount)) {
    throw new ExpenseValidationError("amount", "金额必须大于等于 ¥0.01");
  }
  const cents = decimalToCents(amount);
  if (cents === null) {
    const tooLarge = /^\d{14,}/.test(amount);
    throw new ExpenseValidationError(
      "amount",
      tooLarge ? "金额不能超过 ¥999,999.99" : "金额最多支持两位小数"
    );
  }
  return cents;
}

function assertDateInRange(date: Date, now: Date) {
  if (Number.isNaN(date.getTime())) {
    throw new ExpenseValidationError("date", "日期不合法");
  }
  const earliest = shiftYears(now, -1);
  const latest = shiftYears(now, 1);
  if (date < earliest) {
    throw new ExpenseValidationError("date", "日期不能早于一年前");
  }
  if (date > latest) {
    throw new ExpenseValidationError("date", "日期不能晚于一年后");
  }
}

function shiftYears(date: Date, years: number) {
  const shifted = new Date(date.getTime());
  shifted.setFullYear(shifted.getFullYear() + years);
  return shifted;
}

function dedupeTags(tags: string[]) {
  return Array.from(new Set(tags.filter((tag) => tag.length > 0)));
}

const FIELDS: readonly ExpenseValidationField[] = [
  "amount",
  "title",
  "description",
  "confidence",
  "date",
  "category",
  "tags",
];

function resolveField(key: string | number | undefined): ExpenseValidationField {
  if (key === "amountCents") {
    return "amount";
  }
  return FIELDS.find((field) => field === key) ?? "description";
}
