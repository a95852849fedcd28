import { EXPENSE_CATEGORIES, type ExpenseCategory } from "@/types/expense";

export const CATEGORY_LABELS: Record<ExpenseCategory, string> = {
  food: "餐饮",
  transport: "交通",
  shopping: "购物",
  entertainment: "娱乐",
  healthcare: "医疗",
  housing: "住房",
  education: "教育",
  utilities: "水电费",
  clothing: "服装",
  gift: "礼品",
  travel: "旅行",
  other: "其他",
};

const labelLookup = new Map<string, ExpenseCategory>(
  EXPENSE_CATEGORIES.map((category) => [CATEGORY_LABELS[category], category])
);

export function isExpenseCategory(value: unknown): value is ExpenseCategory {
  return typeof value === "string" && EXPENSE_CATEGORIES.some((category) => category === value);
}

/** Case-sensitive match on the Chinese label or the key; anything else is "other". */
export function matchCategory(value: unknown): ExpenseCategory {
  if (typeof value !== "string") {
    return "other";
  }
  const trimmed = value.trim();
  const byLabel = labelLookup.get(trimmed);
  if (byLabel) {
    return byLabel;
  }
  return isExpenseCategory(trimmed) ? trimmed : "other";
}

export function categoryLabel(category: ExpenseCategory) {
  return CATEGORY_LABELS[category];
}

export function categoryVocabulary() {
  return EXPENSE_CATEGORIES.map((category) => CATEGORY_LABELS[category]).join("、");
}
