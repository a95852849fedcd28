export const EXPENSE_CATEGORIES = [
  "food",
  "transport",
  "shopping",
  "entertainment",
  "healthcare",
  "housing",
  "education",
  "utilities",
  "clothing",
  "gift",
  "travel",
  "other",
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

/** Exact decimal amount such as "25" or "12.50"; never a binary float. */
export type DecimalString = string;

export interface UserPreferences {
  defaultCurrency: string;
  preferredCategories: ExpenseCategory[];
  commonMerchants: string[];
}

export interface AnalysisRequest {
  voiceText: string;
  context?: string;
  userPreferences?: UserPreferences;
  requestId: string;
  timestamp: Date;
}

export interface AlternativeInterpretation {
  amount: DecimalString | null;
  category: ExpenseCategory;
  title: string;
  description: string;
  confidence: number;
}

export interface AnalysisResult {
  requestId: string;
  originalText: string;
  extractedAmount: DecimalString | null;
  category: ExpenseCategory;
  title: string;
  description: string;
  confidence: number;
  tags: string[];
  alternativeInterpretations: AlternativeInterpretation[];
  processingTimeMs: number;
  timestamp: Date;
}

export type ConfidenceLevel = "high" | "medium" | "low";

export interface ExpenseCandidate {
  amountCents: number;
  category: ExpenseCategory;
  title: string;
  description: string;
  originalVoiceText: string;
  confidence: number;
  tags: string[];
  date: Date;
}

export interface ExpenseRecord extends ExpenseCandidate {
  id: string;
  isVerified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type ExpensePatch = Partial<
  Pick<ExpenseCandidate, "amountCents" | "category" | "title" | "description" | "tags" | "date">
>;

export interface ExpenseCategorySummary {
  category: ExpenseCategory;
  label: string;
  totalCents: number;
  count: number;
  percentage: number;
}

export interface ExpenseSummary {
  totalCents: number;
  count: number;
  categories: ExpenseCategorySummary[];
  daily: Array<{ date: string; totalCents: number }>;
}
