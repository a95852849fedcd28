import type {
  ExpenseCandidate,
  ExpenseCategory,
  ExpensePatch,
  ExpenseRecord,
  ExpenseSummary,
} from "@/types/expense";
import { categoryLabel } from "./categories";

export interface ExpenseRangeQuery {
  from: Date;
  to: Date;
  category?: ExpenseCategory;
}

export interface ExpenseStore {
  save(candidate: ExpenseCandidate): Promise<ExpenseRecord>;
  update(id: string, patch: ExpensePatch): Promise<ExpenseRecord>;
  delete(id: string): Promise<void>;
  fetchAll(): Promise<ExpenseRecord[]>;
  fetchRange(query: ExpenseRangeQuery): Promise<ExpenseRecord[]>;
  search(keyword: string): Promise<ExpenseRecord[]>;
}

export function summarizeExpenses(records: ExpenseRecord[]): ExpenseSummary {
  const totalCents = records.reduce((sum, record) => sum + record.amountCents, 0);

  const byCategory = new Map<ExpenseCategory, { totalCents: number; count: number }>();
  const byDay = new Map<string, number>();
  records.forEach((record) => {
    const current = byCategory.get(record.category) ?? { totalCents: 0, count: 0 };
    byCategory.set(record.category, {
      totalCents: current.totalCents + record.amountCents,
      count: current.count + 1,
    });
    const day = formatDay(record.date);
    byDay.set(day, (byDay.get(day) ?? 0) + record.amountCents);
  });

  const categories = Array.from(byCategory.entries())
    .map(([category, entry]) => ({
      category,
      label: categoryLabel(category),
      totalCents: entry.totalCents,
      count: entry.count,
      percentage: totalCents > 0 ? (entry.totalCents * 100) / totalCents : 0,
    }))
    .sort((a, b) => b.totalCents - a.totalCents);

  const daily = Array.from(byDay.entries())
    .map(([date, dayTotal]) => ({ date, totalCents: dayTotal }))
    .sort((a, b) => a.date.localeCompare(b.date));

  return {
    totalCents,
    count: records.length,
    categories,
    daily,
  };
}

function formatDay(date: Date) {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}
