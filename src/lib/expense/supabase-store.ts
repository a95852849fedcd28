import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ExpenseCandidate, ExpensePatch, ExpenseRecord } from "@/types/expense";
import { createLogger, type Logger } from "@/lib/logger";
import { decimalToCents, formatCents, parseDecimal } from "./amount";
import { applyCandidatePatch } from "./candidate";
import { matchCategory } from "./categories";
import { ExpenseStorageError, type ExpenseStorageOperation } from "./errors";
import type { ExpenseRangeQuery, ExpenseStore } from "./store";

const EXPENSE_COLUMNS =
  "id, amount, category, title, description, original_voice_text, confidence, tags, occurred_at, is_verified, created_at, updated_at";

const expenseRowSchema = z.object({
  id: z.string().min(1),
  amount: z.union([z.string(), z.number()]),
  category: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  original_voice_text: z.string().nullable(),
  confidence: z.coerce.number(),
  tags: z.array(z.string()).nullable(),
  occurred_at: z.string(),
  is_verified: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

type ExpenseRow = z.infer<typeof expenseRowSchema>;

interface SupabaseExpenseStoreOptions {
  client: SupabaseClient;
  table?: string;
  logger?: Logger;
}

export class SupabaseExpenseStore implements ExpenseStore {
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly logger: Logger;

  constructor(options: SupabaseExpenseStoreOptions) {
    this.client = options.client;
    this.table = options.table ?? "expenses";
    this.logger = options.logger ?? createLogger("storage");
  }

  async save(candidate: ExpenseCandidate): Promise<ExpenseRecord> {
    const { data, error } = await this.client
      .from(this.table)
      .insert(buildInsertPayload(candidate))
      .select(EXPENSE_COLUMNS)
      .single();

    if (error || !data) {
      throw this.storageError("save", "保存费用记录失败，请稍后重试。", error);
    }
    return this.parseRow("save", data);
  }

  async update(id: string, patch: ExpensePatch): Promise<ExpenseRecord> {
    const current = await this.fetchById(id);
    const next = applyCandidatePatch(current, patch);

    const { data, error } = await this.client
      .from(this.table)
      .update({
        ...buildInsertPayload(next),
        updated_at: new Date().toISOString(),
      })
      .eq("id", id)
      .select(EXPENSE_COLUMNS)
      .single();

    if (error || !data) {
      throw this.storageError("update", "更新费用记录失败，请稍后重试。", error);
    }
    return this.parseRow("update", data);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client.from(this.table).delete().eq("id", id);
    if (error) {
      throw this.storageError("delete", "删除费用记录失败，请稍后重试。", error);
    }
  }

  async fetchAll(): Promise<ExpenseRecord[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(EXPENSE_COLUMNS)
      .order("occurred_at", { ascending: false });

    if (error) {
      throw this.storageError("fetch", "获取费用记录失败。", error);
    }
    return this.parseRows("fetch", data);
  }

  async fetchRange({ from, to, category }: ExpenseRangeQuery): Promise<ExpenseRecord[]> {
    let query = this.client
      .from(this.table)
      .select(EXPENSE_COLUMNS)
      .gte("occurred_at", from.toISOString())
      .lte("occurred_at", to.toISOString());
    if (category) {
      query = query.eq("category", category);
    }

    const { data, error } = await query.order("occurred_at", { ascending: false });
    if (error) {
      throw this.storageError("fetch", "获取费用记录失败。", error);
    }
    return this.parseRows("fetch", data);
  }

  async search(keyword: string): Promise<ExpenseRecord[]> {
    const pattern = sanitizeSearchKeyword(keyword);
    if (!pattern) {
      return this.fetchAll();
    }

    const { data, error } = await this.client
      .from(this.table)
      .select(EXPENSE_COLUMNS)
      .or(
        `title.ilike.%${pattern}%,description.ilike.%${pattern}%,original_voice_text.ilike.%${pattern}%`
      )
      .order("occurred_at", { ascending: false });

    if (error) {
      throw this.storageError("search", "搜索费用记录失败。", error);
    }
    return this.parseRows("search", data);
  }

  private async fetchById(id: string) {
    const { data, error } = await this.client
      .from(this.table)
      .select(EXPENSE_COLUMNS)
      .eq("id", id)
      .maybeSingle();

    if (error) {
      throw this.storageError("fetch", "获取费用记录失败。", error);
    }
    if (!data) {
      throw new ExpenseStorageError("update", "费用记录不存在或已被删除。");
    }
    return this.parseRow("fetch", data);
  }

  private parseRows(operation: ExpenseStorageOperation, rows: unknown) {
    if (!Array.isArray(rows)) {
      return [];
    }
    return rows.map((row) => this.parseRow(operation, row));
  }

  private parseRow(operation: ExpenseStorageOperation, row: unknown): ExpenseRecord {
    const parsed = expenseRowSchema.safeParse(row);
    if (!parsed.success) {
      this.logger.warn("费用记录格式异常", { errors: parsed.error.flatten() });
      throw new ExpenseStorageError(operation, "费用记录格式异常。", {
        details: parsed.error.message,
      });
    }
    return normalizeExpenseRow(parsed.data, operation);
  }

  private storageError(operation: ExpenseStorageOperation, message: string, cause: unknown) {
    this.logger.error(message, cause);
    return new ExpenseStorageError(operation, message, {
      cause,
      details: describeCause(cause),
    });
  }
}

export function createSupabaseExpenseStore(options: {
  supabaseUrl?: string;
  serviceRoleKey?: string;
  table?: string;
  logger?: Logger;
}) {
  if (!options.supabaseUrl || !options.serviceRoleKey) {
    throw new ExpenseStorageError(
      "save",
      "未配置 Supabase 存储，请设置 SUPABASE_URL 与 SUPABASE_SERVICE_ROLE_KEY。"
    );
  }

  const client = createClient(options.supabaseUrl, options.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return new SupabaseExpenseStore({ client, table: options.table, logger: options.logger });
}

function buildInsertPayload(candidate: ExpenseCandidate) {
  return {
    amount: formatCents(candidate.amountCents),
    category: candidate.category,
    title: candidate.title,
    description: candidate.description.trim() || null,
    original_voice_text: candidate.originalVoiceText,
    confidence: Number(candidate.confidence.toFixed(4)),
    tags: candidate.tags,
    occurred_at: candidate.date.toISOString(),
    is_verified: true,
  };
}

function normalizeExpenseRow(row: ExpenseRow, operation: ExpenseStorageOperation): ExpenseRecord {
  const amount = parseDecimal(row.amount);
  const amountCents = amount === null ? null : decimalToCents(amount);
  if (amountCents === null) {
    throw new ExpenseStorageError(operation, "费用记录金额格式异常。", {
      details: String(row.amount),
    });
  }

  return {
    id: row.id,
    amountCents,
    category: matchCategory(row.category),
    title: row.title,
    description: row.description ?? "",
    originalVoiceText: row.original_voice_text ?? "",
    confidence: row.confidence,
    tags: row.tags ?? [],
    date: new Date(row.occurred_at),
    isVerified: row.is_verified,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function sanitizeSearchKeyword(keyword: string) {
  return keyword.trim().replace(/[%,()*\\]/g, "");
}

function describeCause(cause: unknown) {
  if (cause && typeof cause === "object" && "message" in cause) {
    return String(cause.message);
  }
  return undefined;
}
