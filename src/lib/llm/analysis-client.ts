import { randomUUID } from "node:crypto";
import type { AnalysisRequest, AnalysisResult, UserPreferences } from "@/types/expense";
import { createLogger, type Logger } from "@/lib/logger";
import { ExpenseAnalysisError } from "./errors";
import { parseExpenseContent } from "./normalize";
import { buildExpenseAnalysisMessages } from "./prompts";
import { buildAnalysisResult, buildFallbackResult } from "./result";
import { validateChatCompletionEnvelope } from "./schema";
import type { AnalyzeOptions, ChatCompletionRequestBody, ExpenseAnalyzer } from "./types";

const DEFAULT_ENDPOINT = "https://api.deepseek.com/v1/chat/completions";
const DEFAULT_MODEL = "deepseek-chat";
const MAX_BACKOFF_SECONDS = 8;

export interface ExpenseAnalysisClientOptions {
  apiKey?: string;
  endpoint?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxAttempts?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: (durationMs: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export class ExpenseAnalysisClient implements ExpenseAnalyzer {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (durationMs: number) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options?: ExpenseAnalysisClientOptions) {
    this.apiKey = options?.apiKey?.trim() ?? "";
    this.endpoint = options?.endpoint?.trim() || DEFAULT_ENDPOINT;
    this.model = options?.model ?? DEFAULT_MODEL;
    this.temperature = options?.temperature ?? 0.1;
    this.maxTokens = options?.maxTokens ?? 1000;
    this.maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
    this.timeoutMs = options?.timeoutMs ?? 30000;
    this.fetchImpl = options?.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options?.sleep ?? delay;
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger ?? createLogger("LLM");
  }

  async analyze(request: AnalysisRequest, options?: AnalyzeOptions): Promise<AnalysisResult> {
    const startedAt = this.now();
    this.assertConfigured();
    const body = this.encodeRequestBody(request);

    options?.onProgress?.("connecting");
    let attempt = 0;
    let lastError: ExpenseAnalysisError | null = null;

    while (attempt < this.maxAttempts) {
      attempt += 1;
      try {
        const content = await this.invoke(body, attempt);
        this.logger.debug("raw_completion_content", {
          attempt,
          requestId: request.requestId,
          content,
        });

        options?.onProgress?.("interpreting");
        const parsed = parseExpenseContent(content);
        options?.onProgress?.("extracting");

        const finishedAt = this.now();
        if (!parsed) {
          this.logger.warn("模型返回内容无法解析，使用兜底结果。", {
            attempt,
            requestId: request.requestId,
            content,
          });
          return buildFallbackResult(request, finishedAt - startedAt, new Date(finishedAt));
        }
        return buildAnalysisResult(request, parsed, finishedAt - startedAt, new Date(finishedAt));
      } catch (error) {
        lastError =
          error instanceof ExpenseAnalysisError
            ? error
            : new ExpenseAnalysisError("network", "调用费用分析服务时发生未知错误。", {
                attempt,
                cause: error,
              });

        if (!lastError.retryable) {
          this.logger.error("费用分析服务拒绝访问，停止重试。", {
            attempt,
            status: lastError.status,
          });
          throw lastError;
        }

        if (attempt >= this.maxAttempts) {
          break;
        }

        const waitMs = backoffDelayMs(attempt);
        this.logger.warn(`第 ${attempt} 次调用失败，${waitMs}ms 后重试。`, {
          kind: lastError.kind,
          status: lastError.status,
          message: lastError.message,
        });
        await this.sleep(waitMs);
      }
    }

    throw (
      lastError ?? new ExpenseAnalysisError("network", "费用分析服务返回未知错误。", { attempt })
    );
  }

  private assertConfigured() {
    if (!this.apiKey) {
      throw new ExpenseAnalysisError("config", "缺少 API 密钥（LLM_API_KEY）。", {
        code: "missing_api_key",
      });
    }
    if (!isHttpUrl(this.endpoint)) {
      throw new ExpenseAnalysisError("config", `无效的 API 地址：${this.endpoint}`, {
        code: "invalid_url",
      });
    }
  }

  private encodeRequestBody(request: AnalysisRequest) {
    const payload: ChatCompletionRequestBody = {
      model: this.model,
      messages: buildExpenseAnalysisMessages(request),
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      stream: false,
    };
    try {
      return JSON.stringify(payload);
    } catch (error) {
      throw new ExpenseAnalysisError("config", "请求编码失败。", {
        code: "request_encoding_failed",
        cause: error,
      });
    }
  }

  private async invoke(body: string, attempt: number) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.apiKey}`,
          },
          body,
          signal: controller.signal,
        });
      } catch (error) {
        throw this.transportError(controller.signal, attempt, error);
      }

      if (response.status === 401 || response.status === 403) {
        throw new ExpenseAnalysisError("auth", "API 密钥无效或无权访问费用分析服务。", {
          attempt,
          status: response.status,
          details: await safeReadText(response),
        });
      }

      if (response.status !== 200) {
        throw new ExpenseAnalysisError("http", `API 错误 (代码: ${response.status})`, {
          attempt,
          status: response.status,
          details: await safeReadText(response),
        });
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        if (controller.signal.aborted) {
          throw this.transportError(controller.signal, attempt, error);
        }
        throw new ExpenseAnalysisError("invalid_response", "无效的服务器响应。", {
          attempt,
          cause: error,
        });
      }

      const validated = validateChatCompletionEnvelope(payload);
      if (!validated.success) {
        throw new ExpenseAnalysisError("invalid_response", "无效的服务器响应。", {
          attempt,
          details: validated.errors.join("; "),
        });
      }
      return validated.data.choices[0].message.content;
    } finally {
      clearTimeout(timeout);
    }
  }

  private transportError(signal: AbortSignal, attempt: number, cause: unknown) {
    if (signal.aborted) {
      return new ExpenseAnalysisError("timeout", "费用分析服务响应超时。", { attempt, cause });
    }
    return new ExpenseAnalysisError("network", "无法连接费用分析服务，请检查网络。", {
      attempt,
      cause,
    });
  }
}

export function createAnalysisRequest(
  voiceText: string,
  options?: { context?: string; userPreferences?: UserPreferences; timestamp?: Date }
): AnalysisRequest {
  return {
    voiceText,
    context: options?.context,
    userPreferences: options?.userPreferences,
    requestId: randomUUID(),
    timestamp: options?.timestamp ?? new Date(),
  };
}

export function backoffDelayMs(attempt: number) {
  return Math.min(2 ** (attempt - 1), MAX_BACKOFF_SECONDS) * 1000;
}

function isHttpUrl(candidate: string) {
  try {
    const url = new URL(candidate);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

async function safeReadText(response: Response) {
  try {
    return await response.text();
  } catch {
    return "未知错误";
  }
}

function delay(duration: number) {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, duration);
  });
}
