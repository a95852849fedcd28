import { z } from "zod";
import { resolveBooleanEnv } from "@/lib/logger";

const DEFAULT_LLM_ENDPOINT = "https://api.deepseek.com/v1/chat/completions";
const DEFAULT_IFLYTEK_ENDPOINT = "wss://iat-api.xfyun.cn/v2/iat";

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const numberWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `不是合法的数字：${value}` });
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z.object({
  LLM_API_KEY: optionalText,
  DEEPSEEK_API_KEY: optionalText,
  LLM_API_BASE_URL: optionalText,
  LLM_MODEL: optionalText,
  LLM_TEMPERATURE: numberWithDefault(0.1),
  LLM_MAX_TOKENS: numberWithDefault(1000),
  LLM_TIMEOUT_MS: numberWithDefault(30000),
  LLM_MAX_ATTEMPTS: numberWithDefault(3),
  VOICE_RECOGNIZER_PROVIDER: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || "mock")
    .pipe(z.enum(["mock", "iflytek", "xfyun"])),
  VOICE_RECOGNIZER_MOCK_TRANSCRIPT: optionalText,
  VOICE_STOP_GRACE_MS: numberWithDefault(250),
  IFLYTEK_APP_ID: optionalText,
  IFLYTEK_API_KEY: optionalText,
  IFLYTEK_API_SECRET: optionalText,
  IFLYTEK_API_BASE_URL: optionalText,
  IFLYTEK_LANGUAGE: optionalText,
  IFLYTEK_ACCENT: optionalText,
  IFLYTEK_VAD_EOS: numberWithDefault(3000),
  FFMPEG_PATH: optionalText,
  FFMPEG_INPUT_FORMAT: optionalText,
  FFMPEG_INPUT_DEVICE: optionalText,
  SUPABASE_URL: optionalText,
  SUPABASE_SERVICE_ROLE_KEY: optionalText,
  SUPABASE_EXPENSES_TABLE: optionalText,
  EXPENSE_DEFAULT_CURRENCY: optionalText,
  EXPENSE_DEBUG: optionalText,
});

export type RecognizerProvider = "mock" | "iflytek";

export interface IflytekConfig {
  appId: string;
  apiKey: string;
  apiSecret: string;
  endpoint: string;
  language: string;
  accent: string;
  vadEos: number;
}

export interface AppConfig {
  llm: {
    apiKey: string;
    endpoint: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxAttempts: number;
  };
  voice: {
    provider: RecognizerProvider;
    mockTranscript: string;
    stopGraceMs: number;
    iflytek: IflytekConfig | null;
    ffmpeg: {
      executable: string;
      inputFormat?: string;
      inputDevice?: string;
    };
  };
  storage: {
    supabaseUrl?: string;
    serviceRoleKey?: string;
    table: string;
  };
  defaultCurrency: string;
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`环境变量配置不合法：${issues}`);
  }

  const values = parsed.data;
  const provider: RecognizerProvider =
    values.VOICE_RECOGNIZER_PROVIDER === "mock" ? "mock" : "iflytek";

  const iflytek =
    values.IFLYTEK_APP_ID && values.IFLYTEK_API_KEY && values.IFLYTEK_API_SECRET
      ? {
          appId: values.IFLYTEK_APP_ID,
          apiKey: values.IFLYTEK_API_KEY,
          apiSecret: values.IFLYTEK_API_SECRET,
          endpoint: values.IFLYTEK_API_BASE_URL ?? DEFAULT_IFLYTEK_ENDPOINT,
          language: values.IFLYTEK_LANGUAGE ?? "zh_cn",
          accent: values.IFLYTEK_ACCENT ?? "mandarin",
          vadEos: values.IFLYTEK_VAD_EOS,
        }
      : null;

  return deepFreeze<AppConfig>({
    llm: {
      apiKey: values.LLM_API_KEY ?? values.DEEPSEEK_API_KEY ?? "",
      endpoint: values.LLM_API_BASE_URL ?? DEFAULT_LLM_ENDPOINT,
      model: values.LLM_MODEL ?? "deepseek-chat",
      temperature: values.LLM_TEMPERATURE,
      maxTokens: Math.max(1, Math.round(values.LLM_MAX_TOKENS)),
      timeoutMs: resolveTimeout(values.LLM_TIMEOUT_MS, 30000),
      maxAttempts: Math.max(1, Math.round(values.LLM_MAX_ATTEMPTS)),
    },
    voice: {
      provider,
      mockTranscript: values.VOICE_RECOGNIZER_MOCK_TRANSCRIPT ?? "",
      stopGraceMs: clamp(values.VOICE_STOP_GRACE_MS, 0, 300),
      iflytek,
      ffmpeg: {
        executable: values.FFMPEG_PATH ?? "ffmpeg",
        inputFormat: values.FFMPEG_INPUT_FORMAT,
        inputDevice: values.FFMPEG_INPUT_DEVICE,
      },
    },
    storage: {
      supabaseUrl: values.SUPABASE_URL,
      serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY,
      table: values.SUPABASE_EXPENSES_TABLE ?? "expenses",
    },
    defaultCurrency: values.EXPENSE_DEFAULT_CURRENCY ?? "CNY",
    debug: resolveBooleanEnv(values.EXPENSE_DEBUG),
  });
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nested: unknown[] = Object.values(value);
  for (const entry of nested) {
    if (typeof entry === "object" && entry !== null && !Object.isFrozen(entry)) {
      deepFreeze(entry);
    }
  }
  return Object.freeze(value);
}

export function resolveTimeout(candidate: number, fallback: number) {
  if (!Number.isFinite(candidate) || candidate <= 0) {
    return fallback;
  }
  return Math.max(5000, Math.min(candidate, 120000));
}

function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}
