import { loadConfig, type AppConfig } from "@/lib/config";
import { createSupabaseExpenseStore } from "@/lib/expense/supabase-store";
import type { ExpenseStore } from "@/lib/expense/store";
import { ExpenseAnalysisClient } from "@/lib/llm/analysis-client";
import { createLogger } from "@/lib/logger";
import { DesktopAudioSession } from "@/lib/voice/audio-session";
import { AudioCaptureSession } from "@/lib/voice/capture-session";
import { FfmpegAudioEngine } from "@/lib/voice/ffmpeg-engine";
import { ConfiguredPermissions } from "@/lib/voice/permissions";
import { createSpeechRecognizer } from "@/lib/voice/recognizer-factory";
import { SerialExecutor } from "@/lib/voice/serial-executor";
import { RecordingWorkflow } from "@/lib/workflow/recording-workflow";
import type { UserPreferences } from "@/types/expense";

export { loadConfig, type AppConfig } from "@/lib/config";
export { createLogger, silentLogger, type Logger } from "@/lib/logger";
export * from "@/types/expense";
export * from "@/types/voice";
export { parseDecimal, decimalToCents, formatCents } from "@/lib/expense/amount";
export { CATEGORY_LABELS, categoryLabel, matchCategory } from "@/lib/expense/categories";
export {
  applyCandidatePatch,
  buildExpenseCandidate,
  validateExpenseCandidate,
} from "@/lib/expense/candidate";
export { ExpenseStorageError, ExpenseValidationError } from "@/lib/expense/errors";
export { summarizeExpenses, type ExpenseRangeQuery, type ExpenseStore } from "@/lib/expense/store";
export { SupabaseExpenseStore, createSupabaseExpenseStore } from "@/lib/expense/supabase-store";
export {
  ExpenseAnalysisClient,
  backoffDelayMs,
  createAnalysisRequest,
} from "@/lib/llm/analysis-client";
export { ExpenseAnalysisError } from "@/lib/llm/errors";
export { confidenceLevel, isAnalysisResultValid } from "@/lib/llm/result";
export type { AnalysisStage, AnalyzeOptions, ExpenseAnalyzer } from "@/lib/llm/types";
export { AudioCaptureSession, type CaptureSessionState } from "@/lib/voice/capture-session";
export { classifyRecognitionError, describeRecognitionError } from "@/lib/voice/error-classifier";
export { RECOGNITION_CODES, VoiceCaptureError, type RecognitionError } from "@/lib/voice/errors";
export type * from "@/lib/voice/ports";
export { SerialExecutor } from "@/lib/voice/serial-executor";
export { RecordingWorkflow } from "@/lib/workflow/recording-workflow";
export { STEP_DESCRIPTIONS } from "@/lib/workflow/messages";
export { WorkflowError, type RecordingStep, type WorkflowState } from "@/lib/workflow/types";

export interface ExpenseRecorderOverrides {
  expenseStore?: ExpenseStore;
  userPreferences?: UserPreferences;
  fetch?: typeof fetch;
}

/** Wires ffmpeg capture, the configured recognizer, the analysis client and storage. */
export function createExpenseRecorder(
  config: Readonly<AppConfig> = loadConfig(),
  overrides?: ExpenseRecorderOverrides
) {
  const { voice, llm, storage } = config;
  const scoped = (scope: string) => createLogger(scope, { debug: config.debug });
  const logger = scoped("recorder");
  const voiceLogger = scoped("voice");

  const recognizer = createSpeechRecognizer(voice, voiceLogger);
  const session = new AudioCaptureSession({
    engine: new FfmpegAudioEngine({
      executable: voice.ffmpeg.executable,
      inputFormat: voice.ffmpeg.inputFormat,
      inputDevice: voice.ffmpeg.inputDevice,
      logger: voiceLogger,
    }),
    audioSession: new DesktopAudioSession(voiceLogger),
    permissions: new ConfiguredPermissions({
      microphone: true,
      speechRecognition: voice.provider === "mock" || voice.iflytek !== null,
    }),
    recognizer,
    executor: new SerialExecutor(scoped("executor")),
    stopGraceMs: voice.stopGraceMs,
    logger: voiceLogger,
  });

  const analyzer = new ExpenseAnalysisClient({
    apiKey: llm.apiKey,
    endpoint: llm.endpoint,
    model: llm.model,
    temperature: llm.temperature,
    maxTokens: llm.maxTokens,
    timeoutMs: llm.timeoutMs,
    maxAttempts: llm.maxAttempts,
    fetch: overrides?.fetch,
    logger: scoped("LLM"),
  });

  const expenseStore =
    overrides?.expenseStore ??
    createSupabaseExpenseStore({ ...storage, logger: scoped("storage") });
  const workflow = new RecordingWorkflow({
    session,
    analyzer,
    expenseStore,
    userPreferences: overrides?.userPreferences ?? {
      defaultCurrency: config.defaultCurrency,
      preferredCategories: [],
      commonMerchants: [],
    },
    logger: scoped("workflow"),
  });

  logger.info("费用录音流程已就绪", { recognizer: voice.provider, model: llm.model });
  return { workflow, session, analyzer, expenseStore };
}
