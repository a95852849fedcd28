import { createStore, type StoreApi } from "zustand/vanilla";
import type {
  AnalysisRequest,
  ExpenseCandidate,
  ExpensePatch,
  ExpenseRecord,
  UserPreferences,
} from "@/types/expense";
import type { VoiceRecording } from "@/types/voice";
import {
  applyCandidatePatch,
  candidateFromAlternative,
  candidateFromAnalysis,
  validateExpenseCandidate,
} from "@/lib/expense/candidate";
import type { ExpenseStore } from "@/lib/expense/store";
import { createAnalysisRequest } from "@/lib/llm/analysis-client";
import { isAnalysisResultValid } from "@/lib/llm/result";
import type { ExpenseAnalyzer } from "@/lib/llm/types";
import { createLogger, type Logger } from "@/lib/logger";
import type { AudioCaptureSession, CaptureSessionState } from "@/lib/voice/capture-session";
import {
  ANALYSIS_PROGRESS_LABELS,
  EMPTY_SELECTION_MESSAGE,
  INVALID_ANALYSIS_MESSAGE,
  describeWorkflowError,
} from "./messages";
import { WorkflowError, type RecordingStep, type WorkflowStage, type WorkflowState } from "./types";

export const DEFAULT_ERROR_RESET_DELAY_MS = 5000;

export interface RecordingWorkflowOptions {
  session: AudioCaptureSession;
  analyzer: ExpenseAnalyzer;
  expenseStore: ExpenseStore;
  userPreferences?: UserPreferences;
  errorResetDelayMs?: number;
  createRequest?: (voiceText: string) => AnalysisRequest;
  logger?: Logger;
}

const CONFIRMABLE_STEPS: readonly RecordingStep[] = [
  "confirmingExpense",
  "selectingMultipleExpenses",
];
const STARTABLE_STEPS: readonly RecordingStep[] = ["idle", "completed", "error"];

function initialState(): WorkflowState {
  return {
    step: "idle",
    progressLabel: null,
    voiceRecording: null,
    analysisResult: null,
    pendingCandidates: [],
    savedExpenses: [],
    errorMessage: null,
  };
}

/**
 * Drives one recording from capture through analysis to confirmation.
 *
 * idle → recording → processing → analyzing → confirmingExpense | selectingMultipleExpenses →
 * completed, with error reachable from every step and cleared back to idle after
 * `errorResetDelayMs` unless the user acts first.
 */
export class RecordingWorkflow {
  readonly store: StoreApi<WorkflowState>;

  private readonly session: AudioCaptureSession;
  private readonly analyzer: ExpenseAnalyzer;
  private readonly expenseStore: ExpenseStore;
  private readonly userPreferences?: UserPreferences;
  private readonly errorResetDelayMs: number;
  private readonly createRequest: (voiceText: string) => AnalysisRequest;
  private readonly logger: Logger;
  private readonly unsubscribeSession: () => void;

  private listeningToSession = false;
  private activeRequestId: string | null = null;
  private flowGeneration = 0;
  private confirmingFlow: number | null = null;
  private errorResetTimer: ReturnType<typeof setTimeout> | null = null;
  private lastError: WorkflowError | null = null;

  constructor(options: RecordingWorkflowOptions) {
    this.session = options.session;
    this.analyzer = options.analyzer;
    this.expenseStore = options.expenseStore;
    this.userPreferences = options.userPreferences;
    this.errorResetDelayMs = options.errorResetDelayMs ?? DEFAULT_ERROR_RESET_DELAY_MS;
    this.createRequest =
      options.createRequest ??
      ((voiceText) => createAnalysisRequest(voiceText, { userPreferences: this.userPreferences }));
    this.logger = options.logger ?? createLogger("workflow");
    this.store = createStore<WorkflowState>()(initialState);
    this.unsubscribeSession = this.session.store.subscribe((state, previous) => {
      if (state.recordingState !== previous.recordingState) {
        this.handleSessionState(state);
      }
    });
  }

  getState() {
    return this.store.getState();
  }

  getLastError() {
    return this.lastError;
  }

  async start() {
    this.cancelErrorReset();
    const { step } = this.getState();
    if (!STARTABLE_STEPS.includes(step)) {
      this.logger.warn(`当前状态（${step}）无法开始录音`);
      return;
    }

    this.flowGeneration += 1;
    this.activeRequestId = null;
    this.listeningToSession = false;
    this.store.setState({ ...initialState(), step: "recording" });
    try {
      await this.session.start();
    } catch (error) {
      this.fail("capture", error);
      return;
    }
    this.listeningToSession = true;
  }

  async stop() {
    this.cancelErrorReset();
    if (this.getState().step !== "recording") {
      return;
    }
    this.store.setState({ step: "processing" });
    try {
      await this.session.stop();
    } catch (error) {
      this.listeningToSession = false;
      this.fail("capture", error);
    }
  }

  async confirm(candidate: ExpenseCandidate) {
    return this.confirmMultiple([candidate]);
  }

  /**
   * Validates and saves each candidate on its own. Candidates saved before a failure stay saved;
   * any failure moves the workflow to `error` with the saved records still published. Only one
   * confirmation runs per flow, and nothing is published once the flow has been reset.
   */
  async confirmMultiple(candidates: ExpenseCandidate[]): Promise<ExpenseRecord[]> {
    this.cancelErrorReset();
    const { step } = this.getState();
    if (!CONFIRMABLE_STEPS.includes(step)) {
      this.logger.warn(`当前状态（${step}）没有待确认的费用记录`);
      return [];
    }
    if (this.confirmingFlow === this.flowGeneration) {
      this.logger.warn("费用记录正在保存，忽略重复确认");
      return [];
    }
    if (candidates.length === 0) {
      this.fail("confirmation", new WorkflowError("confirmation", EMPTY_SELECTION_MESSAGE));
      return [];
    }

    const flow = this.flowGeneration;
    this.confirmingFlow = flow;
    const saved: ExpenseRecord[] = [];
    const failures: Array<{ stage: WorkflowStage; error: unknown }> = [];
    try {
      for (const candidate of candidates) {
        let validated: ExpenseCandidate;
        try {
          validated = validateExpenseCandidate(candidate);
        } catch (error) {
          failures.push({ stage: "confirmation", error });
          continue;
        }
        try {
          saved.push(await this.expenseStore.save(validated));
        } catch (error) {
          failures.push({ stage: "storage", error });
        }
      }
    } finally {
      if (this.confirmingFlow === flow) {
        this.confirmingFlow = null;
      }
    }

    if (flow !== this.flowGeneration) {
      this.logger.info("流程已重置，不再发布保存结果", { saved: saved.length });
      return saved;
    }

    const savedExpenses = [...this.getState().savedExpenses, ...saved];
    if (failures.length === 0) {
      this.store.setState({
        step: "completed",
        progressLabel: null,
        pendingCandidates: [],
        savedExpenses,
        errorMessage: null,
      });
      this.logger.info(`已保存 ${saved.length} 条费用记录`);
      return saved;
    }

    this.store.setState({ savedExpenses });
    const [first] = failures;
    const detail = describeWorkflowError(first.error);
    const message =
      saved.length > 0 ? `已保存 ${saved.length} 条，${failures.length} 条未保存：${detail}` : detail;
    this.fail(first.stage, new WorkflowError(first.stage, message, { cause: first.error }));
    return saved;
  }

  /** Replaces a pending candidate with an edited copy; throws ExpenseValidationError if invalid. */
  editPendingCandidate(index: number, patch: ExpensePatch) {
    this.cancelErrorReset();
    const { step, pendingCandidates } = this.getState();
    const current = pendingCandidates[index];
    if (!CONFIRMABLE_STEPS.includes(step) || !current) {
      throw new WorkflowError("confirmation", "没有待确认的费用记录");
    }
    const updated = applyCandidatePatch(current, patch);
    this.store.setState({
      pendingCandidates: pendingCandidates.map((candidate, position) =>
        position === index ? updated : candidate
      ),
    });
    return updated;
  }

  async cancel() {
    this.cancelErrorReset();
    const { step } = this.getState();
    this.listeningToSession = false;
    if (step === "recording" || step === "processing") {
      try {
        await this.session.stop();
      } catch (error) {
        this.logger.warn("取消录音时停止采集失败", error);
      }
    }
    this.resetFlow();
  }

  /** Resets published state only; an analysis still in flight is ignored when it returns. */
  resetFlow() {
    this.cancelErrorReset();
    this.flowGeneration += 1;
    this.activeRequestId = null;
    this.listeningToSession = false;
    this.store.setState(initialState());
  }

  dispose() {
    this.cancelErrorReset();
    this.unsubscribeSession();
    this.listeningToSession = false;
    this.activeRequestId = null;
  }

  private handleSessionState(state: CaptureSessionState) {
    if (!this.listeningToSession) {
      return;
    }

    const { recordingState } = state;
    if (recordingState.status === "processing" && this.getState().step === "recording") {
      this.store.setState({ step: "processing" });
      return;
    }

    if (recordingState.status === "completed") {
      this.listeningToSession = false;
      this.analyzeRecording(state.lastRecording).catch((error: unknown) => {
        this.fail("analysis", error);
      });
      return;
    }

    if (recordingState.status === "error") {
      this.listeningToSession = false;
      this.fail(
        "transcription",
        new WorkflowError("transcription", `语音识别失败: ${recordingState.message}`)
      );
    }
  }

  private async analyzeRecording(recording: VoiceRecording | null) {
    if (!recording || recording.text.trim().length === 0) {
      this.logger.info("未识别到语音内容，返回空闲状态");
      this.store.setState(initialState());
      return;
    }

    const request = this.createRequest(recording.text.trim());
    this.activeRequestId = request.requestId;
    this.store.setState({
      step: "analyzing",
      progressLabel: ANALYSIS_PROGRESS_LABELS.connecting,
      voiceRecording: recording,
    });

    let result;
    try {
      result = await this.analyzer.analyze(request, {
        onProgress: (stage) => {
          if (this.activeRequestId === request.requestId) {
            this.store.setState({ progressLabel: ANALYSIS_PROGRESS_LABELS[stage] });
          }
        },
      });
    } catch (error) {
      if (this.activeRequestId !== request.requestId) {
        this.logger.info("忽略已失效分析请求的错误", { requestId: request.requestId });
        return;
      }
      this.activeRequestId = null;
      this.fail("analysis", error);
      return;
    }

    if (this.activeRequestId !== request.requestId || result.requestId !== request.requestId) {
      this.logger.info("忽略已失效的分析结果", { requestId: result.requestId });
      return;
    }
    this.activeRequestId = null;
    this.store.setState({ analysisResult: result });

    if (!isAnalysisResultValid(result)) {
      this.fail("analysis", new WorkflowError("analysis", INVALID_ANALYSIS_MESSAGE));
      return;
    }

    let primary: ExpenseCandidate;
    try {
      primary = candidateFromAnalysis(result);
    } catch (error) {
      this.fail("confirmation", error);
      return;
    }

    const alternatives: ExpenseCandidate[] = [];
    result.alternativeInterpretations.forEach((alternative, index) => {
      try {
        alternatives.push(candidateFromAlternative(alternative, result));
      } catch (error) {
        this.logger.warn(`第 ${index + 1} 条备选费用无效，已忽略`, error);
      }
    });

    const pendingCandidates = [primary, ...alternatives];
    this.store.setState({
      step: alternatives.length > 0 ? "selectingMultipleExpenses" : "confirmingExpense",
      progressLabel: null,
      pendingCandidates,
    });
  }

  private fail(stage: WorkflowStage, error: unknown) {
    const wrapped =
      error instanceof WorkflowError
        ? error
        : new WorkflowError(stage, describeWorkflowError(error), { cause: error });
    this.lastError = wrapped;
    this.logger.error(`[${wrapped.stage}] ${wrapped.message}`, error);
    this.store.setState({
      step: "error",
      progressLabel: null,
      errorMessage: wrapped.message,
    });
    this.scheduleErrorReset();
  }

  private scheduleErrorReset() {
    this.cancelErrorReset();
    const timer = setTimeout(() => {
      this.errorResetTimer = null;
      if (this.getState().step === "error") {
        this.logger.info("错误状态已自动恢复");
        this.store.setState({ step: "idle", errorMessage: null });
      }
    }, this.errorResetDelayMs);
    timer.unref();
    this.errorResetTimer = timer;
  }

  private cancelErrorReset() {
    if (this.errorResetTimer) {
      clearTimeout(this.errorResetTimer);
      this.errorResetTimer = null;
    }
  }
}
