import type { AnalysisResult, ExpenseCandidate, ExpenseRecord } from "@/types/expense";
import type { VoiceRecording } from "@/types/voice";

export type RecordingStep =
  | "idle"
  | "recording"
  | "processing"
  | "analyzing"
  | "selectingMultipleExpenses"
  | "confirmingExpense"
  | "completed"
  | "error";

export interface WorkflowState {
  step: RecordingStep;
  progressLabel: string | null;
  voiceRecording: VoiceRecording | null;
  analysisResult: AnalysisResult | null;
  pendingCandidates: ExpenseCandidate[];
  savedExpenses: ExpenseRecord[];
  errorMessage: string | null;
}

export type WorkflowStage = "capture" | "transcription" | "analysis" | "confirmation" | "storage";

export class WorkflowError extends Error {
  public readonly stage: WorkflowStage;

  constructor(stage: WorkflowStage, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "WorkflowError";
    this.stage = stage;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}
