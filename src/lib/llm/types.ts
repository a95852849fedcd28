import type { AnalysisRequest, AnalysisResult } from "@/types/expense";

export type LLMMessageRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: LLMMessageRole;
  content: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: LLMMessage[];
  max_tokens: number;
  temperature: number;
  stream: false;
}

export interface ChatCompletionEnvelope {
  id?: string | null;
  choices: Array<{
    message: {
      role?: string | null;
      content: string;
    };
    finish_reason?: string | null;
  }>;
}

export type AnalysisStage = "connecting" | "interpreting" | "extracting";

export interface AnalyzeOptions {
  onProgress?: (stage: AnalysisStage) => void;
}

export interface ExpenseAnalyzer {
  analyze(request: AnalysisRequest, options?: AnalyzeOptions): Promise<AnalysisResult>;
}
