import type { AnalysisRequest, AnalysisResult, ConfidenceLevel } from "@/types/expense";
import { isPositiveDecimal } from "@/lib/expense/amount";
import type { ParsedExpenseContent } from "./normalize";

export const MIN_VALID_CONFIDENCE = 0.3;
export const FALLBACK_CONFIDENCE = 0.5;

export function isAnalysisResultValid(result: AnalysisResult) {
  return (
    isPositiveDecimal(result.extractedAmount) &&
    result.title.trim().length > 0 &&
    result.confidence > MIN_VALID_CONFIDENCE
  );
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
  if (confidence >= 0.8) {
    return "high";
  }
  if (confidence >= 0.6) {
    return "medium";
  }
  return "low";
}

export function buildAnalysisResult(
  request: AnalysisRequest,
  content: ParsedExpenseContent,
  processingTimeMs: number,
  timestamp: Date
): AnalysisResult {
  const { primary, alternatives } = content;
  return {
    requestId: request.requestId,
    originalText: request.voiceText,
    extractedAmount: primary.amount,
    category: primary.category,
    title: primary.title,
    description: primary.description,
    confidence: primary.confidence,
    tags: primary.tags,
    alternativeInterpretations: alternatives.map((item) => ({
      amount: item.amount,
      category: item.category,
      title: item.title,
      description: item.description,
      confidence: item.confidence,
    })),
    processingTimeMs,
    timestamp,
  };
}

interface FallbackCopy {
  title: string;
  description: string;
}

/** Deterministic result for completions that carry no usable expense. */
export function buildFallbackResult(
  request: AnalysisRequest,
  processingTimeMs: number,
  timestamp: Date
): AnalysisResult {
  const copy = resolveFallbackCopy(request.timestamp.getHours());
  return {
    requestId: request.requestId,
    originalText: request.voiceText,
    extractedAmount: null,
    category: "other",
    title: copy.title,
    description: copy.description,
    confidence: FALLBACK_CONFIDENCE,
    tags: [],
    alternativeInterpretations: [],
    processingTimeMs,
    timestamp,
  };
}

function resolveFallbackCopy(hour: number): FallbackCopy {
  if (hour >= 5 && hour <= 10) {
    return { title: "早餐", description: "可能是早餐消费，未能识别金额，请手动补充。" };
  }
  if (hour >= 11 && hour <= 13) {
    return { title: "午餐", description: "可能是午餐消费，未能识别金额，请手动补充。" };
  }
  if (hour >= 17 && hour <= 21) {
    return { title: "晚餐", description: "可能是晚餐消费，未能识别金额，请手动补充。" };
  }
  return { title: "待补充的费用", description: "无法解析语音内容，请手动补充金额和分类。" };
}
