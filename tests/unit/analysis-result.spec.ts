import { describe, expect, it } from "vitest";
import {
  buildFallbackResult,
  confidenceLevel,
  isAnalysisResultValid,
} from "@/lib/llm/result";
import type { AnalysisRequest, AnalysisResult } from "@/types/expense";

function requestAt(hour: number): AnalysisRequest {
  return {
    voiceText: "嗯……",
    requestId: `req-${hour}`,
    timestamp: new Date(2024, 4, 1, hour, 30),
  };
}

function result(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    requestId: "req-1",
    originalText: "午餐25元",
    extractedAmount: "25",
    category: "food",
    title: "午餐",
    description: "",
    confidence: 0.9,
    tags: [],
    alternativeInterpretations: [],
    processingTimeMs: 5,
    timestamp: new Date(2024, 4, 1, 12),
    ...overrides,
  };
}

describe("分析结果", () => {
  it.each([
    [7, "早餐", "可能是早餐消费，未能识别金额，请手动补充。"],
    [12, "午餐", "可能是午餐消费，未能识别金额，请手动补充。"],
    [19, "晚餐", "可能是晚餐消费，未能识别金额，请手动补充。"],
    [15, "待补充的费用", "无法解析语音内容，请手动补充金额和分类。"],
    [2, "待补充的费用", "无法解析语音内容，请手动补充金额和分类。"],
  ])("%i 点的兜底结果标题为 %s", (hour, title, description) => {
    const timestamp = new Date(2024, 4, 1, 20);
    const fallback = buildFallbackResult(requestAt(hour), 40, timestamp);

    expect(fallback).toEqual({
      requestId: `req-${hour}`,
      originalText: "嗯……",
      extractedAmount: null,
      category: "other",
      title,
      description,
      confidence: 0.5,
      tags: [],
      alternativeInterpretations: [],
      processingTimeMs: 40,
      timestamp,
    });
    expect(isAnalysisResultValid(fallback)).toBe(false);
  });

  it("金额、标题与置信度均满足要求才算有效", () => {
    expect(isAnalysisResultValid(result())).toBe(true);
    expect(isAnalysisResultValid(result({ extractedAmount: "0" }))).toBe(false);
    expect(isAnalysisResultValid(result({ title: "  " }))).toBe(false);
    expect(isAnalysisResultValid(result({ confidence: 0.3 }))).toBe(false);
    expect(isAnalysisResultValid(result({ confidence: 0.31 }))).toBe(true);
  });

  it("按置信度划分等级", () => {
    expect(confidenceLevel(0.8)).toBe("high");
    expect(confidenceLevel(0.79)).toBe("medium");
    expect(confidenceLevel(0.6)).toBe("medium");
    expect(confidenceLevel(0.59)).toBe("low");
  });
});
