import { ExpenseStorageError, ExpenseValidationError } from "@/lib/expense/errors";
import { ExpenseAnalysisError } from "@/lib/llm/errors";
import type { AnalysisStage } from "@/lib/llm/types";
import { VoiceCaptureError } from "@/lib/voice/errors";
import type { RecordingStep } from "./types";

export const STEP_DESCRIPTIONS: Record<RecordingStep, string> = {
  idle: "准备开始",
  recording: "正在录音...",
  processing: "处理录音...",
  analyzing: "AI 分析中...",
  selectingMultipleExpenses: "选择要记录的费用",
  confirmingExpense: "确认费用信息",
  completed: "记录完成",
  error: "发生错误",
};

export const ANALYSIS_PROGRESS_LABELS: Record<AnalysisStage, string> = {
  connecting: "正在连接 AI 服务...",
  interpreting: "正在理解语音内容...",
  extracting: "正在提取金额...",
};

export const INVALID_ANALYSIS_MESSAGE = "AI 未能识别出有效的费用信息，请说得更清楚一些后重试";
export const EMPTY_SELECTION_MESSAGE = "请至少选择一条费用记录";

export function describeAnalysisError(error: ExpenseAnalysisError) {
  switch (error.kind) {
    case "config":
      if (error.code === "missing_api_key") {
        return "缺少 AI 服务的 API 密钥，请先完成配置";
      }
      if (error.code === "invalid_url") {
        return "AI 服务地址配置无效，请检查设置";
      }
      return "请求编码失败，请重新录制";
    case "auth":
      return "API 密钥无效或已过期，请检查设置";
    case "http":
      if (error.status === 429) {
        return "请求过于频繁，请稍后再试";
      }
      if (error.status !== undefined && error.status >= 500) {
        return "AI 服务暂时不可用，请稍后重试";
      }
      return `AI 服务返回错误（代码 ${error.status ?? "未知"}）`;
    case "timeout":
      return "AI 服务响应超时，请检查网络后重试";
    case "network":
      return "网络连接失败，请检查网络后重试";
    case "invalid_response":
      return "AI 服务返回了无效的响应，请稍后重试";
  }
}

export function describeWorkflowError(error: unknown) {
  if (error instanceof ExpenseAnalysisError) {
    return describeAnalysisError(error);
  }
  if (error instanceof VoiceCaptureError) {
    return error.message;
  }
  if (error instanceof ExpenseValidationError) {
    return `费用信息校验失败：${error.message}`;
  }
  if (error instanceof ExpenseStorageError) {
    return error.message;
  }
  if (error instanceof Error) {
    return `发生未知错误：${error.message}`;
  }
  return "发生未知错误，请稍后重试";
}
