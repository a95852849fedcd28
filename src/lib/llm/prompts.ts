import type { AnalysisRequest, UserPreferences } from "@/types/expense";
import { categoryLabel, categoryVocabulary } from "@/lib/expense/categories";
import type { LLMMessage } from "./types";

function formatContext(context?: string) {
  const trimmed = context?.trim();
  return trimmed ? `\n补充信息：${trimmed}\n` : "";
}

function formatPreferences(preferences?: UserPreferences) {
  if (!preferences) {
    return "";
  }

  const lines = ["\n\n用户偏好信息："];
  if (preferences.preferredCategories.length > 0) {
    lines.push(
      `常用分类：${preferences.preferredCategories.map((category) => categoryLabel(category)).join("、")}`
    );
  }
  if (preferences.commonMerchants.length > 0) {
    lines.push(`常去商家：${preferences.commonMerchants.join("、")}`);
  }
  lines.push(`默认货币：${preferences.defaultCurrency}`);
  return `${lines.join("\n")}\n`;
}

export function buildExpenseAnalysisPrompt(request: AnalysisRequest) {
  const basePrompt = `你是一个专业的费用记录分析助手。请分析以下语音转文本的内容，提取费用信息并分类。

语音内容："${request.voiceText}"
${formatContext(request.context)}
请按照以下 JSON 格式返回分析结果：
{
  "expenses": [
    {
      "amount": 金额数字（仅数字，不含货币符号）,
      "category": "分类（从以下选项中选择：${categoryVocabulary()}）",
      "title": "简短的费用标题",
      "description": "详细描述",
      "confidence": 置信度（0-1之间的小数）,
      "tags": ["相关标签数组"]
    }
  ]
}

分析要求：
1. 准确识别金额，支持各种表达方式（如"五十块"、"50元"、"半百"等）；
2. 根据语境智能推断费用类别，分类必须使用上述选项之一；
3. 如果一句话中包含多笔费用（如"午餐25元，然后打车15元"），请在 expenses 数组中逐条列出，最主要的一笔放在第一位；
4. 生成简洁明了的标题，并提供详细的描述信息；
5. 给出分析的置信度评估。

请仅返回 JSON 格式的结果，不要包含其他文字。`;

  return basePrompt + formatPreferences(request.userPreferences);
}

export function buildExpenseAnalysisMessages(request: AnalysisRequest): LLMMessage[] {
  return [
    {
      role: "user",
      content: buildExpenseAnalysisPrompt(request),
    },
  ];
}
