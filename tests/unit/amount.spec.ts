import { describe, expect, it } from "vitest";
import {
  decimalToCents,
  formatCents,
  isPositiveDecimal,
  parseDecimal,
} from "@/lib/expense/amount";

describe("金额解析", () => {
  it("将数字与字符串规范化为十进制字符串", () => {
    expect(parseDecimal(25)).toBe("25");
    expect(parseDecimal(12.5)).toBe("12.5");
    expect(parseDecimal("025.50")).toBe("25.5");
    expect(parseDecimal(" ¥1,234.00 ")).toBe("1234");
    expect(parseDecimal("0.00")).toBe("0");
  });

  it("非法输入返回 null", () => {
    expect(parseDecimal("五十")).toBeNull();
    expect(parseDecimal("12.5.3")).toBeNull();
    expect(parseDecimal(Number.NaN)).toBeNull();
    expect(parseDecimal(null)).toBeNull();
    expect(parseDecimal({ amount: 1 })).toBeNull();
  });

  it("只有大于零的金额才算有效", () => {
    expect(isPositiveDecimal("0.01")).toBe(true);
    expect(isPositiveDecimal("0")).toBe(false);
    expect(isPositiveDecimal("-3")).toBe(false);
    expect(isPositiveDecimal(null)).toBe(false);
  });

  it("精确换算为分，不经过浮点运算", () => {
    expect(decimalToCents("0.1")).toBe(10);
    expect(decimalToCents("19.99")).toBe(1999);
    expect(decimalToCents("999999.99")).toBe(99_999_999);
    expect(decimalToCents("1.005")).toBeNull();
  });

  it("按两位小数格式化分", () => {
    expect(formatCents(2500)).toBe("25.00");
    expect(formatCents(7)).toBe("0.07");
    expect(formatCents(-150)).toBe("-1.50");
  });
});
