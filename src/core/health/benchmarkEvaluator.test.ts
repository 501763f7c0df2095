import { describe, expect, it } from "vitest";
import type {
  BenchmarkRule,
  RangeBenchmarkRule,
  SectionMetricMap,
  ThresholdBenchmarkRule,
} from "../entities/financialHealth";
import {
  buildHealthRecords,
  evaluate,
  formatBenchmark,
  parseMetricValue,
} from "./benchmarkEvaluator";

const gt = (threshold: number, unit = ""): ThresholdBenchmarkRule => ({
  metricName: "Test",
  operator: "GT",
  threshold,
  unit,
  insight: "",
});

const range = (
  low: number | undefined,
  high: number | undefined,
  extra: Partial<Pick<RangeBenchmarkRule, "unit" | "decimals">> = {},
): RangeBenchmarkRule => ({
  metricName: "Test",
  operator: "RANGE",
  low,
  high,
  unit: "",
  insight: "",
  ...extra,
});

const approx = (threshold: number, unit = ""): ThresholdBenchmarkRule => ({
  metricName: "Test",
  operator: "APPROX",
  threshold,
  unit,
  insight: "",
});

describe("parseMetricValue", () => {
  it("passes finite numbers through", () => {
    expect(parseMetricValue(1.36)).toBe(1.36);
    expect(parseMetricValue(-12)).toBe(-12);
  });

  it("treats non-finite numbers and absent values as missing", () => {
    expect(parseMetricValue(Number.NaN)).toBeNull();
    expect(parseMetricValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseMetricValue(null)).toBeNull();
    expect(parseMetricValue(undefined)).toBeNull();
  });

  it("reads the first number after removing decorations", () => {
    expect(parseMetricValue("45%")).toBe(45);
    expect(parseMetricValue("12.5×")).toBe(12.5);
    expect(parseMetricValue("$3.10")).toBe(3.1);
    expect(parseMetricValue("-12 days")).toBe(-12);
    expect(parseMetricValue("2.5B")).toBe(2.5);
  });

  it("returns null for text without a number", () => {
    expect(parseMetricValue("abc")).toBeNull();
    expect(parseMetricValue("")).toBeNull();
  });
});

describe("evaluate", () => {
  it("is neutral without a rule or a value", () => {
    expect(evaluate(1, undefined)).toBe("neutral");
    expect(evaluate(null, gt(0.4))).toBe("neutral");
    expect(evaluate(undefined, gt(0.4))).toBe("neutral");
    expect(evaluate("abc", gt(0.4))).toBe("neutral");
  });

  it("applies strict and inclusive comparisons", () => {
    expect(evaluate(0.7, gt(0.4))).toBe("healthy");
    expect(evaluate(0.4, gt(0.4))).toBe("warning");

    const lt: BenchmarkRule = { ...gt(45, "days"), operator: "LT" };
    expect(evaluate(30, lt)).toBe("healthy");
    expect(evaluate(45, lt)).toBe("warning");

    const gte: BenchmarkRule = { ...gt(1), operator: "GTE" };
    expect(evaluate(1, gte)).toBe("healthy");
    expect(evaluate(0.99, gte)).toBe("warning");

    const lte: BenchmarkRule = { ...gt(3), operator: "LTE" };
    expect(evaluate(3, lte)).toBe("healthy");
    expect(evaluate(3.01, lte)).toBe("warning");
  });

  it("includes both range bounds", () => {
    const rule = range(1, 2);
    expect(evaluate(1, rule)).toBe("healthy");
    expect(evaluate(2, rule)).toBe("healthy");
    expect(evaluate(1.5, rule)).toBe("healthy");
    expect(evaluate(0.99, rule)).toBe("warning");
    expect(evaluate(2.01, rule)).toBe("warning");
  });

  it("is neutral when a range bound is missing", () => {
    expect(evaluate(1.5, range(1, undefined))).toBe("neutral");
    expect(evaluate(1.5, range(undefined, 2))).toBe("neutral");
  });

  it("is neutral when a threshold is missing", () => {
    const rule: BenchmarkRule = {
      metricName: "Test",
      operator: "GT",
      unit: "",
      insight: "",
    };
    expect(evaluate(5, rule)).toBe("neutral");
  });

  it("accepts values within 15% of an approximate target", () => {
    expect(evaluate(2.2, approx(2))).toBe("healthy");
    expect(evaluate(1.8, approx(2))).toBe("healthy");
    expect(evaluate(2.4, approx(2))).toBe("warning");
    expect(evaluate(1.5, approx(2))).toBe("warning");
  });

  it("is neutral for an approximate target of zero", () => {
    expect(evaluate(0, approx(0))).toBe("neutral");
    expect(evaluate(0.1, approx(0))).toBe("neutral");
  });

  it("never judges custom rules", () => {
    const custom: BenchmarkRule = {
      metricName: "Graham Number",
      operator: "CUSTOM",
      unit: "",
      insight: "Compare with price.",
    };
    expect(evaluate(150, custom)).toBe("neutral");
  });

  it("parses decorated strings before comparing", () => {
    expect(evaluate("45%", gt(40))).toBe("healthy");
    expect(evaluate("2.5B", gt(2))).toBe("healthy");
    expect(evaluate("30 days", { ...gt(45), operator: "LT" })).toBe("healthy");
  });
});

describe("formatBenchmark", () => {
  it("renders each operator", () => {
    expect(formatBenchmark(gt(0.4))).toBe("> 0.4");
    expect(formatBenchmark({ ...gt(45, "days"), operator: "LT" })).toBe("< 45days");
    expect(formatBenchmark({ ...gt(1.25, "×"), operator: "GTE" })).toBe(">= 1.25×");
    expect(formatBenchmark({ ...gt(3, "×"), operator: "LTE" })).toBe("<= 3×");
    expect(formatBenchmark(range(4, 12, { unit: "×" }))).toBe("4–12×");
    expect(formatBenchmark(approx(2, "×"))).toBe("~2×");
    expect(
      formatBenchmark({
        metricName: "Graham Number",
        operator: "CUSTOM",
        unit: "",
        insight: "",
      }),
    ).toBe("See insight");
  });

  it("pads to the configured decimals", () => {
    expect(formatBenchmark(range(1, 2, { decimals: 1 }))).toBe("1.0–2.0");
    expect(formatBenchmark({ ...gt(0.4), decimals: 2 })).toBe("> 0.40");
  });

  it("is empty without a rule", () => {
    expect(formatBenchmark(undefined)).toBe("");
  });
});

describe("buildHealthRecords", () => {
  const currentRatio: BenchmarkRule = {
    metricName: "Current Ratio",
    operator: "RANGE",
    low: 1,
    high: 2,
    decimals: 1,
    unit: "",
    insight: "Short-term assets cover short-term debts.",
  };

  it("builds a record from a value and its rule", () => {
    const sectionMap: SectionMetricMap = [
      {
        section: "Liquidity",
        metrics: [{ metric: "Current Ratio", dataKey: "currentRatio" }],
      },
    ];

    const records = buildHealthRecords(
      { currentRatio: 1.5 },
      sectionMap,
      new Map([["Current Ratio", currentRatio]]),
    );

    expect(records).toEqual([
      {
        section: "Liquidity",
        metric: "Current Ratio",
        benchmark: "1.0–2.0",
        value: "1.5",
        status: "healthy",
        insight: "Short-term assets cover short-term debts.",
      },
    ]);
  });

  it("keeps section then metric order and degrades gaps to neutral", () => {
    const sectionMap: SectionMetricMap = [
      {
        section: "Liquidity",
        metrics: [
          { metric: "Current Ratio", dataKey: "currentRatio" },
          { metric: "Cash Ratio", dataKey: "cashRatio" },
        ],
      },
      {
        section: "Other",
        metrics: [{ metric: "Unruled", dataKey: "unruled" }],
      },
    ];

    const records = buildHealthRecords(
      { currentRatio: "2.5", cashRatio: null, unruled: 7 },
      sectionMap,
      new Map([["Current Ratio", currentRatio]]),
    );

    expect(records.map((record) => [record.section, record.metric])).toEqual([
      ["Liquidity", "Current Ratio"],
      ["Liquidity", "Cash Ratio"],
      ["Other", "Unruled"],
    ]);
    expect(records[0]).toMatchObject({ value: "2.5", status: "warning" });
    expect(records[1]).toEqual({
      section: "Liquidity",
      metric: "Cash Ratio",
      benchmark: "",
      value: "",
      status: "neutral",
      insight: "",
    });
    expect(records[2]).toMatchObject({ value: "7", benchmark: "", status: "neutral" });
  });

  it("ignores inherited properties when looking up values", () => {
    const sectionMap: SectionMetricMap = [
      {
        section: "Other",
        metrics: [{ metric: "Current Ratio", dataKey: "toString" }],
      },
    ];

    const [record] = buildHealthRecords(
      {},
      sectionMap,
      new Map([["Current Ratio", currentRatio]]),
    );

    expect(record).toMatchObject({ value: "", status: "neutral" });
  });

  it("returns equal output for repeated calls with the same inputs", () => {
    const sectionMap: SectionMetricMap = [
      {
        section: "Liquidity",
        metrics: [
          { metric: "Current Ratio", dataKey: "currentRatio" },
          { metric: "Cash Ratio", dataKey: "cashRatio" },
        ],
      },
    ];
    const benchmarks = new Map([["Current Ratio", currentRatio]]);
    const metrics = { currentRatio: "1.2", cashRatio: 0.3 };

    const first = buildHealthRecords(metrics, sectionMap, benchmarks);
    const second = buildHealthRecords(metrics, sectionMap, benchmarks);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(evaluate(1.2, currentRatio)).toBe(evaluate(1.2, currentRatio));
    expect(formatBenchmark(currentRatio)).toBe(formatBenchmark(currentRatio));
  });

  it("returns nothing for an empty section map", () => {
    expect(buildHealthRecords({ currentRatio: 1.5 }, [], new Map())).toEqual([]);
  });
});
