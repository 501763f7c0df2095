import type {
  BenchmarkRule,
  BenchmarkTable,
  HealthRecord,
  HealthStatus,
  MetricInput,
  MetricValues,
  SectionMetricMap,
  ThresholdOperator,
} from "../entities/financialHealth";

/**
 * Literal decorations removed from textual values before the first number is read.
 * This is text cleanup only: "2.5B" reads as 2.5, not 2.5e9.
 */
export const STRIPPED_DECORATIONS = ["%", "×", "$", "days", "B"] as const;

const NUMBER_PATTERN = /-?\d+\.?\d*/;

const APPROX_TOLERANCE = 0.15;

const OPERATOR_SYMBOLS: Record<Exclude<ThresholdOperator, "APPROX">, string> = {
  GT: ">",
  LT: "<",
  GTE: ">=",
  LTE: "<=",
};

/**
 * Reads a comparable number out of a raw metric value, or null when there is none.
 */
export const parseMetricValue = (value: MetricInput): number | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  const stripped = STRIPPED_DECORATIONS.reduce(
    (text, decoration) => text.replaceAll(decoration, ""),
    value,
  );
  const match = NUMBER_PATTERN.exec(stripped);
  if (!match) {
    return null;
  }

  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : null;
};

const judge = (healthy: boolean): HealthStatus =>
  healthy ? "healthy" : "warning";

/**
 * Judges one metric value against its benchmark rule.
 * Anything that cannot be judged (no value, no rule, no number, incomplete rule) is neutral.
 */
export const evaluate = (
  value: MetricInput,
  rule: BenchmarkRule | undefined,
): HealthStatus => {
  if (!rule) {
    return "neutral";
  }

  const v = parseMetricValue(value);
  if (v === null) {
    return "neutral";
  }

  switch (rule.operator) {
    case "RANGE": {
      const { low, high } = rule;
      if (low === undefined || high === undefined) {
        return "neutral";
      }
      return judge(low <= v && v <= high);
    }
    case "CUSTOM":
      return "neutral";
    case "GT":
    case "LT":
    case "GTE":
    case "LTE":
    case "APPROX": {
      const { threshold } = rule;
      if (threshold === undefined) {
        return "neutral";
      }
      return compareToThreshold(rule.operator, v, threshold);
    }
    default: {
      const unreachable: never = rule;
      throw new Error(
        `Unsupported benchmark operator: ${JSON.stringify(unreachable)}`,
      );
    }
  }
};

const compareToThreshold = (
  operator: ThresholdOperator,
  v: number,
  threshold: number,
): HealthStatus => {
  switch (operator) {
    case "GT":
      return judge(v > threshold);
    case "LT":
      return judge(v < threshold);
    case "GTE":
      return judge(v >= threshold);
    case "LTE":
      return judge(v <= threshold);
    case "APPROX":
      // Relative distance is undefined around a zero target.
      if (threshold === 0) {
        return "neutral";
      }
      return judge(Math.abs(v - threshold) / threshold < APPROX_TOLERANCE);
  }
};

const formatNumber = (
  value: number | undefined,
  decimals: number | undefined,
): string => {
  if (value === undefined) {
    return "";
  }
  return decimals === undefined ? String(value) : value.toFixed(decimals);
};

/**
 * Renders the benchmark shown next to a metric, e.g. "> 0.4", "1.0–2.0", "~2×".
 */
export const formatBenchmark = (rule: BenchmarkRule | undefined): string => {
  if (!rule) {
    return "";
  }

  switch (rule.operator) {
    case "RANGE":
      return `${formatNumber(rule.low, rule.decimals)}–${formatNumber(rule.high, rule.decimals)}${rule.unit}`;
    case "APPROX":
      return `~${formatNumber(rule.threshold, rule.decimals)}${rule.unit}`;
    case "CUSTOM":
      return "See insight";
    case "GT":
    case "LT":
    case "GTE":
    case "LTE":
      return `${OPERATOR_SYMBOLS[rule.operator]} ${formatNumber(rule.threshold, rule.decimals)}${rule.unit}`;
    default: {
      const unreachable: never = rule;
      throw new Error(
        `Unsupported benchmark operator: ${JSON.stringify(unreachable)}`,
      );
    }
  }
};

/**
 * Produces one record per (section, metric) pair, in section order then metric order.
 * Missing values or rules degrade that record to neutral; the report is always complete.
 */
export const buildHealthRecords = (
  metrics: MetricValues,
  sectionMap: SectionMetricMap,
  benchmarks: BenchmarkTable,
): HealthRecord[] => {
  const records: HealthRecord[] = [];

  for (const { section, metrics: sectionMetrics } of sectionMap) {
    for (const { metric, dataKey } of sectionMetrics) {
      const value = Object.hasOwn(metrics, dataKey)
        ? metrics[dataKey]
        : undefined;
      const rule = benchmarks.get(metric);

      records.push({
        section,
        metric,
        benchmark: formatBenchmark(rule),
        value: value === null || value === undefined ? "" : String(value),
        status: evaluate(value, rule),
        insight: rule?.insight ?? "",
      });
    }
  }

  return records;
};
