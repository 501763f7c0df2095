export type HealthStatus = "healthy" | "warning" | "neutral";

export type ThresholdOperator = "GT" | "LT" | "GTE" | "LTE" | "APPROX";

type RuleBase = {
  metricName: string;
  unit: string;
  insight: string;
  /** Fixed number of decimals used when the benchmark is printed. */
  decimals?: number;
};

export type ThresholdBenchmarkRule = RuleBase & {
  operator: ThresholdOperator;
  threshold?: number;
};

export type RangeBenchmarkRule = RuleBase & {
  operator: "RANGE";
  low?: number;
  high?: number;
};

export type CustomBenchmarkRule = RuleBase & {
  operator: "CUSTOM";
};

export type BenchmarkRule =
  | ThresholdBenchmarkRule
  | RangeBenchmarkRule
  | CustomBenchmarkRule;

export type SectionMetric = {
  metric: string;
  dataKey: string;
};

export type HealthSection = {
  section: string;
  metrics: readonly SectionMetric[];
};

/**
 * Ordered sections, each with its ordered metrics. Iteration order is the report order.
 */
export type SectionMetricMap = readonly HealthSection[];

export type BenchmarkTable = ReadonlyMap<string, BenchmarkRule>;

export type MetricInput = number | string | null | undefined;

export type MetricValues = Readonly<Record<string, MetricInput>>;

export type HealthRecord = {
  section: string;
  metric: string;
  benchmark: string;
  value: string;
  status: HealthStatus;
  insight: string;
};

export type FinancialHealthRow = HealthRecord & {
  companyId: number;
  symbol: string;
};

export type StoredFinancialHealthRow = FinancialHealthRow & {
  id: number;
  createdAt: Date;
  updatedAt: Date;
};
