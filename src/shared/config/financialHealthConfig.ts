import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type {
  BenchmarkRule,
  BenchmarkTable,
  SectionMetricMap,
} from "../../core/entities/financialHealth";
import { logger } from "../logger/logger";

export const DEFAULT_FINANCIAL_HEALTH_CONFIG_DIR = fileURLToPath(
  new URL("../../../config/financial-health/", import.meta.url),
);

const ruleBase = {
  metricName: z.string().min(1),
  unit: z.string().default(""),
  insight: z.string().default(""),
  decimals: z.number().int().min(0).max(10).optional(),
};

const benchmarkRuleSchema = z.union([
  z
    .object({
      ...ruleBase,
      operator: z.enum(["GT", "LT", "GTE", "LTE", "APPROX"]),
      threshold: z.number().finite().optional(),
    })
    .strict(),
  z
    .object({
      ...ruleBase,
      operator: z.literal("RANGE"),
      low: z.number().finite().optional(),
      high: z.number().finite().optional(),
    })
    .strict(),
  z
    .object({
      ...ruleBase,
      operator: z.literal("CUSTOM"),
    })
    .strict(),
]);

const benchmarksFileSchema = z.object({
  benchmarks: z.array(benchmarkRuleSchema),
});

const sectionsFileSchema = z.object({
  sections: z.array(
    z.object({
      section: z.string().min(1),
      metrics: z.array(
        z.object({
          metric: z.string().min(1),
          dataKey: z.string().min(1),
        }),
      ),
    }),
  ),
});

export type FinancialHealthConfig = {
  sectionMap: SectionMetricMap;
  benchmarks: BenchmarkTable;
};

/**
 * Map-shaped view over the rule index with no mutators; the backing map never leaves this object.
 */
class FrozenBenchmarkTable implements ReadonlyMap<string, BenchmarkRule> {
  readonly #rules: Map<string, BenchmarkRule>;

  constructor(rules: Map<string, BenchmarkRule>) {
    this.#rules = rules;
    Object.freeze(this);
  }

  get size(): number {
    return this.#rules.size;
  }

  get(metricName: string): BenchmarkRule | undefined {
    return this.#rules.get(metricName);
  }

  has(metricName: string): boolean {
    return this.#rules.has(metricName);
  }

  forEach(
    callback: (rule: BenchmarkRule, metricName: string, table: ReadonlyMap<string, BenchmarkRule>) => void,
  ): void {
    this.#rules.forEach((rule, metricName) => callback(rule, metricName, this));
  }

  entries(): MapIterator<[string, BenchmarkRule]> {
    return this.#rules.entries();
  }

  keys(): MapIterator<string> {
    return this.#rules.keys();
  }

  values(): MapIterator<BenchmarkRule> {
    return this.#rules.values();
  }

  [Symbol.iterator](): MapIterator<[string, BenchmarkRule]> {
    return this.#rules[Symbol.iterator]();
  }
}

/**
 * Indexes rules by metric name. The first rule for a name wins; later duplicates are reported and skipped.
 */
export const toBenchmarkTable = (
  rules: readonly BenchmarkRule[],
): BenchmarkTable => {
  const table = new Map<string, BenchmarkRule>();

  for (const rule of rules) {
    if (table.has(rule.metricName)) {
      logger.warn(
        { metricName: rule.metricName },
        "Duplicate benchmark rule ignored",
      );
      continue;
    }
    table.set(rule.metricName, Object.freeze({ ...rule }));
  }

  return new FrozenBenchmarkTable(table);
};

const freezeSections = (
  sections: z.infer<typeof sectionsFileSchema>["sections"],
): SectionMetricMap =>
  Object.freeze(
    sections.map((section) =>
      Object.freeze({
        section: section.section,
        metrics: Object.freeze(
          section.metrics.map((entry) => Object.freeze({ ...entry })),
        ),
      }),
    ),
  );

const readJson = (filePath: string): unknown =>
  JSON.parse(readFileSync(filePath, "utf8"));

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/**
 * Reads and validates the benchmark table and section map from `dir`.
 * Throws on a malformed file: the service must not start with a broken taxonomy.
 */
export const loadFinancialHealthConfig = (
  dir: string = DEFAULT_FINANCIAL_HEALTH_CONFIG_DIR,
): FinancialHealthConfig => {
  const benchmarksPath = path.join(dir, "benchmarks.json");
  const sectionsPath = path.join(dir, "sections.json");

  const benchmarks = benchmarksFileSchema.safeParse(readJson(benchmarksPath));
  if (!benchmarks.success) {
    throw new Error(
      `Invalid benchmark config at ${benchmarksPath}: ${describeIssues(benchmarks.error)}`,
    );
  }

  const sections = sectionsFileSchema.safeParse(readJson(sectionsPath));
  if (!sections.success) {
    throw new Error(
      `Invalid section config at ${sectionsPath}: ${describeIssues(sections.error)}`,
    );
  }

  const config: FinancialHealthConfig = {
    sectionMap: freezeSections(sections.data.sections),
    benchmarks: toBenchmarkTable(benchmarks.data.benchmarks),
  };

  logger.debug(
    {
      dir,
      sectionCount: config.sectionMap.length,
      benchmarkCount: config.benchmarks.size,
    },
    "Financial health config loaded",
  );

  return config;
};

let cached: { dir: string; config: FinancialHealthConfig } | undefined;

/**
 * Process-wide configuration, loaded on first use and shared by reference afterwards.
 * Asking for a different directory once loaded is a wiring error and throws.
 */
export const financialHealthConfig = (dir?: string): FinancialHealthConfig => {
  const resolvedDir = path.resolve(dir || DEFAULT_FINANCIAL_HEALTH_CONFIG_DIR);
  if (!cached) {
    cached = { dir: resolvedDir, config: loadFinancialHealthConfig(resolvedDir) };
  } else if (cached.dir !== resolvedDir) {
    throw new Error(
      `Financial health config already loaded from ${cached.dir}; refusing to switch to ${resolvedDir}`,
    );
  }
  return cached.config;
};
