import type { HealthRecord, HealthStatus } from "../core/entities/financialHealth";

const STATUS_MARKERS: Record<HealthStatus, string> = {
  healthy: "[ok]  ",
  warning: "[warn]",
  neutral: "[--]  ",
};

/**
 * Formats health records into a compact terminal report grouped by section.
 */
export const formatHealthReport = (
  symbol: string,
  records: readonly HealthRecord[],
): string => {
  const lines: string[] = [`Financial health for ${symbol}`];
  let currentSection: string | undefined;

  for (const record of records) {
    if (record.section !== currentSection) {
      currentSection = record.section;
      lines.push("", `${record.section}:`);
    }
    const benchmark = record.benchmark ? ` (benchmark ${record.benchmark})` : "";
    lines.push(
      `${STATUS_MARKERS[record.status]} ${record.metric}: ${record.value || "n/a"}${benchmark}`,
    );
  }

  const count = (status: HealthStatus) =>
    records.filter((record) => record.status === status).length;
  lines.push(
    "",
    `healthy=${count("healthy")} warning=${count("warning")} neutral=${count("neutral")}`,
  );

  return lines.join("\n");
};
