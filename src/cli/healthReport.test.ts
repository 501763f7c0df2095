import { describe, expect, it } from "vitest";
import { formatHealthReport } from "./healthReport";

describe("formatHealthReport", () => {
  it("groups records by section and counts statuses", () => {
    const report = formatHealthReport("AAPL", [
      {
        section: "Liquidity & Solvency",
        metric: "Current Ratio",
        benchmark: "1.0–2.0",
        value: "1.36",
        status: "healthy",
        insight: "",
      },
      {
        section: "Liquidity & Solvency",
        metric: "Cash Ratio",
        benchmark: "> 0.2",
        value: "",
        status: "neutral",
        insight: "",
      },
      {
        section: "Valuation",
        metric: "Price to Earnings",
        benchmark: "10–25×",
        value: "29.4",
        status: "warning",
        insight: "",
      },
      {
        section: "Other",
        metric: "R&D to Revenue",
        benchmark: "",
        value: "0.07",
        status: "neutral",
        insight: "",
      },
    ]);

    expect(report.split("\n")).toEqual([
      "Financial health for AAPL",
      "",
      "Liquidity & Solvency:",
      "[ok]   Current Ratio: 1.36 (benchmark 1.0–2.0)",
      "[--]   Cash Ratio: n/a (benchmark > 0.2)",
      "",
      "Valuation:",
      "[warn] Price to Earnings: 29.4 (benchmark 10–25×)",
      "",
      "Other:",
      "[--]   R&D to Revenue: 0.07",
      "",
      "healthy=1 warning=1 neutral=2",
    ]);
  });
});
