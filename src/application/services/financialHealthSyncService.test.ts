import { describe, expect, it } from "vitest";
import { loadFinancialHealthConfig } from "../../shared/config/financialHealthConfig";
import { CompanySyncService } from "./companySyncService";
import {
  FinancialHealthSyncService,
  toMetricValues,
} from "./financialHealthSyncService";
import { MetricsSyncService } from "./metricsSyncService";
import {
  InMemoryCompanyRepository,
  InMemoryFinancialHealthRepository,
  InMemoryMetricsRepository,
  providerWith,
} from "./testSupport";

const config = loadFinancialHealthConfig();

const setup = async () => {
  const provider = providerWith({});
  const companies = new InMemoryCompanyRepository();
  const metrics = new InMemoryMetricsRepository();
  const health = new InMemoryFinancialHealthRepository();
  await new CompanySyncService(provider, companies).syncCompany("ADBE");
  return {
    companies,
    metrics,
    health,
    metricsSync: new MetricsSyncService(provider, companies, metrics),
    service: new FinancialHealthSyncService(companies, metrics, health, config),
  };
};

describe("toMetricValues", () => {
  it("drops non-scalar fields", () => {
    expect(
      toMetricValues({
        currentRatio: 1.2,
        period: "FY",
        quickRatio: null,
        createdAt: new Date(0),
        rawPayload: { a: 1 },
      }),
    ).toEqual({ currentRatio: 1.2, period: "FY", quickRatio: null });
  });
});

describe("FinancialHealthSyncService", () => {
  it("grades the latest metrics and ratios into one record per configured metric", async () => {
    const { metricsSync, service } = await setup();
    await metricsSync.syncKeyMetrics("ADBE");
    await metricsSync.syncFinancialRatios("ADBE");

    const result = await service.syncFinancialHealth("adbe");

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toHaveLength(52);

    const byMetric = new Map(result.value.map((row) => [row.metric, row]));
    expect(byMetric.get("Current Ratio")).toMatchObject({
      companyId: 1,
      symbol: "ADBE",
      section: "Liquidity & Solvency",
      benchmark: "1.0–2.0",
      value: "1.36",
      status: "healthy",
    });
    expect(byMetric.get("Gross Profit Margin")).toMatchObject({
      benchmark: "> 0.4",
      value: "0.7",
      status: "healthy",
    });
    expect(byMetric.get("Financial Leverage")).toMatchObject({
      benchmark: "~2×",
      value: "1.92",
      status: "healthy",
    });
    expect(byMetric.get("Days Sales Outstanding")).toMatchObject({
      benchmark: "< 45days",
      value: "74",
      status: "warning",
    });
    expect(byMetric.get("Price to Earnings")).toMatchObject({
      benchmark: "10–25×",
      value: "29.4",
      status: "warning",
    });
    expect(byMetric.get("Cash Ratio")).toMatchObject({
      value: "",
      status: "neutral",
    });
    expect(byMetric.get("Graham Number")).toMatchObject({
      benchmark: "See insight",
      status: "neutral",
    });
  });

  it("keeps the configured section order", async () => {
    const { metricsSync, service } = await setup();
    await metricsSync.syncKeyMetrics("ADBE");
    await metricsSync.syncFinancialRatios("ADBE");

    const result = await service.syncFinancialHealth("ADBE");

    const sections = result.isOk()
      ? [...new Set(result.value.map((row) => row.section))]
      : [];
    expect(sections).toEqual([
      "Profitability",
      "Returns",
      "Efficiency",
      "Liquidity & Solvency",
      "Valuation",
      "Cash Flow",
      "Dividends",
      "Other",
    ]);
  });

  it("overwrites the previous report on re-run", async () => {
    const { health, metricsSync, service } = await setup();
    await metricsSync.syncKeyMetrics("ADBE");
    await metricsSync.syncFinancialRatios("ADBE");

    await service.syncFinancialHealth("ADBE");
    await service.syncFinancialHealth("ADBE");

    expect(health.rows.size).toBe(52);
  });

  it("returns not_found when key metrics were never synced", async () => {
    const { metricsSync, service } = await setup();
    await metricsSync.syncFinancialRatios("ADBE");

    const result = await service.syncFinancialHealth("ADBE");

    if (result.isOk()) {
      throw new Error("expected not_found");
    }
    expect(result.error.code).toBe("not_found");
    expect(result.error.source).toBe("financial_health");
    expect(result.error.message).toBe("Key metrics not found for symbol: ADBE");
  });

  it("returns not_found when ratios were never synced", async () => {
    const { metricsSync, service } = await setup();
    await metricsSync.syncKeyMetrics("ADBE");

    const result = await service.syncFinancialHealth("ADBE");

    expect(result.isErr() && result.error.message).toBe(
      "Financial ratios not found for symbol: ADBE",
    );
  });

  it("returns not_found for an unknown company", async () => {
    const { service } = await setup();

    const result = await service.syncFinancialHealth("MISSING");

    expect(result.isErr() && result.error.message).toBe(
      "Company not found for symbol: MISSING",
    );
  });
});
