import { describe, expect, it } from "vitest";
import { CompanySyncService } from "./companySyncService";
import { MetricsSyncService } from "./metricsSyncService";
import {
  InMemoryCompanyRepository,
  InMemoryMetricsRepository,
  nothing,
  providerWith,
} from "./testSupport";

const setup = async (provider = providerWith({})) => {
  const companies = new InMemoryCompanyRepository();
  await new CompanySyncService(provider, companies).syncCompany("NVDA");
  const metrics = new InMemoryMetricsRepository();
  return {
    metrics,
    service: new MetricsSyncService(provider, companies, metrics),
  };
};

describe("MetricsSyncService", () => {
  it("stores key metrics and exposes the most recent period", async () => {
    const { metrics, service } = await setup();

    const result = await service.syncKeyMetrics("nvda");

    expect(result.isOk() && result.value).toHaveLength(4);
    const latest = await metrics.latestKeyMetrics("NVDA");
    expect(latest?.date).toBe("2024-12-30");
    expect(latest?.currentRatio).toBe(1.36);
    expect(latest?.grahamNumber).toBeNull();
  });

  it("stores financial ratios for the requested period", async () => {
    const { metrics, service } = await setup();

    const result = await service.syncFinancialRatios("NVDA", {
      period: "annual",
      limit: 1,
    });

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toHaveLength(1);
    expect(result.value[0]?.period).toBe("FY");
    expect(result.value[0]?.grossProfitMargin).toBe(0.7);
    expect((await metrics.latestFinancialRatios("NVDA"))?.fiscalYear).toBe("2024");
  });

  it("keeps one financial score row per company", async () => {
    const { metrics, service } = await setup();

    await service.syncFinancialScores("NVDA");
    const second = await service.syncFinancialScores("NVDA");

    expect(second.isOk() && second.value.altmanZScore).toBe(8.9);
    expect(second.isOk() && second.value.piotroskiScore).toBe(7);
    expect(metrics.scores.all()).toHaveLength(1);
  });

  it("returns not_found when upstream has no scores", async () => {
    const { service } = await setup(
      providerWith({ fetchFinancialScores: nothing }),
    );

    const result = await service.syncFinancialScores("NVDA");

    expect(result.isErr() && result.error.message).toBe(
      "Financial scores not found for symbol: NVDA",
    );
  });
});
