import { err } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { PeriodicRequest } from "../../core/ports/inboundPorts";
import { MockMarketDataProvider } from "../../infra/providers/mocks/mockMarketDataProvider";
import { CompanySyncService } from "./companySyncService";
import { FinancialStatementsSyncService } from "./financialStatementsSyncService";
import {
  emptyList,
  InMemoryCompanyRepository,
  InMemoryFinancialStatementsRepository,
  providerWith,
} from "./testSupport";

const seededCompanies = async (symbol: string) => {
  const companies = new InMemoryCompanyRepository();
  await new CompanySyncService(providerWith({}), companies).syncCompany(symbol);
  return companies;
};

describe("FinancialStatementsSyncService", () => {
  it("fetches with the requested period and limit and attaches the company id", async () => {
    const requests: PeriodicRequest[] = [];
    const mock = new MockMarketDataProvider();
    const statements = new InMemoryFinancialStatementsRepository();
    const service = new FinancialStatementsSyncService(
      providerWith({
        fetchIncomeStatements: (request) => {
          requests.push(request);
          return mock.fetchIncomeStatements(request);
        },
      }),
      await seededCompanies("AAPL"),
      statements,
    );

    const result = await service.syncIncomeStatements("aapl", {
      period: "annual",
      limit: 2,
    });

    expect(requests).toEqual([{ symbol: "AAPL", period: "annual", limit: 2 }]);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.map((row) => [row.companyId, row.fiscalYear, row.period])).toEqual([
      [1, "2024", "FY"],
      [1, "2023", "FY"],
    ]);
    expect(result.value[0]?.revenue).toBe(60_000_000_000);
    expect(result.value[1]?.revenue).toBe(57_000_000_000);
  });

  it("defaults to quarterly periods", async () => {
    const statements = new InMemoryFinancialStatementsRepository();
    const service = new FinancialStatementsSyncService(
      providerWith({}),
      await seededCompanies("AAPL"),
      statements,
    );

    const result = await service.syncBalanceSheets("AAPL");

    expect(result.isOk() && result.value.map((row) => row.period)).toEqual([
      "Q4",
      "Q3",
      "Q2",
      "Q1",
    ]);
  });

  it("overwrites rows with the same fiscal period instead of duplicating them", async () => {
    const statements = new InMemoryFinancialStatementsRepository();
    const service = new FinancialStatementsSyncService(
      providerWith({}),
      await seededCompanies("AAPL"),
      statements,
    );

    await service.syncCashFlowStatements("AAPL", { period: "annual", limit: 3 });
    await service.syncCashFlowStatements("AAPL", { period: "annual", limit: 3 });

    expect(statements.cashFlow.all()).toHaveLength(3);
  });

  it("returns not_found for a company that was never synced", async () => {
    const service = new FinancialStatementsSyncService(
      providerWith({}),
      new InMemoryCompanyRepository(),
      new InMemoryFinancialStatementsRepository(),
    );

    const result = await service.syncIncomeStatements("NOPE");

    expect(result.isErr() && result.error.message).toBe(
      "Company not found for symbol: NOPE",
    );
  });

  it("returns not_found when upstream has no rows", async () => {
    const statements = new InMemoryFinancialStatementsRepository();
    const service = new FinancialStatementsSyncService(
      providerWith({ fetchBalanceSheets: emptyList }),
      await seededCompanies("AAPL"),
      statements,
    );

    const result = await service.syncBalanceSheets("AAPL");

    if (result.isOk()) {
      throw new Error("expected not_found");
    }
    expect(result.error.code).toBe("not_found");
    expect(result.error.message).toBe("Balance sheets not found for symbol: AAPL");
    expect(statements.balance.all()).toEqual([]);
  });

  it("propagates provider errors", async () => {
    const service = new FinancialStatementsSyncService(
      providerWith({
        fetchCashFlowStatements: async () =>
          err({
            source: "market_data",
            code: "timeout",
            provider: "fmp",
            message: "FMP cash-flow-statement request timed out.",
            retryable: true,
          }),
      }),
      await seededCompanies("AAPL"),
      new InMemoryFinancialStatementsRepository(),
    );

    const result = await service.syncCashFlowStatements("AAPL");

    expect(result.isErr() && result.error.code).toBe("timeout");
  });
});
