import { err, ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import { CompanySyncService } from "./companySyncService";
import {
  FIXED_NOW,
  InMemoryCompanyRepository,
  nothing,
  providerWith,
} from "./testSupport";

describe("CompanySyncService", () => {
  it("upserts the fetched profile under the upper-cased symbol", async () => {
    const companies = new InMemoryCompanyRepository();
    const service = new CompanySyncService(providerWith({}), companies);

    const result = await service.syncCompany("msft");

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.id).toBe(1);
    expect(result.value.symbol).toBe("MSFT");
    expect(result.value.companyName).toBe("MSFT Holdings Inc.");
    expect(result.value.createdAt).toEqual(FIXED_NOW);
    expect(companies.companies.size).toBe(1);
  });

  it("keeps the same row on a second sync", async () => {
    const companies = new InMemoryCompanyRepository();
    const service = new CompanySyncService(providerWith({}), companies);

    await service.syncCompany("MSFT");
    const second = await service.syncCompany("MSFT");

    expect(second.isOk() && second.value.id).toBe(1);
    expect(companies.companies.size).toBe(1);
  });

  it("returns not_found when upstream has no profile", async () => {
    const service = new CompanySyncService(
      providerWith({ fetchCompanyProfile: nothing }),
      new InMemoryCompanyRepository(),
    );

    const result = await service.syncCompany("zzzz");

    if (result.isOk()) {
      throw new Error("expected not_found");
    }
    expect(result.error.code).toBe("not_found");
    expect(result.error.message).toBe("Company not found for symbol: ZZZZ");
  });

  it("passes provider failures through untouched", async () => {
    const failure = {
      source: "market_data" as const,
      code: "rate_limited" as const,
      provider: "fmp",
      message: "FMP rate limit reached on profile.",
      retryable: true,
      httpStatus: 429,
    };
    const companies = new InMemoryCompanyRepository();
    const service = new CompanySyncService(
      providerWith({ fetchCompanyProfile: async () => err(failure) }),
      companies,
    );

    const result = await service.syncCompany("AAPL");

    expect(result.isErr() && result.error).toEqual(failure);
    expect(companies.companies.size).toBe(0);
  });

  it("stores profiles returned by a custom provider", async () => {
    const service = new CompanySyncService(
      providerWith({
        fetchCompanyProfile: async (symbol) =>
          ok({
            symbol,
            companyName: "Example Corp",
            marketCap: 1_000,
            currency: "EUR",
            exchange: "XETRA",
            exchangeFullName: "Deutsche Boerse Xetra",
            isActivelyTrading: false,
            rawPayload: { symbol },
          }),
      }),
      new InMemoryCompanyRepository(),
    );

    const result = await service.syncCompany("EXM");

    expect(result.isOk() && result.value.currency).toBe("EUR");
    expect(result.isOk() && result.value.isActivelyTrading).toBe(false);
  });
});
