import { err, ok } from "neverthrow";
import type { CompanyEntity } from "../../core/entities/company";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import type { CompanyRepositoryPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { notFound, type SyncResult } from "./syncSupport";

/**
 * Refreshes a company's profile; every other dataset requires this row to exist first.
 */
export class CompanySyncService {
  constructor(
    private readonly provider: MarketDataProviderPort,
    private readonly companies: CompanyRepositoryPort,
    private readonly logger: Logger = rootLogger.child({
      service: "company-sync",
    }),
  ) {}

  async syncCompany(symbol: string): Promise<SyncResult<CompanyEntity>> {
    const upper = symbol.toUpperCase();
    const profile = await this.provider.fetchCompanyProfile(upper);

    if (profile.isErr()) {
      this.logger.warn(
        { symbol: upper, code: profile.error.code, reason: profile.error.message },
        "Company profile fetch failed",
      );
      return err(profile.error);
    }

    if (!profile.value) {
      this.logger.info({ symbol: upper }, "Company profile not found upstream");
      return err(notFound("company", "Company", upper));
    }

    const company = await this.companies.upsert(profile.value);
    this.logger.info(
      { symbol: upper, companyId: company.id },
      "Company profile synced",
    );
    return ok(company);
  }
}
