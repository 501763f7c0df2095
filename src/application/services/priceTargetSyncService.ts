import type { Stored } from "../../core/entities/financialStatement";
import type {
  PriceTargetConsensus,
  PriceTargetSummary,
} from "../../core/entities/priceTarget";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import type {
  CompanyRepositoryPort,
  PriceTargetRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { singleDataset, syncDataset, type SyncResult } from "./syncSupport";

/**
 * Syncs analyst price-target consensus and the per-window summary.
 */
export class PriceTargetSyncService {
  constructor(
    private readonly provider: MarketDataProviderPort,
    private readonly companies: CompanyRepositoryPort,
    private readonly priceTargets: PriceTargetRepositoryPort,
    private readonly logger: Logger = rootLogger.child({
      service: "price-target-sync",
    }),
  ) {}

  async syncPriceTarget(
    symbol: string,
  ): Promise<SyncResult<Stored<PriceTargetConsensus>>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      singleDataset(
        "Price target",
        () => this.provider.fetchPriceTargetConsensus(upper),
        (row) => this.priceTargets.upsertConsensus(row),
      ),
    );
  }

  async syncPriceTargetSummary(
    symbol: string,
  ): Promise<SyncResult<Stored<PriceTargetSummary>>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      singleDataset(
        "Price target summary",
        () => this.provider.fetchPriceTargetSummary(upper),
        (row) => this.priceTargets.upsertSummary(row),
      ),
    );
  }
}
