import type { PeriodicReport } from "./financialStatement";

/**
 * Nullable because upstream leaves ratios blank whenever a denominator is zero or unreported.
 */
type MetricValue = number | null;

export type KeyMetrics = PeriodicReport & {
  marketCap: MetricValue;
  enterpriseValue: MetricValue;
  evToSales: MetricValue;
  evToOperatingCashFlow: MetricValue;
  evToFreeCashFlow: MetricValue;
  evToEBITDA: MetricValue;
  netDebtToEBITDA: MetricValue;
  currentRatio: MetricValue;
  incomeQuality: MetricValue;
  grahamNumber: MetricValue;
  workingCapital: MetricValue;
  investedCapital: MetricValue;
  returnOnAssets: MetricValue;
  returnOnEquity: MetricValue;
  returnOnInvestedCapital: MetricValue;
  returnOnCapitalEmployed: MetricValue;
  returnOnTangibleAssets: MetricValue;
  earningsYield: MetricValue;
  freeCashFlowYield: MetricValue;
  capexToOperatingCashFlow: MetricValue;
  capexToRevenue: MetricValue;
  researchAndDevelopementToRevenue: MetricValue;
  stockBasedCompensationToRevenue: MetricValue;
  intangiblesToTotalAssets: MetricValue;
  daysOfSalesOutstanding: MetricValue;
  daysOfPayablesOutstanding: MetricValue;
  daysOfInventoryOutstanding: MetricValue;
  operatingCycle: MetricValue;
  cashConversionCycle: MetricValue;
  freeCashFlowToEquity: MetricValue;
  freeCashFlowToFirm: MetricValue;
};

export type FinancialRatios = PeriodicReport & {
  grossProfitMargin: MetricValue;
  ebitdaMargin: MetricValue;
  operatingProfitMargin: MetricValue;
  pretaxProfitMargin: MetricValue;
  netProfitMargin: MetricValue;
  receivablesTurnover: MetricValue;
  payablesTurnover: MetricValue;
  inventoryTurnover: MetricValue;
  fixedAssetTurnover: MetricValue;
  assetTurnover: MetricValue;
  currentRatio: MetricValue;
  quickRatio: MetricValue;
  solvencyRatio: MetricValue;
  cashRatio: MetricValue;
  priceToEarningsRatio: MetricValue;
  priceToEarningsGrowthRatio: MetricValue;
  priceToBookRatio: MetricValue;
  priceToSalesRatio: MetricValue;
  priceToFreeCashFlowRatio: MetricValue;
  debtToAssetsRatio: MetricValue;
  debtToEquityRatio: MetricValue;
  financialLeverageRatio: MetricValue;
  operatingCashFlowRatio: MetricValue;
  freeCashFlowOperatingCashFlowRatio: MetricValue;
  debtServiceCoverageRatio: MetricValue;
  interestCoverageRatio: MetricValue;
  capitalExpenditureCoverageRatio: MetricValue;
  dividendPaidAndCapexCoverageRatio: MetricValue;
  dividendPayoutRatio: MetricValue;
  dividendYield: MetricValue;
  effectiveTaxRate: MetricValue;
};

export type FinancialScores = {
  symbol: string;
  reportedCurrency?: string;
  altmanZScore: MetricValue;
  piotroskiScore: MetricValue;
  workingCapital: MetricValue;
  totalAssets: MetricValue;
  retainedEarnings: MetricValue;
  ebit: MetricValue;
  marketCap: MetricValue;
  totalLiabilities: MetricValue;
  revenue: MetricValue;
  rawPayload: unknown;
};
