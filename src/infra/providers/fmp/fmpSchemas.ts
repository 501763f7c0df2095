import { z } from "zod";

/** Statement amounts: upstream omits or nulls lines a filer does not report. */
const amount = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

/** Ratios stay null when upstream cannot compute them. */
const ratio = z
  .number()
  .nullish()
  .transform((value) => value ?? null);

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const fiscalYear = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const periodicShape = {
  symbol: z.string().min(1),
  date: z.string().min(1),
  fiscalYear,
  period: z.string().min(1),
  reportedCurrency: optionalText,
};

export const fmpProfileSchema = z.object({
  symbol: z.string().min(1),
  companyName: z.string().min(1),
  marketCap: amount,
  currency: optionalText.transform((value) => value ?? "USD"),
  exchange: optionalText.transform((value) => value ?? ""),
  exchangeFullName: optionalText.transform((value) => value ?? ""),
  industry: optionalText,
  sector: optionalText,
  country: optionalText,
  website: optionalText,
  description: optionalText,
  ceo: optionalText,
  image: optionalText,
  ipoDate: optionalText,
  isActivelyTrading: z
    .boolean()
    .nullish()
    .transform((value) => value ?? true),
});

export const fmpIncomeStatementSchema = z.object({
  ...periodicShape,
  filingDate: optionalText,
  revenue: amount,
  costOfRevenue: amount,
  grossProfit: amount,
  researchAndDevelopmentExpenses: amount,
  sellingGeneralAndAdministrativeExpenses: amount,
  operatingExpenses: amount,
  operatingIncome: amount,
  interestExpense: amount,
  ebitda: amount,
  ebit: amount,
  incomeBeforeTax: amount,
  incomeTaxExpense: amount,
  netIncome: amount,
  eps: amount,
  epsDiluted: amount,
  weightedAverageShsOut: amount,
  weightedAverageShsOutDil: amount,
});

export const fmpBalanceSheetSchema = z.object({
  ...periodicShape,
  filingDate: optionalText,
  cashAndCashEquivalents: amount,
  shortTermInvestments: amount,
  netReceivables: amount,
  inventory: amount,
  totalCurrentAssets: amount,
  propertyPlantEquipmentNet: amount,
  goodwillAndIntangibleAssets: amount,
  totalAssets: amount,
  accountPayables: amount,
  shortTermDebt: amount,
  totalCurrentLiabilities: amount,
  longTermDebt: amount,
  totalLiabilities: amount,
  retainedEarnings: amount,
  totalStockholdersEquity: amount,
  totalEquity: amount,
  totalDebt: amount,
  netDebt: amount,
});

export const fmpCashFlowStatementSchema = z.object({
  ...periodicShape,
  filingDate: optionalText,
  netIncome: amount,
  depreciationAndAmortization: amount,
  stockBasedCompensation: amount,
  changeInWorkingCapital: amount,
  netCashProvidedByOperatingActivities: amount,
  investmentsInPropertyPlantAndEquipment: amount,
  netCashProvidedByInvestingActivities: amount,
  netDebtIssuance: amount,
  commonStockRepurchased: amount,
  netDividendsPaid: amount,
  netCashProvidedByFinancingActivities: amount,
  operatingCashFlow: amount,
  capitalExpenditure: amount,
  freeCashFlow: amount,
});

export const fmpKeyMetricsSchema = z.object({
  ...periodicShape,
  marketCap: ratio,
  enterpriseValue: ratio,
  evToSales: ratio,
  evToOperatingCashFlow: ratio,
  evToFreeCashFlow: ratio,
  evToEBITDA: ratio,
  netDebtToEBITDA: ratio,
  currentRatio: ratio,
  incomeQuality: ratio,
  grahamNumber: ratio,
  workingCapital: ratio,
  investedCapital: ratio,
  returnOnAssets: ratio,
  returnOnEquity: ratio,
  returnOnInvestedCapital: ratio,
  returnOnCapitalEmployed: ratio,
  returnOnTangibleAssets: ratio,
  earningsYield: ratio,
  freeCashFlowYield: ratio,
  capexToOperatingCashFlow: ratio,
  capexToRevenue: ratio,
  researchAndDevelopementToRevenue: ratio,
  stockBasedCompensationToRevenue: ratio,
  intangiblesToTotalAssets: ratio,
  daysOfSalesOutstanding: ratio,
  daysOfPayablesOutstanding: ratio,
  daysOfInventoryOutstanding: ratio,
  operatingCycle: ratio,
  cashConversionCycle: ratio,
  freeCashFlowToEquity: ratio,
  freeCashFlowToFirm: ratio,
});

export const fmpFinancialRatiosSchema = z.object({
  ...periodicShape,
  grossProfitMargin: ratio,
  ebitdaMargin: ratio,
  operatingProfitMargin: ratio,
  pretaxProfitMargin: ratio,
  netProfitMargin: ratio,
  receivablesTurnover: ratio,
  payablesTurnover: ratio,
  inventoryTurnover: ratio,
  fixedAssetTurnover: ratio,
  assetTurnover: ratio,
  currentRatio: ratio,
  quickRatio: ratio,
  solvencyRatio: ratio,
  cashRatio: ratio,
  priceToEarningsRatio: ratio,
  priceToEarningsGrowthRatio: ratio,
  priceToBookRatio: ratio,
  priceToSalesRatio: ratio,
  priceToFreeCashFlowRatio: ratio,
  debtToAssetsRatio: ratio,
  debtToEquityRatio: ratio,
  financialLeverageRatio: ratio,
  operatingCashFlowRatio: ratio,
  freeCashFlowOperatingCashFlowRatio: ratio,
  debtServiceCoverageRatio: ratio,
  interestCoverageRatio: ratio,
  capitalExpenditureCoverageRatio: ratio,
  dividendPaidAndCapexCoverageRatio: ratio,
  dividendPayoutRatio: ratio,
  dividendYield: ratio,
  effectiveTaxRate: ratio,
});

export const fmpFinancialScoresSchema = z.object({
  symbol: z.string().min(1),
  reportedCurrency: optionalText,
  altmanZScore: ratio,
  piotroskiScore: ratio,
  workingCapital: ratio,
  totalAssets: ratio,
  retainedEarnings: ratio,
  ebit: ratio,
  marketCap: ratio,
  totalLiabilities: ratio,
  revenue: ratio,
});

export const fmpPriceTargetConsensusSchema = z.object({
  symbol: z.string().min(1),
  targetHigh: ratio,
  targetLow: ratio,
  targetConsensus: ratio,
  targetMedian: ratio,
});

const parsePublisherList = (raw: string): string[] => {
  try {
    const decoded: unknown = JSON.parse(raw);
    if (Array.isArray(decoded)) {
      return decoded.filter((item): item is string => typeof item === "string");
    }
  } catch {
    // Not JSON: treat as an already comma-separated list.
  }
  return raw.split(",");
};

/**
 * Upstream sends publishers either as an array or as a JSON-encoded array string.
 */
const publishers = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const names = (typeof value === "string" ? parsePublisherList(value) : value)
      .map((name) => name.trim())
      .filter(Boolean);
    return names.length > 0 ? names.join(", ") : null;
  });

const count = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? 0);

export const fmpPriceTargetSummarySchema = z.object({
  symbol: z.string().min(1),
  lastMonthCount: count,
  lastMonthAvgPriceTarget: amount,
  lastQuarterCount: count,
  lastQuarterAvgPriceTarget: amount,
  lastYearCount: count,
  lastYearAvgPriceTarget: amount,
  allTimeCount: count,
  allTimeAvgPriceTarget: amount,
  publishers,
});

export const fmpErrorPayloadSchema = z.object({
  "Error Message": z.string(),
});
