export type ReportingPeriod = "annual" | "quarter";

/**
 * Identity shared by every periodic filing-derived row; `fiscalYear` + `period` form the natural key per company.
 */
export type PeriodicReport = {
  symbol: string;
  date: string;
  fiscalYear: string;
  period: string;
  reportedCurrency?: string;
  rawPayload: unknown;
};

export type IncomeStatement = PeriodicReport & {
  filingDate?: string;
  revenue: number;
  costOfRevenue: number;
  grossProfit: number;
  researchAndDevelopmentExpenses: number;
  sellingGeneralAndAdministrativeExpenses: number;
  operatingExpenses: number;
  operatingIncome: number;
  interestExpense: number;
  ebitda: number;
  ebit: number;
  incomeBeforeTax: number;
  incomeTaxExpense: number;
  netIncome: number;
  eps: number;
  epsDiluted: number;
  weightedAverageShsOut: number;
  weightedAverageShsOutDil: number;
};

export type BalanceSheet = PeriodicReport & {
  filingDate?: string;
  cashAndCashEquivalents: number;
  shortTermInvestments: number;
  netReceivables: number;
  inventory: number;
  totalCurrentAssets: number;
  propertyPlantEquipmentNet: number;
  goodwillAndIntangibleAssets: number;
  totalAssets: number;
  accountPayables: number;
  shortTermDebt: number;
  totalCurrentLiabilities: number;
  longTermDebt: number;
  totalLiabilities: number;
  retainedEarnings: number;
  totalStockholdersEquity: number;
  totalEquity: number;
  totalDebt: number;
  netDebt: number;
};

export type CashFlowStatement = PeriodicReport & {
  filingDate?: string;
  netIncome: number;
  depreciationAndAmortization: number;
  stockBasedCompensation: number;
  changeInWorkingCapital: number;
  netCashProvidedByOperatingActivities: number;
  investmentsInPropertyPlantAndEquipment: number;
  netCashProvidedByInvestingActivities: number;
  netDebtIssuance: number;
  commonStockRepurchased: number;
  netDividendsPaid: number;
  netCashProvidedByFinancingActivities: number;
  operatingCashFlow: number;
  capitalExpenditure: number;
  freeCashFlow: number;
};

/**
 * Rows as stored: provider payload plus the owning company and audit timestamps.
 */
export type Stored<T> = T & {
  id: number;
  companyId: number;
  createdAt: Date;
  updatedAt: Date;
};

export type CompanyScoped<T> = T & { companyId: number };
