import {
  boolean,
  date,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

const auditColumns = () => ({
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

const amount = (name: string) => doublePrecision(name).notNull().default(0);

const ratio = (name: string) => doublePrecision(name);

const companyReference = () =>
  integer("company_id")
    .notNull()
    .references(() => companiesTable.id, { onDelete: "cascade" });

/**
 * Identity columns shared by every filing-derived periodic table.
 */
const periodicColumns = () => ({
  id: serial("id").primaryKey(),
  companyId: companyReference(),
  symbol: text("symbol").notNull(),
  date: date("date", { mode: "string" }).notNull(),
  fiscalYear: text("fiscal_year").notNull(),
  period: text("period").notNull(),
  reportedCurrency: text("reported_currency"),
  rawPayload: jsonb("raw_payload").$type<unknown>().notNull(),
});

export const companiesTable = pgTable(
  "companies",
  {
    id: serial("id").primaryKey(),
    symbol: text("symbol").notNull(),
    companyName: text("company_name").notNull(),
    marketCap: amount("market_cap"),
    currency: text("currency").notNull(),
    exchange: text("exchange").notNull(),
    exchangeFullName: text("exchange_full_name").notNull(),
    industry: text("industry"),
    sector: text("sector"),
    country: text("country"),
    website: text("website"),
    description: text("description"),
    ceo: text("ceo"),
    image: text("image"),
    ipoDate: text("ipo_date"),
    isActivelyTrading: boolean("is_actively_trading").notNull().default(true),
    rawPayload: jsonb("raw_payload").$type<unknown>().notNull(),
    ...auditColumns(),
  },
  (table) => ({
    symbolIdx: uniqueIndex("companies_symbol_uidx").on(table.symbol),
  }),
);

export const incomeStatementsTable = pgTable(
  "company_income_statements",
  {
    ...periodicColumns(),
    filingDate: text("filing_date"),
    revenue: amount("revenue"),
    costOfRevenue: amount("cost_of_revenue"),
    grossProfit: amount("gross_profit"),
    researchAndDevelopmentExpenses: amount("research_and_development_expenses"),
    sellingGeneralAndAdministrativeExpenses: amount(
      "selling_general_and_administrative_expenses",
    ),
    operatingExpenses: amount("operating_expenses"),
    operatingIncome: amount("operating_income"),
    interestExpense: amount("interest_expense"),
    ebitda: amount("ebitda"),
    ebit: amount("ebit"),
    incomeBeforeTax: amount("income_before_tax"),
    incomeTaxExpense: amount("income_tax_expense"),
    netIncome: amount("net_income"),
    eps: amount("eps"),
    epsDiluted: amount("eps_diluted"),
    weightedAverageShsOut: amount("weighted_average_shs_out"),
    weightedAverageShsOutDil: amount("weighted_average_shs_out_dil"),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_income_statements_natural_uidx").on(
      table.companyId,
      table.fiscalYear,
      table.period,
    ),
  }),
);

export const balanceSheetsTable = pgTable(
  "company_balance_sheets",
  {
    ...periodicColumns(),
    filingDate: text("filing_date"),
    cashAndCashEquivalents: amount("cash_and_cash_equivalents"),
    shortTermInvestments: amount("short_term_investments"),
    netReceivables: amount("net_receivables"),
    inventory: amount("inventory"),
    totalCurrentAssets: amount("total_current_assets"),
    propertyPlantEquipmentNet: amount("property_plant_equipment_net"),
    goodwillAndIntangibleAssets: amount("goodwill_and_intangible_assets"),
    totalAssets: amount("total_assets"),
    accountPayables: amount("account_payables"),
    shortTermDebt: amount("short_term_debt"),
    totalCurrentLiabilities: amount("total_current_liabilities"),
    longTermDebt: amount("long_term_debt"),
    totalLiabilities: amount("total_liabilities"),
    retainedEarnings: amount("retained_earnings"),
    totalStockholdersEquity: amount("total_stockholders_equity"),
    totalEquity: amount("total_equity"),
    totalDebt: amount("total_debt"),
    netDebt: amount("net_debt"),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_balance_sheets_natural_uidx").on(
      table.companyId,
      table.fiscalYear,
      table.period,
    ),
  }),
);

export const cashFlowStatementsTable = pgTable(
  "company_cash_flow_statements",
  {
    ...periodicColumns(),
    filingDate: text("filing_date"),
    netIncome: amount("net_income"),
    depreciationAndAmortization: amount("depreciation_and_amortization"),
    stockBasedCompensation: amount("stock_based_compensation"),
    changeInWorkingCapital: amount("change_in_working_capital"),
    netCashProvidedByOperatingActivities: amount(
      "net_cash_provided_by_operating_activities",
    ),
    investmentsInPropertyPlantAndEquipment: amount(
      "investments_in_property_plant_and_equipment",
    ),
    netCashProvidedByInvestingActivities: amount(
      "net_cash_provided_by_investing_activities",
    ),
    netDebtIssuance: amount("net_debt_issuance"),
    commonStockRepurchased: amount("common_stock_repurchased"),
    netDividendsPaid: amount("net_dividends_paid"),
    netCashProvidedByFinancingActivities: amount(
      "net_cash_provided_by_financing_activities",
    ),
    operatingCashFlow: amount("operating_cash_flow"),
    capitalExpenditure: amount("capital_expenditure"),
    freeCashFlow: amount("free_cash_flow"),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_cash_flow_statements_natural_uidx").on(
      table.companyId,
      table.fiscalYear,
      table.period,
    ),
  }),
);

export const keyMetricsTable = pgTable(
  "company_key_metrics",
  {
    ...periodicColumns(),
    marketCap: ratio("market_cap"),
    enterpriseValue: ratio("enterprise_value"),
    evToSales: ratio("ev_to_sales"),
    evToOperatingCashFlow: ratio("ev_to_operating_cash_flow"),
    evToFreeCashFlow: ratio("ev_to_free_cash_flow"),
    evToEBITDA: ratio("ev_to_ebitda"),
    netDebtToEBITDA: ratio("net_debt_to_ebitda"),
    currentRatio: ratio("current_ratio"),
    incomeQuality: ratio("income_quality"),
    grahamNumber: ratio("graham_number"),
    workingCapital: ratio("working_capital"),
    investedCapital: ratio("invested_capital"),
    returnOnAssets: ratio("return_on_assets"),
    returnOnEquity: ratio("return_on_equity"),
    returnOnInvestedCapital: ratio("return_on_invested_capital"),
    returnOnCapitalEmployed: ratio("return_on_capital_employed"),
    returnOnTangibleAssets: ratio("return_on_tangible_assets"),
    earningsYield: ratio("earnings_yield"),
    freeCashFlowYield: ratio("free_cash_flow_yield"),
    capexToOperatingCashFlow: ratio("capex_to_operating_cash_flow"),
    capexToRevenue: ratio("capex_to_revenue"),
    researchAndDevelopementToRevenue: ratio(
      "research_and_developement_to_revenue",
    ),
    stockBasedCompensationToRevenue: ratio(
      "stock_based_compensation_to_revenue",
    ),
    intangiblesToTotalAssets: ratio("intangibles_to_total_assets"),
    daysOfSalesOutstanding: ratio("days_of_sales_outstanding"),
    daysOfPayablesOutstanding: ratio("days_of_payables_outstanding"),
    daysOfInventoryOutstanding: ratio("days_of_inventory_outstanding"),
    operatingCycle: ratio("operating_cycle"),
    cashConversionCycle: ratio("cash_conversion_cycle"),
    freeCashFlowToEquity: ratio("free_cash_flow_to_equity"),
    freeCashFlowToFirm: ratio("free_cash_flow_to_firm"),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_key_metrics_natural_uidx").on(
      table.companyId,
      table.fiscalYear,
      table.period,
    ),
    symbolDateIdx: index("company_key_metrics_symbol_date_idx").on(
      table.symbol,
      table.date,
    ),
  }),
);

export const financialRatiosTable = pgTable(
  "company_financial_ratios",
  {
    ...periodicColumns(),
    grossProfitMargin: ratio("gross_profit_margin"),
    ebitdaMargin: ratio("ebitda_margin"),
    operatingProfitMargin: ratio("operating_profit_margin"),
    pretaxProfitMargin: ratio("pretax_profit_margin"),
    netProfitMargin: ratio("net_profit_margin"),
    receivablesTurnover: ratio("receivables_turnover"),
    payablesTurnover: ratio("payables_turnover"),
    inventoryTurnover: ratio("inventory_turnover"),
    fixedAssetTurnover: ratio("fixed_asset_turnover"),
    assetTurnover: ratio("asset_turnover"),
    currentRatio: ratio("current_ratio"),
    quickRatio: ratio("quick_ratio"),
    solvencyRatio: ratio("solvency_ratio"),
    cashRatio: ratio("cash_ratio"),
    priceToEarningsRatio: ratio("price_to_earnings_ratio"),
    priceToEarningsGrowthRatio: ratio("price_to_earnings_growth_ratio"),
    priceToBookRatio: ratio("price_to_book_ratio"),
    priceToSalesRatio: ratio("price_to_sales_ratio"),
    priceToFreeCashFlowRatio: ratio("price_to_free_cash_flow_ratio"),
    debtToAssetsRatio: ratio("debt_to_assets_ratio"),
    debtToEquityRatio: ratio("debt_to_equity_ratio"),
    financialLeverageRatio: ratio("financial_leverage_ratio"),
    operatingCashFlowRatio: ratio("operating_cash_flow_ratio"),
    freeCashFlowOperatingCashFlowRatio: ratio(
      "free_cash_flow_operating_cash_flow_ratio",
    ),
    debtServiceCoverageRatio: ratio("debt_service_coverage_ratio"),
    interestCoverageRatio: ratio("interest_coverage_ratio"),
    capitalExpenditureCoverageRatio: ratio("capital_expenditure_coverage_ratio"),
    dividendPaidAndCapexCoverageRatio: ratio(
      "dividend_paid_and_capex_coverage_ratio",
    ),
    dividendPayoutRatio: ratio("dividend_payout_ratio"),
    dividendYield: ratio("dividend_yield"),
    effectiveTaxRate: ratio("effective_tax_rate"),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_financial_ratios_natural_uidx").on(
      table.companyId,
      table.fiscalYear,
      table.period,
    ),
    symbolDateIdx: index("company_financial_ratios_symbol_date_idx").on(
      table.symbol,
      table.date,
    ),
  }),
);

export const financialScoresTable = pgTable(
  "company_financial_scores",
  {
    id: serial("id").primaryKey(),
    companyId: companyReference(),
    symbol: text("symbol").notNull(),
    reportedCurrency: text("reported_currency"),
    altmanZScore: ratio("altman_z_score"),
    piotroskiScore: ratio("piotroski_score"),
    workingCapital: ratio("working_capital"),
    totalAssets: ratio("total_assets"),
    retainedEarnings: ratio("retained_earnings"),
    ebit: ratio("ebit"),
    marketCap: ratio("market_cap"),
    totalLiabilities: ratio("total_liabilities"),
    revenue: ratio("revenue"),
    rawPayload: jsonb("raw_payload").$type<unknown>().notNull(),
    ...auditColumns(),
  },
  (table) => ({
    companyIdx: uniqueIndex("company_financial_scores_company_uidx").on(
      table.companyId,
    ),
  }),
);

export const priceTargetsTable = pgTable(
  "company_price_targets",
  {
    id: serial("id").primaryKey(),
    companyId: companyReference(),
    symbol: text("symbol").notNull(),
    targetHigh: ratio("target_high"),
    targetLow: ratio("target_low"),
    targetConsensus: ratio("target_consensus"),
    targetMedian: ratio("target_median"),
    rawPayload: jsonb("raw_payload").$type<unknown>().notNull(),
    ...auditColumns(),
  },
  (table) => ({
    companyIdx: uniqueIndex("company_price_targets_company_uidx").on(
      table.companyId,
    ),
  }),
);

export const priceTargetSummariesTable = pgTable(
  "company_price_target_summaries",
  {
    id: serial("id").primaryKey(),
    companyId: companyReference(),
    symbol: text("symbol").notNull(),
    lastMonthCount: integer("last_month_count").notNull().default(0),
    lastMonthAvgPriceTarget: amount("last_month_avg_price_target"),
    lastQuarterCount: integer("last_quarter_count").notNull().default(0),
    lastQuarterAvgPriceTarget: amount("last_quarter_avg_price_target"),
    lastYearCount: integer("last_year_count").notNull().default(0),
    lastYearAvgPriceTarget: amount("last_year_avg_price_target"),
    allTimeCount: integer("all_time_count").notNull().default(0),
    allTimeAvgPriceTarget: amount("all_time_avg_price_target"),
    publishers: text("publishers"),
    rawPayload: jsonb("raw_payload").$type<unknown>().notNull(),
    ...auditColumns(),
  },
  (table) => ({
    companyIdx: uniqueIndex("company_price_target_summaries_company_uidx").on(
      table.companyId,
    ),
  }),
);

export const financialHealthTable = pgTable(
  "company_financial_health",
  {
    id: serial("id").primaryKey(),
    companyId: companyReference(),
    symbol: text("symbol").notNull(),
    section: text("section").notNull(),
    metric: text("metric").notNull(),
    benchmark: text("benchmark").notNull(),
    value: text("value").notNull(),
    status: text("status", { enum: ["healthy", "warning", "neutral"] }).notNull(),
    insight: text("insight").notNull(),
    ...auditColumns(),
  },
  (table) => ({
    naturalIdx: uniqueIndex("company_financial_health_natural_uidx").on(
      table.symbol,
      table.section,
      table.metric,
    ),
  }),
);
