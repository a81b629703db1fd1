export interface GrowthPeriod {
    growthRate: number; // e.g. 0.20 for 20%
    margin: number;     // FCF margin (0-1 range)
}

export type GrowthSchedule = readonly GrowthPeriod[];

export interface ValuationInputs {
    baseRevenue: number; // Period 0
    schedule: GrowthSchedule; // Horizon = schedule.length
    discountRate: number; // WACC
    terminalGrowthRate: number;
    netDebt: number; // Negative = net cash
    sharesOutstanding: number;
    currentPrice?: number; // Only used for upside reporting
}

export interface ProjectedPeriod {
    period: number; // 1..horizon
    revenue: number;
    freeCashFlow: number;
}

export interface DiscountedFlow {
    period: number;
    cashFlow: number;
    discountFactor: number; // 1 / (1 + r)^t
    presentValue: number;
}

export interface DiscountResult {
    flows: readonly DiscountedFlow[];
    terminalValue: number; // Gordon growth, at end of horizon
    discountedTerminalValue: number;
}

export interface ValuationResult {
    enterpriseValue: number;
    equityValue: number;
    impliedSharePrice: number;

    discountRate: number;
    terminalGrowthRate: number;

    sumOfPresentValues: number;
    discountedTerminalValue: number;
    terminalValueShare: number; // PV(TV) / EV
    currentPrice: number | null;
    upsidePct: number | null;   // null without a positive current price
}

export interface SensitivityCell {
    discountRate: number;
    terminalGrowthRate: number;
    impliedSharePrice: number | null; // null = invalid rate pair (r <= g)
}

export interface SensitivityGrid {
    discountRates: readonly number[];
    terminalGrowthRates: readonly number[];
    cells: readonly (readonly SensitivityCell[])[]; // cells[i][j] -> discountRates[i] x terminalGrowthRates[j]
}

export interface ValuationReport {
    inputs: Readonly<ValuationInputs>;
    projection: readonly ProjectedPeriod[];
    discount: DiscountResult;
    valuation: ValuationResult;
    sensitivity: SensitivityGrid | null;
}

// ============ COST OF CAPITAL ============

export interface CapmInputs {
    riskFreeRate: number;
    beta: number;
    marketRiskPremium: number;
}

export interface WaccInputs extends CapmInputs {
    costOfDebt: number; // Pre-tax
    taxRate: number;
    debtWeight: number;
    equityWeight?: number; // Defaults to 1 - debtWeight
}

export interface WaccResult {
    costOfEquity: number;
    afterTaxCostOfDebt: number;
    wacc: number;
}

// ============ SEGMENT FORECAST ============

export interface SegmentAssumption {
    name: string;
    revenue: number;
    growthRate: number;
    diversification?: number[]; // Per-year multiplier, missing years = 1
}

export interface SegmentModel {
    segments: SegmentAssumption[];
    revenue: number;   // Total revenue of the base period
    netIncome: number; // Net income of the base period
    grossMargin: number;
    grossMarginStep: number;  // Yearly compression
    grossMarginFloor: number;
}

export interface SegmentForecastYear {
    year: number;
    totalRevenue: number;
    grossMargin: number;
    netIncome: number;
    segments: { name: string; revenue: number; sharePct: number }[];
}
