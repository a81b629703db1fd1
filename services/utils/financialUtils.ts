/**
 * Calculates simple period-over-period growth.
 * Returns null if the previous value is not positive or data is missing.
 */
export function calcGrowthRate(current: number, previous: number): number | null {
    if (!Number.isFinite(current) || !Number.isFinite(previous)) return null;
    if (previous <= 0) return null;
    return current / previous - 1;
}

/**
 * Spreads one observed growth figure over several years (geometric mean).
 * e.g. +78% over 2 years -> ~33.4% per year
 */
export function annualiseGrowth(totalGrowth: number, years: number): number | null {
    if (years <= 0 || totalGrowth <= -1) return null;
    return Math.pow(1 + totalGrowth, 1 / years) - 1;
}

/**
 * Annualised growth across a revenue history (oldest first).
 * Needs at least two points and a positive first value.
 */
export function historicalGrowth(revenues: readonly number[]): number | null {
    if (revenues.length < 2) return null;
    const totalGrowth = calcGrowthRate(revenues[revenues.length - 1], revenues[0]);
    if (totalGrowth === null) return null;
    return annualiseGrowth(totalGrowth, revenues.length - 1);
}

/**
 * Net Debt = Total Debt - Cash & Equivalents
 * Negative result is a net cash position.
 */
export function calcNetDebt(balance: { totalDebt: number; cash: number }): number {
    return balance.totalDebt - balance.cash;
}

/**
 * Upside / downside vs. current market price, as a percentage.
 * Returns null without a usable market price.
 */
export function calcUpside(impliedPrice: number, currentPrice: number): number | null {
    if (!Number.isFinite(currentPrice) || currentPrice <= 0) return null;
    return (impliedPrice / currentPrice - 1) * 100;
}
