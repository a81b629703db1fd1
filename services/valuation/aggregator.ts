import type { DiscountResult, ValuationResult } from '../../src/types/valuation';
import { ValuationError } from '../utils/errors';
import { calcUpside } from '../utils/financialUtils';

export function assertShareCount(sharesOutstanding: number): void {
    if (!Number.isFinite(sharesOutstanding) || sharesOutstanding <= 0) {
        throw new ValuationError('INVALID_SHARE_COUNT', `Shares outstanding must be positive (got ${sharesOutstanding})`);
    }
}

/**
 * Enterprise value -> equity value -> implied share price.
 * Negative net debt is net cash and adds to equity value.
 */
export function aggregate(
    discounted: DiscountResult,
    netDebt: number,
    sharesOutstanding: number,
    rates: { discountRate: number; terminalGrowthRate: number },
    currentPrice?: number
): ValuationResult {
    assertShareCount(sharesOutstanding);

    const sumOfPresentValues = discounted.flows.reduce((sum, f) => sum + f.presentValue, 0);
    const enterpriseValue = sumOfPresentValues + discounted.discountedTerminalValue;
    const equityValue = enterpriseValue - netDebt;
    const impliedSharePrice = equityValue / sharesOutstanding;

    return Object.freeze({
        enterpriseValue,
        equityValue,
        impliedSharePrice,
        discountRate: rates.discountRate,
        terminalGrowthRate: rates.terminalGrowthRate,
        sumOfPresentValues,
        discountedTerminalValue: discounted.discountedTerminalValue,
        terminalValueShare: enterpriseValue !== 0 ? discounted.discountedTerminalValue / enterpriseValue : 0,
        currentPrice: currentPrice ?? null,
        upsidePct: currentPrice !== undefined ? calcUpside(impliedSharePrice, currentPrice) : null
    });
}
