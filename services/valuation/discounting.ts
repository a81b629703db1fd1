/**
 * Discounting Engine
 *
 * Present values of explicit-period flows plus a Gordon growth terminal value.
 * The terminal value is treated as realised at the end of the explicit horizon,
 * so it is discounted by the same power as the final period.
 *
 * No rounding here. Formatting belongs to the report layer.
 */

import type { DiscountedFlow, DiscountResult } from '../../src/types/valuation';
import { ValuationError } from '../utils/errors';

export const presentValue = (amount: number, rate: number, period: number): number =>
    amount / Math.pow(1 + rate, period);

export function assertRateRelationship(discountRate: number, terminalGrowthRate: number): void {
    if (!Number.isFinite(discountRate) || !Number.isFinite(terminalGrowthRate)) {
        throw new ValuationError('INVALID_RATE_RELATIONSHIP', 'Discount rate and terminal growth rate must be finite numbers');
    }
    if (discountRate <= -1) {
        throw new ValuationError('INVALID_RATE_RELATIONSHIP', `Discount rate ${discountRate} must be greater than -1`);
    }
    // r <= g makes the perpetuity diverge (or flip sign)
    if (discountRate <= terminalGrowthRate) {
        throw new ValuationError(
            'INVALID_RATE_RELATIONSHIP',
            `Discount rate (${discountRate}) must exceed terminal growth rate (${terminalGrowthRate})`
        );
    }
}

export function terminalValue(finalCashFlow: number, discountRate: number, terminalGrowthRate: number): number {
    assertRateRelationship(discountRate, terminalGrowthRate);
    return finalCashFlow * (1 + terminalGrowthRate) / (discountRate - terminalGrowthRate);
}

export function discount(
    cashFlows: readonly number[],
    discountRate: number,
    terminalGrowthRate: number
): DiscountResult {
    assertRateRelationship(discountRate, terminalGrowthRate);
    if (cashFlows.length === 0) {
        throw new ValuationError('INVALID_SCHEDULE', 'At least one cash flow is required to discount');
    }

    const flows = cashFlows.map((cashFlow, index): DiscountedFlow => {
        const period = index + 1;
        const discountFactor = 1 / Math.pow(1 + discountRate, period);
        return Object.freeze({
            period,
            cashFlow,
            discountFactor,
            presentValue: presentValue(cashFlow, discountRate, period)
        });
    });

    const horizon = cashFlows.length;
    const tv = terminalValue(cashFlows[horizon - 1], discountRate, terminalGrowthRate);

    return Object.freeze({
        flows: Object.freeze(flows),
        terminalValue: tv,
        discountedTerminalValue: presentValue(tv, discountRate, horizon)
    });
}
