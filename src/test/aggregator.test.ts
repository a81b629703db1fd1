import { describe, it, expect } from 'vitest';
import { aggregate } from '../../services/valuation/aggregator';
import { discount } from '../../services/valuation/discounting';
import { isValuationError } from '../../services/utils/errors';

const RATES = { discountRate: 0.10, terminalGrowthRate: 0.03 };

describe('ValuationAggregator', () => {
    const discounted = discount([42], RATES.discountRate, RATES.terminalGrowthRate);

    it('should roll the reference scenario into a per-share value', () => {
        const result = aggregate(discounted, 0, 10, RATES);

        expect(result.sumOfPresentValues).toBeCloseTo(38.18, 2);
        expect(result.enterpriseValue).toBeCloseTo(600, 8);
        expect(result.equityValue).toBeCloseTo(600, 8);
        expect(result.impliedSharePrice).toBeCloseTo(60, 8);
        expect(result.discountRate).toBe(0.10);
        expect(result.terminalGrowthRate).toBe(0.03);
        expect(result.currentPrice).toBeNull();
        expect(result.upsidePct).toBeNull();
    });

    it('should subtract net debt from enterprise value', () => {
        const result = aggregate(discounted, 100, 10, RATES);
        expect(result.equityValue).toBeCloseTo(500, 8);
        expect(result.impliedSharePrice).toBeCloseTo(50, 8);
    });

    it('should raise equity value for a net cash position', () => {
        const base = aggregate(discounted, 0, 10, RATES);
        const netCash = aggregate(discounted, -50, 10, RATES);

        expect(netCash.equityValue).toBeGreaterThan(base.equityValue);
        expect(netCash.equityValue - base.equityValue).toBeCloseTo(50, 8);
        expect(netCash.enterpriseValue).toBe(base.enterpriseValue);
    });

    it('should report upside against a current price', () => {
        const result = aggregate(discounted, 0, 10, RATES, 48);
        expect(result.currentPrice).toBe(48);
        expect(result.upsidePct).toBeCloseTo(25, 8);
    });

    it('should report the terminal value share of enterprise value', () => {
        const result = aggregate(discounted, 0, 10, RATES);
        expect(result.terminalValueShare).toBeCloseTo(561.8182 / 600, 5);
    });

    it.each([0, -5, Number.NaN])('should reject a share count of %s', (shares) => {
        let caught: unknown;
        try {
            aggregate(discounted, 0, shares, RATES);
        } catch (error) {
            caught = error;
        }
        expect(isValuationError(caught, 'INVALID_SHARE_COUNT')).toBe(true);
    });
});
