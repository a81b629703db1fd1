import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildInputs, defaultSensitivityAxes, runValuation, validateInputs } from '../../services/valuationService';
import { loadValuationConfig } from '../../config/valuationConfig';
import { isValuationError } from '../../services/utils/errors';
import type { ValuationAssumptions } from '../../services/valuation/assumptions';
import type { ValuationInputs } from '../types/valuation';

const INPUTS: ValuationInputs = {
    baseRevenue: 100,
    schedule: [{ growthRate: 0.20, margin: 0.35 }],
    discountRate: 0.10,
    terminalGrowthRate: 0.03,
    netDebt: 0,
    sharesOutstanding: 10,
    currentPrice: 48
};

const ASSUMPTIONS: ValuationAssumptions = {
    name: 'Test Co',
    baseRevenue: 100,
    sharesOutstanding: 10,
    netDebt: 0,
    terminalGrowthRate: 0.03,
    wacc: {
        riskFreeRate: 0.0347,
        beta: 1.84,
        marketRiskPremium: 0.055,
        costOfDebt: 0.024,
        taxRate: 0.02,
        debtWeight: 0.13
    },
    schedule: { kind: 'fade', initialGrowth: 0.4, terminalGrowth: 0.1, horizon: 4, margin: 0.3 }
};

describe('Valuation service', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.mocked(console.warn).mockRestore();
    });

    it('should run the reference scenario end to end', () => {
        const report = runValuation(INPUTS);

        expect(report.projection[0].revenue).toBeCloseTo(120, 10);
        expect(report.projection[0].freeCashFlow).toBeCloseTo(42, 10);
        expect(report.discount.flows[0].presentValue).toBeCloseTo(38.18, 2);
        expect(report.discount.terminalValue).toBeCloseTo(618.0, 8);
        expect(report.discount.discountedTerminalValue).toBeCloseTo(561.8, 1);
        expect(report.valuation.enterpriseValue).toBeCloseTo(600.0, 8);
        expect(report.valuation.equityValue).toBeCloseTo(600.0, 8);
        expect(report.valuation.impliedSharePrice).toBeCloseTo(60.0, 8);
        expect(report.valuation.upsidePct).toBeCloseTo(25, 8);
        expect(report.sensitivity).toBeNull();
    });

    it('should warn when the terminal value dominates enterprise value', () => {
        runValuation(INPUTS);
        expect(console.warn).toHaveBeenCalledWith('[Valuation] Terminal value is 93.64% of enterprise value');
    });

    it('should attach a sensitivity grid when axes are given', () => {
        const axes = defaultSensitivityAxes(loadValuationConfig({}).sensitivity);
        const report = runValuation(INPUTS, { sensitivity: axes });

        expect(report.sensitivity?.cells).toHaveLength(6);
        expect(report.sensitivity?.cells.every(row => row.length === 6)).toBe(true);
        expect(report.sensitivity?.cells[0][0].impliedSharePrice).toBeCloseTo(report.valuation.impliedSharePrice, 8);
    });

    it('should reject an invalid rate pair before projecting', () => {
        let caught: unknown;
        try {
            runValuation({ ...INPUTS, terminalGrowthRate: 0.10 });
        } catch (error) {
            caught = error;
        }
        expect(isValuationError(caught, 'INVALID_RATE_RELATIONSHIP')).toBe(true);
    });

    it('should reject a non-positive share count up front', () => {
        expect(() => validateInputs({ ...INPUTS, sharesOutstanding: 0 })).toThrow('Shares outstanding must be positive (got 0)');
    });

    describe('buildInputs', () => {
        it('should derive the discount rate from WACC parameters', () => {
            const inputs = buildInputs(ASSUMPTIONS);

            expect(inputs.discountRate).toBeCloseTo(0.1212906, 10);
            expect(inputs.schedule).toHaveLength(4);
            expect(inputs.schedule[0].growthRate).toBe(0.4);
            expect(inputs.schedule[3].growthRate).toBe(0.1);
            expect(Object.isFrozen(inputs)).toBe(true);
        });

        it('should prefer an explicit discount rate', () => {
            const inputs = buildInputs({ ...ASSUMPTIONS, discountRate: 0.09 });
            expect(inputs.discountRate).toBe(0.09);
        });

        it('should build an explicit schedule', () => {
            const inputs = buildInputs({
                ...ASSUMPTIONS,
                schedule: { kind: 'explicit', growthRates: [0.2, 0.1], margins: 0.3 }
            });
            expect(inputs.schedule.map(p => p.growthRate)).toEqual([0.2, 0.1]);
        });

        it('should fail without any discount rate source', () => {
            expect(() => buildInputs({ ...ASSUMPTIONS, wacc: undefined })).toThrow(
                'No discount rate and no WACC parameters supplied'
            );
        });
    });
});
