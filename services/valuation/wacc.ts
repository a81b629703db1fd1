/**
 * Cost of Capital
 *
 * CAPM cost of equity and the weighted average cost of capital:
 *   ke   = rf + beta * MRP
 *   WACC = ke * We + kd * (1 - t) * Wd
 */

import type { CapmInputs, WaccInputs, WaccResult } from '../../src/types/valuation';
import { ValuationError } from '../utils/errors';

const WEIGHT_TOLERANCE = 1e-9;

export const costOfEquity = ({ riskFreeRate, beta, marketRiskPremium }: CapmInputs): number =>
    riskFreeRate + beta * marketRiskPremium;

const inUnitRange = (value: number): boolean => Number.isFinite(value) && value >= 0 && value <= 1;

export function calculateWacc(inputs: WaccInputs): WaccResult {
    const { costOfDebt, taxRate, debtWeight } = inputs;
    const equityWeight = inputs.equityWeight ?? 1 - debtWeight;

    if (!inUnitRange(debtWeight) || !inUnitRange(equityWeight)) {
        throw new ValuationError('INVALID_CAPITAL_STRUCTURE', `Capital weights must lie in [0, 1] (debt ${debtWeight}, equity ${equityWeight})`);
    }
    if (Math.abs(debtWeight + equityWeight - 1) > WEIGHT_TOLERANCE) {
        throw new ValuationError('INVALID_CAPITAL_STRUCTURE', `Capital weights must sum to 1 (got ${debtWeight + equityWeight})`);
    }
    if (!inUnitRange(taxRate)) {
        throw new ValuationError('INVALID_CAPITAL_STRUCTURE', `Tax rate must lie in [0, 1] (got ${taxRate})`);
    }

    const ke = costOfEquity(inputs);
    const afterTaxCostOfDebt = costOfDebt * (1 - taxRate);

    return {
        costOfEquity: ke,
        afterTaxCostOfDebt,
        wacc: ke * equityWeight + afterTaxCostOfDebt * debtWeight
    };
}
