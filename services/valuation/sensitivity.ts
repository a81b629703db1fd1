/**
 * Sensitivity Analysis Module
 *
 * Sweeps discount rate x terminal growth over the same projected cash flows.
 * Projection runs once; only discounting and aggregation vary per cell.
 *
 * A rate pair with r <= g becomes a null cell instead of aborting the sweep.
 * Every other error is a caller contract violation and propagates.
 */

import type { ProjectedPeriod, SensitivityCell, SensitivityGrid, ValuationInputs } from '../../src/types/valuation';
import { isValuationError, ValuationError } from '../utils/errors';
import { aggregate, assertShareCount } from './aggregator';
import { discount } from './discounting';
import { freeCashFlows, project } from './projection';

/** Evenly spaced values from start to stop, both ends included */
export function linspace(start: number, stop: number, count: number): number[] {
    if (!Number.isInteger(count) || count < 1) {
        throw new ValuationError('INVALID_AXIS', `Axis needs a positive integer point count (got ${count})`);
    }
    if (count === 1) return [start];

    const step = (stop - start) / (count - 1);
    // Pin the last point to `stop` so float drift never overshoots it
    return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + step * i));
}

const evaluateCell = (
    cashFlows: number[],
    inputs: Readonly<ValuationInputs>,
    discountRate: number,
    terminalGrowthRate: number
): SensitivityCell => {
    try {
        const discounted = discount(cashFlows, discountRate, terminalGrowthRate);
        const result = aggregate(discounted, inputs.netDebt, inputs.sharesOutstanding, { discountRate, terminalGrowthRate });
        return Object.freeze({ discountRate, terminalGrowthRate, impliedSharePrice: result.impliedSharePrice });
    } catch (error) {
        if (isValuationError(error, 'INVALID_RATE_RELATIONSHIP')) {
            return Object.freeze({ discountRate, terminalGrowthRate, impliedSharePrice: null });
        }
        throw error;
    }
};

/** Sweep over already-projected periods */
export function sweepProjection(
    projection: readonly ProjectedPeriod[],
    inputs: Readonly<ValuationInputs>,
    discountRateAxis: readonly number[],
    terminalGrowthAxis: readonly number[]
): SensitivityGrid {
    // Checked once up front: a grid of all-invalid rate pairs never reaches aggregate
    assertShareCount(inputs.sharesOutstanding);

    const cashFlows = freeCashFlows(projection);
    const cells = discountRateAxis.map(r =>
        Object.freeze(terminalGrowthAxis.map(g => evaluateCell(cashFlows, inputs, r, g)))
    );

    return Object.freeze({
        discountRates: Object.freeze([...discountRateAxis]),
        terminalGrowthRates: Object.freeze([...terminalGrowthAxis]),
        cells: Object.freeze(cells)
    });
}

export function sweep(
    inputs: Readonly<ValuationInputs>,
    discountRateAxis: readonly number[],
    terminalGrowthAxis: readonly number[]
): SensitivityGrid {
    const projection = project(inputs.baseRevenue, inputs.schedule);
    return sweepProjection(projection, inputs, discountRateAxis, terminalGrowthAxis);
}

/** Min / max implied share price over the valid cells */
export function gridRange(grid: SensitivityGrid): { min: number; max: number } | null {
    const values = grid.cells
        .flat()
        .map(c => c.impliedSharePrice)
        .filter((v): v is number => v !== null);

    if (values.length === 0) return null;
    return values.reduce(
        (range, v) => ({ min: Math.min(range.min, v), max: Math.max(range.max, v) }),
        { min: values[0], max: values[0] }
    );
}

export const countInvalidCells = (grid: SensitivityGrid): number =>
    grid.cells.flat().filter(c => c.impliedSharePrice === null).length;
