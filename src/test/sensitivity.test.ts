import { describe, it, expect } from 'vitest';
import {
    countInvalidCells,
    gridRange,
    linspace,
    sweep,
    sweepProjection
} from '../../services/valuation/sensitivity';
import { project } from '../../services/valuation/projection';
import { isValuationError } from '../../services/utils/errors';
import type { SensitivityCell, SensitivityGrid, ValuationInputs } from '../types/valuation';

const INPUTS: ValuationInputs = {
    baseRevenue: 100,
    schedule: [{ growthRate: 0.20, margin: 0.35 }],
    discountRate: 0.10,
    terminalGrowthRate: 0.03,
    netDebt: 0,
    sharesOutstanding: 10
};

describe('SensitivityAnalyzer', () => {
    describe('axes', () => {
        it('should space points evenly and include both ends', () => {
            const axis = linspace(0.10, 0.15, 6);

            expect(axis).toHaveLength(6);
            expect(axis[0]).toBe(0.10);
            expect(axis[5]).toBe(0.15);
            [0.10, 0.11, 0.12, 0.13, 0.14, 0.15].forEach((v, i) => expect(axis[i]).toBeCloseTo(v, 12));
        });

        it('should return the start for a single point', () => {
            expect(linspace(0.08, 0.2, 1)).toEqual([0.08]);
        });

        it('should reject a non-positive point count', () => {
            expect(() => linspace(0.1, 0.2, 0)).toThrow('Axis needs a positive integer point count (got 0)');
        });
    });

    it('should return exactly m x n cells in axis order', () => {
        const discountRates = [0.12, 0.08, 0.10];
        const growthRates = [0.01, 0.03];
        const grid = sweep(INPUTS, discountRates, growthRates);

        expect(grid.discountRates).toEqual(discountRates);
        expect(grid.terminalGrowthRates).toEqual(growthRates);
        expect(grid.cells).toHaveLength(3);
        grid.cells.forEach((row, i) => {
            expect(row).toHaveLength(2);
            row.forEach((cell, j) => {
                expect(cell.discountRate).toBe(discountRates[i]);
                expect(cell.terminalGrowthRate).toBe(growthRates[j]);
            });
        });
    });

    it('should match a single-run valuation at the base rates', () => {
        const grid = sweep(INPUTS, [0.10], [0.03]);
        expect(grid.cells[0][0].impliedSharePrice).toBeCloseTo(60, 8);
    });

    it('should mark invalid rate pairs as null and keep sweeping', () => {
        const grid = sweep(INPUTS, [0.02, 0.10, 0.12], [0.03, 0.02]);

        expect(grid.cells[0][0].impliedSharePrice).toBeNull(); // 2% vs 3%
        expect(grid.cells[0][1].impliedSharePrice).toBeNull(); // 2% vs 2%
        expect(grid.cells[1][0].impliedSharePrice).toBeCloseTo(60, 8);
        expect(grid.cells[2][1].impliedSharePrice).not.toBeNull();
        expect(countInvalidCells(grid)).toBe(2);
    });

    it('should fall in value as the discount rate rises', () => {
        const grid = sweep(INPUTS, [0.08, 0.10, 0.12], [0.03]);
        const prices = grid.cells.map(row => row[0].impliedSharePrice ?? Number.NaN);

        expect(prices[0]).toBeGreaterThan(prices[1]);
        expect(prices[1]).toBeGreaterThan(prices[2]);
    });

    it('should propagate a share count violation instead of nulling cells', () => {
        let caught: unknown;
        try {
            sweep({ ...INPUTS, sharesOutstanding: 0 }, [0.10], [0.03]);
        } catch (error) {
            caught = error;
        }
        expect(isValuationError(caught, 'INVALID_SHARE_COUNT')).toBe(true);
    });

    it('should reject a bad share count even when every rate pair is invalid', () => {
        let caught: unknown;
        try {
            sweep({ ...INPUTS, sharesOutstanding: 0 }, [0.01, 0.02], [0.03]);
        } catch (error) {
            caught = error;
        }
        expect(isValuationError(caught, 'INVALID_SHARE_COUNT')).toBe(true);
    });

    it('should return no rows for an empty discount rate axis', () => {
        const grid = sweep(INPUTS, [], [0.03]);

        expect(grid.cells).toHaveLength(0);
        expect(grid.discountRates).toEqual([]);
        expect(grid.terminalGrowthRates).toEqual([0.03]);
    });

    it('should return empty rows for an empty terminal growth axis', () => {
        const grid = sweep(INPUTS, [0.10, 0.12], []);

        expect(grid.cells).toHaveLength(2);
        expect(grid.cells[0]).toHaveLength(0);
        expect(grid.cells[1]).toHaveLength(0);
        expect(countInvalidCells(grid)).toBe(0);
        expect(gridRange(grid)).toBeNull();
    });

    it('should sweep an existing projection without re-projecting', () => {
        const projection = project(INPUTS.baseRevenue, INPUTS.schedule);
        const grid = sweepProjection(projection, INPUTS, [0.10], [0.03]);
        expect(grid.cells[0][0].impliedSharePrice).toBeCloseTo(60, 8);
    });

    it('should freeze the grid', () => {
        const grid = sweep(INPUTS, [0.10], [0.03]);
        expect(Object.isFrozen(grid)).toBe(true);
        expect(Object.isFrozen(grid.cells)).toBe(true);
        expect(Object.isFrozen(grid.cells[0][0])).toBe(true);
    });

    describe('gridRange', () => {
        it('should span the valid cells only', () => {
            const grid = sweep(INPUTS, [0.02, 0.10], [0.03]);
            const range = gridRange(grid);

            expect(range?.min).toBeCloseTo(60, 8);
            expect(range?.max).toBeCloseTo(60, 8);
        });

        it('should handle a grid too large to spread into Math.min', () => {
            const size = 300_000;
            const row: SensitivityCell[] = Array.from({ length: size }, (_, j) => ({
                discountRate: 0.10,
                terminalGrowthRate: 0.03,
                impliedSharePrice: j + 1
            }));
            const grid: SensitivityGrid = {
                discountRates: [0.10],
                terminalGrowthRates: row.map(c => c.terminalGrowthRate),
                cells: [row]
            };

            expect(gridRange(grid)).toEqual({ min: 1, max: size });
        });

        it('should return null when every cell is invalid', () => {
            expect(gridRange(sweep(INPUTS, [0.01], [0.03]))).toBeNull();
        });
    });
});
