/**
 * Growth Schedule Builders
 *
 * A schedule is one (growth rate, FCF margin) pair per projected period.
 * Its length is the projection horizon.
 */

import type { GrowthPeriod, GrowthSchedule } from '../../src/types/valuation';
import { ValuationError } from '../utils/errors';

export function validateSchedule(schedule: GrowthSchedule): void {
    if (schedule.length === 0) {
        throw new ValuationError('INVALID_SCHEDULE', 'Growth schedule must contain at least one period');
    }

    schedule.forEach((p, index) => {
        const period = index + 1;
        if (!Number.isFinite(p.growthRate) || !Number.isFinite(p.margin)) {
            throw new ValuationError('INVALID_SCHEDULE', `Period ${period}: growth rate and margin must be finite numbers`);
        }
        // Compounding by (1 + g) with g <= -1 wipes out or flips revenue
        if (p.growthRate <= -1) {
            throw new ValuationError('INVALID_SCHEDULE', `Period ${period}: growth rate ${p.growthRate} must be greater than -1`);
        }
    });
}

const assertHorizon = (horizon: number): void => {
    if (!Number.isInteger(horizon) || horizon < 1) {
        throw new ValuationError('INVALID_SCHEDULE', `Horizon must be a positive integer (got ${horizon})`);
    }
};

export function constantSchedule(growthRate: number, margin: number, horizon: number): GrowthSchedule {
    assertHorizon(horizon);
    const schedule = Array.from({ length: horizon }, (): GrowthPeriod => Object.freeze({ growthRate, margin }));
    validateSchedule(schedule);
    return Object.freeze(schedule);
}

export function scheduleFromRates(growthRates: number[], margins: number | number[]): GrowthSchedule {
    if (Array.isArray(margins) && margins.length !== growthRates.length) {
        throw new ValuationError(
            'INVALID_SCHEDULE',
            `Margin count (${margins.length}) does not match growth rate count (${growthRates.length})`
        );
    }

    const schedule = growthRates.map((growthRate, i): GrowthPeriod => Object.freeze({
        growthRate,
        margin: Array.isArray(margins) ? margins[i] : margins
    }));
    validateSchedule(schedule);
    return Object.freeze(schedule);
}

/**
 * Linearly interpolate growth from initial to terminal.
 * `step` counts from 0 (initial rate) and reaches the terminal rate at
 * `fadeSteps`; `fadingSchedule` passes period 1 as step 0.
 */
export function fadeGrowthRate(
    step: number,
    initialGrowth: number,
    terminalGrowth: number,
    fadeSteps: number
): number {
    if (fadeSteps <= 0) return terminalGrowth;
    if (step <= 0) return initialGrowth;
    if (step >= fadeSteps) return terminalGrowth;
    const t = step / fadeSteps;
    return initialGrowth * (1 - t) + terminalGrowth * t;
}

export interface FadeOptions {
    initialGrowth: number;
    terminalGrowth: number;
    horizon: number;
    margin: number;
    fadePeriods?: number; // Defaults to the horizon
}

/**
 * Deceleration pattern: growth steps linearly from `initialGrowth` in period 1
 * to `terminalGrowth` in period `fadePeriods`, then stays there.
 */
export function fadingSchedule(options: FadeOptions): GrowthSchedule {
    const { initialGrowth, terminalGrowth, horizon, margin } = options;
    assertHorizon(horizon);
    const fadePeriods = options.fadePeriods ?? horizon;

    // Period p is step p - 1, so period `fadePeriods` is step `fadePeriods - 1`
    const rates = Array.from({ length: horizon }, (_, i) =>
        fadeGrowthRate(i, initialGrowth, terminalGrowth, Math.max(fadePeriods - 1, 0))
    );
    return scheduleFromRates(rates, margin);
}
