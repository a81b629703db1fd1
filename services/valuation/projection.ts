import type { GrowthSchedule, ProjectedPeriod } from '../../src/types/valuation';
import { validateSchedule } from './growthSchedule';

/**
 * Compounds revenue period by period and applies each period's FCF margin.
 * revenue[t] = revenue[t-1] * (1 + g[t]), revenue[0] = baseRevenue.
 */
export function project(baseRevenue: number, schedule: GrowthSchedule): readonly ProjectedPeriod[] {
    validateSchedule(schedule);

    let revenue = baseRevenue;
    const periods = schedule.map(({ growthRate, margin }, index): ProjectedPeriod => {
        revenue = revenue * (1 + growthRate);
        return Object.freeze({
            period: index + 1,
            revenue,
            freeCashFlow: revenue * margin
        });
    });

    return Object.freeze(periods);
}

export const freeCashFlows = (periods: readonly ProjectedPeriod[]): number[] =>
    periods.map(p => p.freeCashFlow);
