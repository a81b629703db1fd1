/**
 * Segment Revenue Forecast
 *
 * Each segment compounds at its own growth rate, scaled each year by a
 * diversification multiplier (mix shift between segments). Gross margin
 * compresses by a fixed step down to a floor; net income follows total
 * revenue at the base-period net margin.
 */

import type { SegmentForecastYear, SegmentModel } from '../../src/types/valuation';
import { ValuationError } from '../utils/errors';

function validateModel(model: SegmentModel, years: number): void {
    if (!Number.isInteger(years) || years < 1) {
        throw new ValuationError('INVALID_SCHEDULE', `Forecast years must be a positive integer (got ${years})`);
    }
    if (model.segments.length === 0) {
        throw new ValuationError('INVALID_SCHEDULE', 'Segment model needs at least one segment');
    }
    if (!(model.revenue > 0)) {
        throw new ValuationError('INVALID_SCHEDULE', `Base revenue must be positive (got ${model.revenue})`);
    }
    for (const s of model.segments) {
        if (s.growthRate <= -1) {
            throw new ValuationError('INVALID_SCHEDULE', `${s.name}: growth rate ${s.growthRate} must be greater than -1`);
        }
        if (s.revenue < 0) {
            throw new ValuationError('INVALID_SCHEDULE', `${s.name}: revenue must not be negative`);
        }
    }
}

export function forecastSegments(model: SegmentModel, years: number): SegmentForecastYear[] {
    validateModel(model, years);

    const netMargin = model.netIncome / model.revenue;
    let current = model.segments.map(s => s.revenue);
    const forecast: SegmentForecastYear[] = [];

    for (let year = 1; year <= years; year++) {
        current = model.segments.map((s, i) => {
            const multiplier = s.diversification?.[year - 1] ?? 1;
            return current[i] * (1 + s.growthRate) * multiplier;
        });

        const totalRevenue = current.reduce((sum, r) => sum + r, 0);
        const grossMargin = Math.max(model.grossMargin - year * model.grossMarginStep, model.grossMarginFloor);

        forecast.push({
            year,
            totalRevenue,
            grossMargin,
            netIncome: totalRevenue * netMargin,
            segments: model.segments.map((s, i) => ({
                name: s.name,
                revenue: current[i],
                sharePct: totalRevenue > 0 ? (current[i] / totalRevenue) * 100 : 0
            }))
        });
    }

    return forecast;
}
