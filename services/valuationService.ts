import type { GrowthSchedule, SensitivityGrid, ValuationInputs, ValuationReport } from '../src/types/valuation';
import { type SensitivityConfig, VALUATION } from '../config/valuationConfig';
import type { ValuationAssumptions } from './valuation/assumptions';
import { fadingSchedule, scheduleFromRates, validateSchedule } from './valuation/growthSchedule';
import { freeCashFlows, project } from './valuation/projection';
import { assertRateRelationship, discount } from './valuation/discounting';
import { aggregate, assertShareCount } from './valuation/aggregator';
import { countInvalidCells, gridRange, linspace, sweepProjection } from './valuation/sensitivity';
import { calculateWacc } from './valuation/wacc';
import { ValuationError } from './utils/errors';

export interface SensitivityAxes {
    discountRates: readonly number[];
    terminalGrowthRates: readonly number[];
}

export interface RunOptions {
    sensitivity?: SensitivityAxes;
}

const pct = (rate: number) => `${(rate * 100).toFixed(2)}%`;

// Fail fast on the whole input set before any stage runs
export function validateInputs(inputs: Readonly<ValuationInputs>): void {
    validateSchedule(inputs.schedule);
    assertRateRelationship(inputs.discountRate, inputs.terminalGrowthRate);
    assertShareCount(inputs.sharesOutstanding);
}

const buildSchedule = (schedule: ValuationAssumptions['schedule']): GrowthSchedule => {
    if (schedule.kind === 'fade') {
        return fadingSchedule({
            initialGrowth: schedule.initialGrowth,
            terminalGrowth: schedule.terminalGrowth,
            horizon: schedule.horizon,
            fadePeriods: schedule.fadePeriods,
            margin: schedule.margin
        });
    }
    return scheduleFromRates(schedule.growthRates, schedule.margins);
};

/**
 * Assumptions -> frozen ValuationInputs.
 * An explicit discount rate wins over the WACC block.
 */
export function buildInputs(assumptions: ValuationAssumptions): Readonly<ValuationInputs> {
    let discountRate = assumptions.discountRate;
    if (discountRate === undefined) {
        if (!assumptions.wacc) {
            throw new ValuationError('INVALID_ASSUMPTIONS', 'No discount rate and no WACC parameters supplied');
        }
        const wacc = calculateWacc(assumptions.wacc);
        console.log(`[Valuation] WACC=${pct(wacc.wacc)} (Ke=${pct(wacc.costOfEquity)}, Kd after tax=${pct(wacc.afterTaxCostOfDebt)})`);
        discountRate = wacc.wacc;
    }

    return Object.freeze({
        baseRevenue: assumptions.baseRevenue,
        schedule: buildSchedule(assumptions.schedule),
        discountRate,
        terminalGrowthRate: assumptions.terminalGrowthRate,
        netDebt: assumptions.netDebt,
        sharesOutstanding: assumptions.sharesOutstanding,
        currentPrice: assumptions.currentPrice
    });
}

export const defaultSensitivityAxes = (config: SensitivityConfig): SensitivityAxes => ({
    discountRates: linspace(config.discountMin, config.discountMax, config.points),
    terminalGrowthRates: linspace(config.growthMin, config.growthMax, config.points)
});

export function runValuation(inputs: Readonly<ValuationInputs>, options: RunOptions = {}): ValuationReport {
    validateInputs(inputs);

    const projection = project(inputs.baseRevenue, inputs.schedule);
    const discounted = discount(freeCashFlows(projection), inputs.discountRate, inputs.terminalGrowthRate);
    const valuation = aggregate(
        discounted,
        inputs.netDebt,
        inputs.sharesOutstanding,
        { discountRate: inputs.discountRate, terminalGrowthRate: inputs.terminalGrowthRate },
        inputs.currentPrice
    );

    console.log(
        `[Valuation] EV=${valuation.enterpriseValue.toFixed(2)} Equity=${valuation.equityValue.toFixed(2)} ` +
        `Per share=${valuation.impliedSharePrice.toFixed(2)} (r=${pct(inputs.discountRate)}, g=${pct(inputs.terminalGrowthRate)})`
    );
    if (valuation.terminalValueShare > VALUATION.WARNINGS.TERMINAL_VALUE_SHARE) {
        console.warn(`[Valuation] Terminal value is ${pct(valuation.terminalValueShare)} of enterprise value`);
    }

    let sensitivity: SensitivityGrid | null = null;
    if (options.sensitivity) {
        const { discountRates, terminalGrowthRates } = options.sensitivity;
        sensitivity = sweepProjection(projection, inputs, discountRates, terminalGrowthRates);

        const invalid = countInvalidCells(sensitivity);
        const range = gridRange(sensitivity);
        console.log(
            `[Sensitivity] ${discountRates.length}x${terminalGrowthRates.length} grid` +
            (range ? `, per share ${range.min.toFixed(2)} to ${range.max.toFixed(2)}` : '') +
            (invalid > 0 ? `, ${invalid} invalid cell(s) skipped (r <= g)` : '')
        );
    }

    return { inputs, projection, discount: discounted, valuation, sensitivity };
}
