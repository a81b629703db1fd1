/**
 * Assumption files
 *
 * Valuation assumptions are kept in JSON5 files (comments allowed, so each
 * number can carry its source). Parsing checks every field and reports the
 * first bad one by path.
 */

import fs from 'fs';
import JSON5 from 'json5';
import type { SegmentAssumption, SegmentModel, WaccInputs } from '../../src/types/valuation';
import { VALUATION } from '../../config/valuationConfig';
import { ValuationError } from '../utils/errors';
import { calcNetDebt, historicalGrowth } from '../utils/financialUtils';

export type ScheduleAssumption =
    | { kind: 'explicit'; growthRates: number[]; margins: number | number[] }
    | { kind: 'fade'; initialGrowth: number; terminalGrowth: number; horizon: number; fadePeriods?: number; margin: number };

export interface ValuationAssumptions {
    name: string;
    baseRevenue: number;
    sharesOutstanding: number;
    netDebt: number;
    currentPrice?: number;
    terminalGrowthRate: number;
    discountRate?: number;
    wacc?: WaccInputs;
    schedule: ScheduleAssumption;
    sensitivity?: { discountRates?: number[]; terminalGrowthRates?: number[] };
}

type Json = Record<string, unknown>;

const isRecord = (value: unknown): value is Json =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const fail = (path: string, expected: string): never => {
    throw new ValuationError('INVALID_ASSUMPTIONS', `${path}: expected ${expected}`);
};

const requireRecord = (value: unknown, path: string): Json => (isRecord(value) ? value : fail(path, 'an object'));

const requireNumber = (obj: Json, key: string, path: string): number => {
    const value = obj[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fail(`${path}.${key}`, 'a finite number');
};

const optionalNumber = (obj: Json, key: string, path: string): number | undefined =>
    obj[key] === undefined ? undefined : requireNumber(obj, key, path);

const requireNumberArray = (value: unknown, path: string): number[] => {
    if (!Array.isArray(value)) return fail(path, 'an array of numbers');
    return value.map((item: unknown, i) =>
        typeof item === 'number' && Number.isFinite(item) ? item : fail(`${path}[${i}]`, 'a finite number')
    );
};

const optionalNumberArray = (obj: Json, key: string, path: string): number[] | undefined =>
    obj[key] === undefined ? undefined : requireNumberArray(obj[key], `${path}.${key}`);

/**
 * Without an explicit `initialGrowth`, a fade starts from the annualised
 * growth of `history.revenues` (oldest first).
 */
function parseInitialGrowth(fade: Json, history: unknown, path: string): number {
    if (fade.initialGrowth !== undefined) return requireNumber(fade, 'initialGrowth', path);
    if (history === undefined) return fail(`${path}.initialGrowth`, 'a finite number (or a history.revenues series)');

    const revenues = requireNumberArray(requireRecord(history, 'assumptions.history').revenues, 'assumptions.history.revenues');
    const growth = historicalGrowth(revenues);
    return growth === null
        ? fail('assumptions.history.revenues', 'at least two revenues starting from a positive value')
        : growth;
}

function parseSchedule(value: unknown, history: unknown, path: string): ScheduleAssumption {
    const obj = requireRecord(value, path);

    if (obj.fade !== undefined) {
        const fade = requireRecord(obj.fade, `${path}.fade`);
        return {
            kind: 'fade',
            initialGrowth: parseInitialGrowth(fade, history, `${path}.fade`),
            terminalGrowth: requireNumber(fade, 'terminalGrowth', `${path}.fade`),
            horizon: requireNumber(fade, 'horizon', `${path}.fade`),
            fadePeriods: optionalNumber(fade, 'fadePeriods', `${path}.fade`),
            margin: requireNumber(obj, 'margin', path)
        };
    }

    const growthRates = requireNumberArray(obj.growthRates, `${path}.growthRates`);
    const margins = typeof obj.margins === 'number'
        ? requireNumber(obj, 'margins', path)
        : requireNumberArray(obj.margins, `${path}.margins`);
    return { kind: 'explicit', growthRates, margins };
}

function parseWacc(value: unknown, path: string): WaccInputs {
    const obj = requireRecord(value, path);
    return {
        riskFreeRate: requireNumber(obj, 'riskFreeRate', path),
        beta: requireNumber(obj, 'beta', path),
        marketRiskPremium: requireNumber(obj, 'marketRiskPremium', path),
        costOfDebt: requireNumber(obj, 'costOfDebt', path),
        taxRate: requireNumber(obj, 'taxRate', path),
        debtWeight: requireNumber(obj, 'debtWeight', path),
        equityWeight: optionalNumber(obj, 'equityWeight', path)
    };
}

/**
 * Net debt is taken as given, or derived from a balance-sheet block
 * (`{ totalDebt, cash }`). Missing both means zero net debt.
 */
function parseNetDebt(obj: Json): number {
    if (obj.netDebt !== undefined) return requireNumber(obj, 'netDebt', 'assumptions');
    if (obj.balance === undefined) return 0;

    const balance = requireRecord(obj.balance, 'assumptions.balance');
    return calcNetDebt({
        totalDebt: requireNumber(balance, 'totalDebt', 'assumptions.balance'),
        cash: requireNumber(balance, 'cash', 'assumptions.balance')
    });
}

export function parseAssumptions(raw: unknown): ValuationAssumptions {
    const obj = requireRecord(raw, 'assumptions');

    const discountRate = optionalNumber(obj, 'discountRate', 'assumptions');
    const wacc = obj.wacc === undefined ? undefined : parseWacc(obj.wacc, 'assumptions.wacc');
    if (discountRate === undefined && wacc === undefined) {
        fail('assumptions', 'either discountRate or a wacc block');
    }

    let sensitivity: ValuationAssumptions['sensitivity'];
    if (obj.sensitivity !== undefined) {
        const s = requireRecord(obj.sensitivity, 'assumptions.sensitivity');
        sensitivity = {
            discountRates: optionalNumberArray(s, 'discountRates', 'assumptions.sensitivity'),
            terminalGrowthRates: optionalNumberArray(s, 'terminalGrowthRates', 'assumptions.sensitivity')
        };
    }

    const name = obj.name;
    return {
        name: typeof name === 'string' ? name : 'Unnamed model',
        baseRevenue: requireNumber(obj, 'baseRevenue', 'assumptions'),
        sharesOutstanding: requireNumber(obj, 'sharesOutstanding', 'assumptions'),
        netDebt: parseNetDebt(obj),
        currentPrice: optionalNumber(obj, 'currentPrice', 'assumptions'),
        terminalGrowthRate: optionalNumber(obj, 'terminalGrowthRate', 'assumptions') ?? VALUATION.DEFAULTS.TERMINAL_GROWTH,
        discountRate,
        wacc,
        schedule: parseSchedule(obj.schedule, obj.history, 'assumptions.schedule'),
        sensitivity
    };
}

function parseSegment(value: unknown, path: string): SegmentAssumption {
    const obj = requireRecord(value, path);
    const name = obj.name;
    if (typeof name !== 'string' || name === '') return fail(`${path}.name`, 'a non-empty string');

    return {
        name,
        revenue: requireNumber(obj, 'revenue', path),
        growthRate: requireNumber(obj, 'growthRate', path),
        diversification: optionalNumberArray(obj, 'diversification', path)
    };
}

export function parseSegmentModel(raw: unknown): SegmentModel {
    const obj = requireRecord(raw, 'model');
    const segments = obj.segments;
    if (!Array.isArray(segments)) return fail('model.segments', 'an array');

    return {
        segments: segments.map((s: unknown, i) => parseSegment(s, `model.segments[${i}]`)),
        revenue: requireNumber(obj, 'revenue', 'model'),
        netIncome: requireNumber(obj, 'netIncome', 'model'),
        grossMargin: requireNumber(obj, 'grossMargin', 'model'),
        grossMarginStep: requireNumber(obj, 'grossMarginStep', 'model'),
        grossMarginFloor: requireNumber(obj, 'grossMarginFloor', 'model')
    };
}

export function parseJson5(text: string, source: string): unknown {
    try {
        const parsed: unknown = JSON5.parse(text);
        return parsed;
    } catch (error) {
        throw new ValuationError(
            'INVALID_ASSUMPTIONS',
            `${source}: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

export const readAssumptionsFile = (filePath: string): ValuationAssumptions =>
    parseAssumptions(parseJson5(fs.readFileSync(filePath, 'utf-8'), filePath));

export const readSegmentModelFile = (filePath: string): SegmentModel =>
    parseSegmentModel(parseJson5(fs.readFileSync(filePath, 'utf-8'), filePath));
