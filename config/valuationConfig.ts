/**
 * Centralized Valuation Configuration
 *
 * Defaults for sensitivity sweeps, schedule fades and report formatting.
 * Sweep bounds can be overridden per run through environment variables.
 */

export const VALUATION = {
    SENSITIVITY: {
        DISCOUNT_MIN: 0.10,
        DISCOUNT_MAX: 0.15,
        GROWTH_MIN: 0.03,
        GROWTH_MAX: 0.05,
        POINTS: 6 // Per axis
    },
    DEFAULTS: {
        TERMINAL_GROWTH: 0.03, // Long-run GDP-like growth
        FORECAST_YEARS: 3      // Segment forecast
    },
    WARNINGS: {
        TERMINAL_VALUE_SHARE: 0.75 // Warn when PV(TV) dominates EV
    },
    DISPLAY: {
        RATE_DECIMALS: 2, // 10.00%
        MONEY_DECIMALS: 2
    }
} as const;

export interface SensitivityConfig {
    discountMin: number;
    discountMax: number;
    growthMin: number;
    growthMax: number;
    points: number;
}

export interface ValuationConfig {
    sensitivity: SensitivityConfig;
}

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
        console.warn(`[Config] Ignoring ${key}="${raw}" (not a number), using ${fallback}`);
        return fallback;
    }
    return value;
};

export function loadValuationConfig(env: Env = process.env): ValuationConfig {
    const { SENSITIVITY } = VALUATION;
    let points = readNumber(env, 'DCF_SENSITIVITY_POINTS', SENSITIVITY.POINTS);
    if (!Number.isInteger(points) || points < 1) {
        console.warn(`[Config] DCF_SENSITIVITY_POINTS must be a positive integer, using ${SENSITIVITY.POINTS}`);
        points = SENSITIVITY.POINTS;
    }

    return {
        sensitivity: {
            discountMin: readNumber(env, 'DCF_DISCOUNT_MIN', SENSITIVITY.DISCOUNT_MIN),
            discountMax: readNumber(env, 'DCF_DISCOUNT_MAX', SENSITIVITY.DISCOUNT_MAX),
            growthMin: readNumber(env, 'DCF_GROWTH_MIN', SENSITIVITY.GROWTH_MIN),
            growthMax: readNumber(env, 'DCF_GROWTH_MAX', SENSITIVITY.GROWTH_MAX),
            points
        }
    };
}
