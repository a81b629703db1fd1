/**
 * Console report tables
 *
 * Row builders are pure and return display strings; `renderTable` is the
 * only part that touches cli-table3.
 */

import Table from 'cli-table3';
import { VALUATION } from '../../config/valuationConfig';
import type {
    DiscountResult,
    ProjectedPeriod,
    SegmentForecastYear,
    SensitivityGrid,
    ValuationResult
} from '../../src/types/valuation';

export type Row = string[];

export const formatRate = (rate: number, decimals: number = VALUATION.DISPLAY.RATE_DECIMALS): string =>
    `${(rate * 100).toFixed(decimals)}%`;

export const formatMoney = (value: number, decimals: number = VALUATION.DISPLAY.MONEY_DECIMALS): string =>
    value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals });

export const PROJECTION_HEAD: Row = ['Period', 'Revenue', 'Free Cash Flow', 'Discount Factor', 'Present Value'];

export function projectionRows(projection: readonly ProjectedPeriod[], discounted: DiscountResult): Row[] {
    const rows = projection.map((p, i): Row => {
        const flow = discounted.flows[i];
        return [
            `Year ${p.period}`,
            formatMoney(p.revenue),
            formatMoney(p.freeCashFlow),
            flow ? flow.discountFactor.toFixed(4) : '—',
            flow ? formatMoney(flow.presentValue) : '—'
        ];
    });

    rows.push(['Terminal', '—', formatMoney(discounted.terminalValue), '—', formatMoney(discounted.discountedTerminalValue)]);
    return rows;
}

export function summaryRows(valuation: ValuationResult): Row[] {
    const rows: Row[] = [
        ['Discount Rate', formatRate(valuation.discountRate)],
        ['Terminal Growth', formatRate(valuation.terminalGrowthRate)],
        ['PV of Cash Flows', formatMoney(valuation.sumOfPresentValues)],
        ['PV of Terminal Value', formatMoney(valuation.discountedTerminalValue)],
        ['Terminal Value Share', formatRate(valuation.terminalValueShare, 1)],
        ['Enterprise Value', formatMoney(valuation.enterpriseValue)],
        ['Equity Value', formatMoney(valuation.equityValue)],
        ['Implied Share Price', formatMoney(valuation.impliedSharePrice)]
    ];

    if (valuation.currentPrice !== null && valuation.upsidePct !== null) {
        rows.push(['Current Price', formatMoney(valuation.currentPrice)]);
        rows.push(['Upside', `${valuation.upsidePct.toFixed(2)}%`]);
    }
    return rows;
}

/** Discount rates down the side, terminal growth rates across the top */
export function sensitivityHead(grid: SensitivityGrid): Row {
    return ['WACC \\ g', ...grid.terminalGrowthRates.map(g => formatRate(g))];
}

export function sensitivityRows(grid: SensitivityGrid): Row[] {
    return grid.cells.map((row, i) => [
        formatRate(grid.discountRates[i]),
        ...row.map(cell => (cell.impliedSharePrice === null ? 'n/a' : formatMoney(cell.impliedSharePrice)))
    ]);
}

export function segmentHead(forecast: SegmentForecastYear[]): Row {
    return ['Segment', ...forecast.map(f => `Year ${f.year}`)];
}

export function segmentRows(forecast: SegmentForecastYear[]): Row[] {
    if (forecast.length === 0) return [];

    const rows = forecast[0].segments.map((s, i): Row => [
        s.name,
        ...forecast.map(f => `${formatMoney(f.segments[i].revenue, 0)} (${f.segments[i].sharePct.toFixed(1)}%)`)
    ]);

    rows.push(['Total Revenue', ...forecast.map(f => formatMoney(f.totalRevenue, 0))]);
    rows.push(['Gross Margin', ...forecast.map(f => formatRate(f.grossMargin, 1))]);
    rows.push(['Net Income', ...forecast.map(f => formatMoney(f.netIncome, 0))]);
    return rows;
}

export function renderTable(head: Row, rows: Row[]): string {
    const table = new Table({ head });
    table.push(...rows);
    return table.toString();
}
