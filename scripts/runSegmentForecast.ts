import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';
import { VALUATION } from '../config/valuationConfig.ts';
import { readSegmentModelFile } from '../services/valuation/assumptions.ts';
import { forecastSegments } from '../services/valuation/segmentForecast.ts';
import { renderTable, segmentHead, segmentRows } from '../services/report/tables.ts';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_MODEL = path.resolve(__dirname, '../data/exampleSegments.json5');

const run = async () => {
    const file = process.argv[2] ? path.resolve(process.argv[2]) : DEFAULT_MODEL;
    const years = process.argv[3] ? Number(process.argv[3]) : VALUATION.DEFAULTS.FORECAST_YEARS;

    const model = readSegmentModelFile(file);
    const forecast = forecastSegments(model, years);

    console.log(`\n🧮 Segment Revenue Forecast (${years} years)`);
    console.log(renderTable(segmentHead(forecast), segmentRows(forecast)));
};

run().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
