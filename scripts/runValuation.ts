import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadValuationConfig } from '../config/valuationConfig.ts';
import { readAssumptionsFile } from '../services/valuation/assumptions.ts';
import { buildInputs, defaultSensitivityAxes, runValuation } from '../services/valuationService.ts';
import {
    PROJECTION_HEAD,
    projectionRows,
    renderTable,
    sensitivityHead,
    sensitivityRows,
    summaryRows
} from '../services/report/tables.ts';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_ASSUMPTIONS = path.resolve(__dirname, '../data/exampleAssumptions.json5');

const run = async () => {
    const file = process.argv[2] ? path.resolve(process.argv[2]) : DEFAULT_ASSUMPTIONS;
    const config = loadValuationConfig();

    const assumptions = readAssumptionsFile(file);
    console.log(`\n📈 DCF Valuation: ${assumptions.name}\n`);

    const inputs = buildInputs(assumptions);
    const defaults = defaultSensitivityAxes(config.sensitivity);
    const report = runValuation(inputs, {
        sensitivity: {
            discountRates: assumptions.sensitivity?.discountRates ?? defaults.discountRates,
            terminalGrowthRates: assumptions.sensitivity?.terminalGrowthRates ?? defaults.terminalGrowthRates
        }
    });

    console.log('\n' + renderTable(PROJECTION_HEAD, projectionRows(report.projection, report.discount)));
    console.log('\n' + renderTable(['Metric', 'Value'], summaryRows(report.valuation)));

    if (report.sensitivity) {
        console.log(`\n📊 SENSITIVITY: Implied share price`);
        console.log(renderTable(sensitivityHead(report.sensitivity), sensitivityRows(report.sensitivity)));
    }
};

run().catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
