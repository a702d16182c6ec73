import { parseArgs } from 'util';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { HORIZON_END, HORIZON_START, SCENARIOS } from './model/constants';
import { computeAll } from './model/computeAll';
import { InvalidInputError, ModelError } from './model/errors';
import { compareToBaseline, correlationMatrix, getRow, summarizeScenario } from './model/summary';
import type { ResultMetric, ScenarioResult, ScenarioResults } from './model/types';
import { RESULT_COLUMNS, writeResultCsv } from './export/csv';

const USAGE = `Usage: saf-pathways [options]

  --base-demand <Mt>   Fuel demand in ${HORIZON_START} (default 80)
  --growth <rate>      Annual traffic growth, e.g. 0.025 (use --growth=-0.01 for contraction)
  --years <list>       Comma-separated years to print (default 2025,2030,2035,2050)
  -o, --out <dir>      Write <scenario>_results.csv files to this directory
  -h, --help           Show this help`;

const CliSchema = z.object({
  // An empty flag value would coerce to 0, so insist on text first
  baseDemand: z.string().min(1).pipe(z.coerce.number().finite().nonnegative()).default('80'),
  growth: z.string().min(1).pipe(z.coerce.number().finite().min(-1)).default('0.025'),
  years: z
    .string()
    .default('2025,2030,2035,2050')
    .transform((list) => list.split(',').map((v) => Number(v.trim())))
    .pipe(z.array(z.number().int().min(HORIZON_START).max(HORIZON_END)).min(1)),
  out: z.string().min(1).optional(),
  help: z.boolean().default(false)
});

export type CliOptions = z.infer<typeof CliSchema>;

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        'base-demand': { type: 'string' },
        growth: { type: 'string' },
        years: { type: 'string' },
        out: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' }
      },
      strict: true,
      allowPositionals: false
    }).values;
  } catch (err) {
    throw new InvalidInputError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliOptions(argv: string[]): CliOptions {
  const values = readArgs(argv);
  const parsed = CliSchema.safeParse({
    baseDemand: values['base-demand'],
    growth: values.growth,
    years: values.years,
    out: values.out,
    help: values.help
  });
  if (!parsed.success) {
    throw new InvalidInputError('Invalid command line options', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }
  return parsed.data;
}

// Two decimals is plenty for a terminal
function round(v: number): number {
  return Math.round(v * 100) / 100;
}

export function formatSampleRows(result: ScenarioResult, years: readonly number[]): Record<string, number>[] {
  return years.map((year) => {
    const row = getRow(result, year);
    return Object.fromEntries(RESULT_COLUMNS.map((c) => [c.label, c.key === 'year' ? row.year : round(row[c.key])]));
  });
}

// Columns whose co-movement is worth eyeballing under the mandate
const CORRELATION_METRICS: ResultMetric[] = [
  'totalDemandMt',
  'safSharePct',
  'co2GeneratedMt',
  'fuelCostBn',
  'carbonCostBn',
  'totalCostBn'
];

export function formatCorrelations(result: ScenarioResult): Record<string, Record<string, number | null>> {
  const { metrics, values } = correlationMatrix(result, CORRELATION_METRICS);
  return Object.fromEntries(
    metrics.map((m, i) => [
      m,
      Object.fromEntries(
        metrics.map((n, j) => {
          const r = values[i][j];
          return [n, r === null ? null : round(r)];
        })
      )
    ])
  );
}

function printResults(results: ScenarioResults, years: readonly number[]): void {
  for (const result of Object.values(results)) {
    const def = SCENARIOS[result.scenario];
    console.log(`\n--- ${result.scenario} ${def.label}: ${def.description} ---`);
    console.table(formatSampleRows(result, years));
  }

  console.log('\n--- Horizon totals ---');
  console.table(Object.values(results).map(summarizeScenario));

  console.log(`\n--- Against ${results.S0.scenario} ---`);
  console.table([compareToBaseline(results.S1, results.S0), compareToBaseline(results.S2, results.S0)]);

  console.log(`\n--- ${results.S1.scenario} correlations ---`);
  console.table(formatCorrelations(results.S1));
}

export async function main(argv: string[]): Promise<number> {
  try {
    const options = parseCliOptions(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    console.log(`Base demand (${HORIZON_START}): ${options.baseDemand} Mt, traffic growth: ${options.growth * 100}%`);
    const results = computeAll(options.baseDemand, options.growth);
    printResults(results, options.years);

    if (options.out) {
      for (const result of Object.values(results)) {
        const path = await writeResultCsv(result, options.out);
        console.log(`Wrote ${path}`);
      }
    }
    return 0;
  } catch (err) {
    if (err instanceof ModelError) {
      console.error(`${err.name}: ${err.message}`);
      if (err.details) console.error(err.details);
      console.error(`\n${USAGE}`);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
