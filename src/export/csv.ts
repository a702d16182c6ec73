import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import type { ScenarioResult, ScenarioYearResult } from '../model/types';

/**
 * Column order and names are part of the contract with whatever reads
 * the files downstream. Append, never rename.
 */
export const RESULT_COLUMNS: ReadonlyArray<{ key: keyof ScenarioYearResult; label: string }> = [
  { key: 'year', label: 'Year' },
  { key: 'totalDemandMt', label: 'Total_Fuel_Demand_Mt' },
  { key: 'safSharePct', label: 'SAF_Blending_Share_%' },
  { key: 'safVolumeMt', label: 'SAF_Volume_Mt' },
  { key: 'jetVolumeMt', label: 'Jet_Fuel_Volume_Mt' },
  { key: 'co2GeneratedMt', label: 'CO2_Emissions_Generated_Mt' },
  { key: 'co2AvoidedMt', label: 'CO2_Emissions_Avoided_Mt' },
  { key: 'carbonPrice', label: 'Carbon_Price_EUR_per_Ton' },
  { key: 'fuelCostBn', label: 'Total_Fuel_Cost_EUR_Bn' },
  { key: 'carbonCostBn', label: 'Carbon_Cost_EUR_Bn' },
  { key: 'totalCostBn', label: 'Total_Cost_of_Compliance_EUR_Bn' }
];

export function resultToCsv(result: ScenarioResult): string {
  return Papa.unparse(
    {
      fields: RESULT_COLUMNS.map((c) => c.label),
      data: result.rows.map((row) => RESULT_COLUMNS.map((c) => row[c.key]))
    },
    { newline: '\n' }
  );
}

export function getCsvFileName(result: ScenarioResult): string {
  return `${result.scenario}_results.csv`;
}

/**
 * Write one scenario table to `<dir>/<scenario>_results.csv`
 */
export async function writeResultCsv(result: ScenarioResult, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, getCsvFileName(result));
  await writeFile(path, resultToCsv(result) + '\n', 'utf8');
  return path;
}
