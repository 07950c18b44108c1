import type { AggregateResult } from '../types/simulation.js';

export const CSV_HEADER = 'clients,time,calls,Algorithm';

export function toCsvRow(row: AggregateResult): string {
  return `${row.populationSize},${Math.trunc(row.avgElapsedTime)},${Math.trunc(row.avgWriteCalls)},${row.variant}`;
}

export function toCsv(rows: readonly AggregateResult[]): string {
  return `${[CSV_HEADER, ...rows.map(toCsvRow)].join('\n')}\n`;
}
