import { ImportRowResult, ImportSummary } from '../interface/import-report.interface';

export function summarize(rows: readonly ImportRowResult[]): ImportSummary {
  const summary: ImportSummary = { created: 0, updated: 0, skipped: 0, failed: 0 };
  for (const row of rows) {
    summary[row.outcome] += 1;
  }
  return summary;
}
