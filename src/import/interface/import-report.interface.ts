import { PropertyMatchKey } from '../constants/import.constants';

export type ImportRowOutcome = 'created' | 'updated' | 'skipped' | 'failed';

export interface ImportRowResult {
  line: number;
  outcome: ImportRowOutcome;
  // Natural key of the record, when the row got far enough to have one
  label?: string;
  reason?: string;
}

export interface ImportSummary {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface ImportReport {
  filePath: string;
  summary: ImportSummary;
  rows: ImportRowResult[];
}

export interface ImportPropertiesOptions {
  skipLocation?: boolean;
  matchOn?: PropertyMatchKey;
}

export interface BooleanTokens {
  truthy: readonly string[];
  falsy: readonly string[];
}
