import {
  AggregationStats,
  CanonicalKey,
  ReconcileSummary,
} from '../reconcile/reconcile.types';

export interface StickListOptions {
  defectExclusion: boolean;
  filldown: boolean;
  diffReport: boolean;
}

export interface DiffReport {
  fileName: string;
  csv: string;
  differences: number;
}

export interface StickListRun {
  fileName: string;
  workbook: Buffer;
  diffReport?: DiffReport;
  aggregation: AggregationStats;
  reconciliation: ReconcileSummary;
}

export interface KeyRow {
  rowNumber?: number;
  model: string;
  style: string;
  blade: string;
  flex: number;
}

export interface StickListResponse {
  fileName: string;
  workbookBase64: string;
  diffReport?: DiffReport;
  summary: {
    keysAggregated: number;
    rowsContributing: number;
    rowsIncompleteInSource: number;
    quantitiesExcluded: number;
    styleColumnInserted: boolean;
    rowsMatched: number;
    rowsIncompleteInTemplate: number;
    unmatched: KeyRow[];
    unplaced: KeyRow[];
  };
}

export function toKeyRow(key: CanonicalKey, rowNumber?: number): KeyRow {
  return {
    rowNumber,
    model: key.model,
    style: key.style ?? '',
    blade: key.blade,
    flex: key.flex,
  };
}
