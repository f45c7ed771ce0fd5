export type CellScalar = string | number | boolean | Date | null;

/** Identity of a stock-keeping unit shared by the source sheet and the template. */
export interface CanonicalKey {
  model: string;
  style?: string;
  blade: string;
  flex: number;
}

/** A side is `null` when nothing positive was recorded for it. */
export interface InventoryTotal {
  left: number | null;
  right: number | null;
}

export interface InventoryEntry {
  key: CanonicalKey;
  total: InventoryTotal;
}

/** Keyed by `canonicalKeyId`. */
export type InventoryMap = ReadonlyMap<string, InventoryEntry>;

/** 1-based, inclusive rectangle. */
export interface CellRegion {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

/** Read-only view of the supplier sheet. Rows and columns are 1-based. */
export interface SourceSheet {
  readonly lastRow: number;
  readonly merges: readonly CellRegion[];
  valueAt(row: number, column: number): CellScalar;
}

export interface SourceBlock {
  model: number;
  blade: number;
  flex: number;
  left: number;
  right: number;
}

export interface SourceLayout {
  firstDataRow: number;
  blocks: SourceBlock[];
}

export interface TemplateLayout {
  headerRow: number;
  firstDataRow: number;
  modelColumn: number;
  styleHeader: string;
}

export interface TemplateColumns {
  model: number;
  style: number;
  blade: number;
  flex: number;
  left: number;
  right: number;
}

export interface FillDownState {
  model?: string;
  style?: string;
  blade?: string;
}

export interface SourceEntry {
  rowNumber: number;
  key: CanonicalKey;
  left?: number;
  right?: number;
}

export interface AggregationStats {
  rowsScanned: number;
  rowsContributing: number;
  rowsIncomplete: number;
  quantitiesExcluded: number;
  keys: number;
}

export interface AggregationResult {
  inventory: InventoryMap;
  stats: AggregationStats;
}

export interface UnmatchedRow {
  rowNumber: number;
  key: CanonicalKey;
}

export interface ReconcileSummary {
  styleColumnInserted: boolean;
  lastRow: number;
  rowsMatched: number;
  rowsUnmatched: UnmatchedRow[];
  rowsIncomplete: number;
  unplacedKeys: CanonicalKey[];
}

export interface DiffEntry {
  row: number;
  column: string;
  template: CellScalar;
  generated: CellScalar;
}
