import { CellRegion, CellScalar, SourceSheet } from './reconcile.types';

export function regionContains(region: CellRegion, row: number, column: number): boolean {
  return (
    row >= region.top &&
    row <= region.bottom &&
    column >= region.left &&
    column <= region.right
  );
}

export function findMergedRegion(
  merges: readonly CellRegion[],
  row: number,
  column: number,
): CellRegion | undefined {
  return merges.find((region) => regionContains(region, row, column));
}

/** Value of a merged region's top-left cell, or the cell's own value outside any region. */
export function resolveMergedValue(sheet: SourceSheet, row: number, column: number): CellScalar {
  const region = findMergedRegion(sheet.merges, row, column);
  return region ? sheet.valueAt(region.top, region.left) : sheet.valueAt(row, column);
}
