import * as ExcelJS from 'exceljs';
import { CellScalar } from './reconcile.types';

/** Unwraps rich text, hyperlinks and cached formula results to a plain value. */
export function cellScalar(value: ExcelJS.CellValue): CellScalar {
  if (value == null) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('error' in value) {
    return null;
  }

  const result = value.result;
  if (
    typeof result === 'string' ||
    typeof result === 'number' ||
    typeof result === 'boolean' ||
    result instanceof Date
  ) {
    return result;
  }
  return null;
}

export function readCell(worksheet: ExcelJS.Worksheet, row: number, column: number): CellScalar {
  return cellScalar(worksheet.getCell(row, column).value);
}

export function isBlank(value: CellScalar): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}
