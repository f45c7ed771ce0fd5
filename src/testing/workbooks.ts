import * as ExcelJS from 'exceljs';
import { Readable } from 'node:stream';
import * as XLSX from 'xlsx';
import { CellRegion, CellScalar, SourceSheet } from '../reconcile/reconcile.types';

export type CellMap = Record<string, CellScalar>;

/** In-memory source sheet from A1-style addresses. */
export function sourceSheet(cells: CellMap, merges: CellRegion[] = []): SourceSheet {
  const values = new Map<string, CellScalar>();
  let lastRow = 0;

  Object.entries(cells).forEach(([address, value]) => {
    const { r, c } = XLSX.utils.decode_cell(address);
    values.set(`${r + 1}:${c + 1}`, value);
    lastRow = Math.max(lastRow, r + 1);
  });
  merges.forEach((region) => {
    lastRow = Math.max(lastRow, region.bottom);
  });

  return {
    lastRow,
    merges,
    valueAt: (row, column) => values.get(`${row}:${column}`) ?? null,
  };
}

export function region(range: string): CellRegion {
  const { s, e } = XLSX.utils.decode_range(range);
  return { top: s.r + 1, left: s.c + 1, bottom: e.r + 1, right: e.c + 1 };
}

/** Supplier workbook bytes, written the way a spreadsheet app would save them. */
export function sourceWorkbookBuffer(cells: CellMap, merges: string[] = []): Buffer {
  const sheet: XLSX.WorkSheet = {};
  let maxRow = 0;
  let maxCol = 0;

  Object.entries(cells).forEach(([address, value]) => {
    const { r, c } = XLSX.utils.decode_cell(address);
    maxRow = Math.max(maxRow, r);
    maxCol = Math.max(maxCol, c);
    if (value === null) {
      return;
    }
    XLSX.utils.sheet_add_aoa(sheet, [[value]], { origin: address });
  });

  sheet['!ref'] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: maxRow, c: maxCol } });
  sheet['!merges'] = merges.map((range) => XLSX.utils.decode_range(range));

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Stock');
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}

/** Template worksheet; each row array starts at column A. */
export function templateWorkbook(rows: CellScalar[][]): {
  workbook: ExcelJS.Workbook;
  worksheet: ExcelJS.Worksheet;
} {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Stick List');

  rows.forEach((values, rowIndex) => {
    values.forEach((value, columnIndex) => {
      if (value !== null) {
        worksheet.getCell(rowIndex + 1, columnIndex + 1).value = value;
      }
    });
  });

  return { workbook, worksheet };
}

export async function templateWorkbookBuffer(rows: CellScalar[][]): Promise<Buffer> {
  const { workbook } = templateWorkbook(rows);
  const arrayBuffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(arrayBuffer);
}

export async function loadFirstWorksheet(buffer: Buffer): Promise<ExcelJS.Worksheet> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.read(Readable.from(buffer));
  return workbook.worksheets[0];
}

export const LEGACY_HEADER: CellScalar[] = ['#', 'Model', 'Blade', 'Flex', 'Left', 'Right'];
export const STYLED_HEADER: CellScalar[] = ['#', 'Model', 'Style/Color', 'Blade', 'Flex', 'Left', 'Right'];
