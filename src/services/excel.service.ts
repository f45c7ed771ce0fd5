import { BadRequestException, Injectable } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { Readable } from 'node:stream';
import * as XLSX from 'xlsx';
import { CellRegion, CellScalar, SourceSheet } from '../reconcile/reconcile.types';

export type CsvRecord = Record<string, string | number | boolean | null>;

@Injectable()
export class ExcelService {
  /**
   * Reads the first worksheet of the supplier workbook. Cached formula results are
   * used as values, merged ranges are kept so callers can resolve them.
   */
  readSourceSheet(buffer: Buffer): SourceSheet {
    const workbook = XLSX.read(buffer, { type: 'buffer' });

    if (!workbook.SheetNames.length) {
      throw new BadRequestException('Source workbook has no sheets');
    }

    return this.toSourceSheet(workbook.Sheets[workbook.SheetNames[0]]);
  }

  toSourceSheet(sheet: XLSX.WorkSheet): SourceSheet {
    const ref = sheet['!ref'];
    const lastRow = ref ? XLSX.utils.decode_range(ref).e.r + 1 : 0;
    const merges: CellRegion[] = (sheet['!merges'] ?? []).map((range) => ({
      top: range.s.r + 1,
      left: range.s.c + 1,
      bottom: range.e.r + 1,
      right: range.e.c + 1,
    }));

    return {
      lastRow,
      merges,
      valueAt: (row, column) => {
        const cell: XLSX.CellObject | undefined =
          sheet[XLSX.utils.encode_cell({ r: row - 1, c: column - 1 })];
        return this.sourceCellValue(cell);
      },
    };
  }

  async loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from(buffer));
    return workbook;
  }

  firstWorksheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet {
    const worksheet = workbook.worksheets[0];
    if (!worksheet) {
      throw new BadRequestException('Template workbook has no sheets');
    }
    return worksheet;
  }

  async writeWorkbook(workbook: ExcelJS.Workbook): Promise<Buffer> {
    const arrayBuffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(arrayBuffer);
  }

  renderCsv(header: string[], records: CsvRecord[]): string {
    const sheet = XLSX.utils.json_to_sheet(records, { header });
    return XLSX.utils.sheet_to_csv(sheet);
  }

  private sourceCellValue(cell: XLSX.CellObject | undefined): CellScalar {
    if (!cell || cell.t === 'e' || cell.t === 'z') {
      return null;
    }
    return cell.v ?? null;
  }
}
