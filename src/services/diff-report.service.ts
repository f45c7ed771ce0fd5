import { Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { CellScalar, DiffEntry, TemplateColumns, TemplateLayout } from '../reconcile/reconcile.types';
import { isBlank, readCell } from '../reconcile/worksheet-cells';
import { CsvRecord, ExcelService } from './excel.service';
import { TemplateReconcilerService, templateColumns } from './template-reconciler.service';

const DIFF_HEADER = ['row', 'column', 'template', 'generated'];

const COLUMN_NAMES: Array<[keyof TemplateColumns, string]> = [
  ['model', 'Model'],
  ['style', 'Style/Color'],
  ['blade', 'Blade'],
  ['flex', 'Flex'],
  ['left', 'Left'],
  ['right', 'Right'],
];

@Injectable()
export class DiffReportService {
  private readonly logger = new Logger(DiffReportService.name);

  constructor(
    private readonly excelService: ExcelService,
    private readonly templateReconciler: TemplateReconcilerService,
  ) {}

  /**
   * Cell-wise comparison of the untouched template with the generated sheet. The
   * original may predate the Style/Color column, in which case its style reads as blank.
   */
  compare(
    original: ExcelJS.Worksheet,
    generated: ExcelJS.Worksheet,
    layout: TemplateLayout,
  ): DiffEntry[] {
    const hasStyle = this.templateReconciler.hasStyleColumn(original, layout);
    const legacy = templateColumns(layout.modelColumn, hasStyle);
    const originalColumns: Partial<TemplateColumns> = hasStyle
      ? legacy
      : { ...legacy, style: undefined };
    const generatedColumns = templateColumns(layout.modelColumn);

    const lastRow = this.templateReconciler.lastPopulatedRow(
      original,
      originalColumns,
      layout.headerRow,
    );
    const diffs: DiffEntry[] = [];

    for (let row = 1; row <= lastRow; row += 1) {
      COLUMN_NAMES.forEach(([field, name]) => {
        const originalColumn = originalColumns[field];
        const before = originalColumn === undefined ? null : readCell(original, row, originalColumn);
        const after = readCell(generated, row, generatedColumns[field]);

        if (isBlank(before) && isBlank(after)) {
          return;
        }
        if (!this.sameValue(before, after)) {
          diffs.push({ row, column: name, template: before, generated: after });
        }
      });
    }

    this.logger.debug(`Diff report: ${diffs.length} changed cells over ${lastRow} rows`);
    return diffs;
  }

  toCsv(diffs: DiffEntry[]): string {
    const records: CsvRecord[] = diffs.map((diff) => ({
      row: diff.row,
      column: diff.column,
      template: this.csvValue(diff.template),
      generated: this.csvValue(diff.generated),
    }));
    return this.excelService.renderCsv(DIFF_HEADER, records);
  }

  private sameValue(before: CellScalar, after: CellScalar): boolean {
    if (before instanceof Date && after instanceof Date) {
      return before.getTime() === after.getTime();
    }
    return before === after;
  }

  private csvValue(value: CellScalar): string | number | boolean | null {
    return value instanceof Date ? value.toISOString() : value;
  }
}
