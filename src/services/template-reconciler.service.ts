import { Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { canonicalKeyId, describeKey } from '../reconcile/canonical-key';
import {
  FillDownState,
  InventoryMap,
  ReconcileSummary,
  TemplateColumns,
  TemplateLayout,
} from '../reconcile/reconcile.types';
import {
  normalizeBlade,
  normalizeStyle,
  normalizeText,
  parseFlex,
  splitModelAndStyle,
} from '../reconcile/value-normalizer';
import { isBlank, readCell } from '../reconcile/worksheet-cells';

export interface ReconcileOptions {
  filldown: boolean;
}

export interface StyleColumnResult {
  columns: TemplateColumns;
  inserted: boolean;
}

/** Values a template row supplies on its own, before any fill-down. */
export interface TemplateRowLabels {
  model?: string;
  style?: string;
  blade?: string;
}

const STYLE_HEADER_HINTS = ['style', 'color'];

export function templateColumns(modelColumn: number, hasStyleColumn = true): TemplateColumns {
  const offset = hasStyleColumn ? 1 : 0;
  return {
    model: modelColumn,
    style: modelColumn + 1,
    blade: modelColumn + 1 + offset,
    flex: modelColumn + 2 + offset,
    left: modelColumn + 3 + offset,
    right: modelColumn + 4 + offset,
  };
}

/**
 * Running labels for the next row. A row that names a new model without naming a
 * style drops the previous model's style.
 */
export function advanceFillDown(state: FillDownState, here: TemplateRowLabels): FillDownState {
  const modelChanged = here.model !== undefined && here.model !== state.model;
  const inheritedStyle = modelChanged && here.style === undefined ? undefined : state.style;

  return {
    model: here.model ?? state.model,
    style: here.style ?? inheritedStyle,
    blade: here.blade ?? state.blade,
  };
}

@Injectable()
export class TemplateReconcilerService {
  private readonly logger = new Logger(TemplateReconcilerService.name);

  hasStyleColumn(worksheet: ExcelJS.Worksheet, layout: TemplateLayout): boolean {
    const header = normalizeText(readCell(worksheet, layout.headerRow, layout.modelColumn + 1));
    const lowered = header?.toLowerCase() ?? '';
    return STYLE_HEADER_HINTS.some((hint) => lowered.includes(hint));
  }

  ensureStyleColumn(worksheet: ExcelJS.Worksheet, layout: TemplateLayout): StyleColumnResult {
    const columns = templateColumns(layout.modelColumn);
    if (this.hasStyleColumn(worksheet, layout)) {
      return { columns, inserted: false };
    }

    worksheet.spliceColumns(columns.style, 0, []);

    for (let row = 1; row <= worksheet.rowCount; row += 1) {
      const source = worksheet.getCell(row, columns.model);
      const target = worksheet.getCell(row, columns.style);
      target.style = structuredClone(source.style);
    }
    worksheet.getCell(layout.headerRow, columns.style).value = layout.styleHeader;

    const modelWidth = worksheet.getColumn(columns.model).width;
    if (modelWidth !== undefined) {
      worksheet.getColumn(columns.style).width = modelWidth;
    }

    this.logger.log(`Inserted "${layout.styleHeader}" column at position ${columns.style}`);
    return { columns, inserted: true };
  }

  lastPopulatedRow(
    worksheet: ExcelJS.Worksheet,
    columns: Partial<TemplateColumns>,
    headerRow: number,
  ): number {
    const relevant = Object.values(columns).filter(
      (column): column is number => column !== undefined,
    );
    let lastRow = worksheet.rowCount;

    while (
      lastRow > headerRow &&
      relevant.every((column) => isBlank(readCell(worksheet, lastRow, column)))
    ) {
      lastRow -= 1;
    }

    return lastRow;
  }

  reconcile(
    worksheet: ExcelJS.Worksheet,
    inventory: InventoryMap,
    layout: TemplateLayout,
    options: ReconcileOptions,
  ): ReconcileSummary {
    const { columns, inserted } = this.ensureStyleColumn(worksheet, layout);
    const lastRow = this.lastPopulatedRow(worksheet, columns, layout.headerRow);

    const summary: ReconcileSummary = {
      styleColumnInserted: inserted,
      lastRow,
      rowsMatched: 0,
      rowsUnmatched: [],
      rowsIncomplete: 0,
      unplacedKeys: [],
    };

    if (lastRow < layout.firstDataRow) {
      this.logger.warn('Template has no data rows');
    }

    // Clear every quantity first so nothing from the template survives unmatched.
    for (let row = layout.firstDataRow; row <= lastRow; row += 1) {
      worksheet.getCell(row, columns.left).value = null;
      worksheet.getCell(row, columns.right).value = null;
    }

    const placed = new Set<string>();
    let state: FillDownState = {};

    for (let row = layout.firstDataRow; row <= lastRow; row += 1) {
      state = this.reconcileRow(worksheet, row, columns, state, inventory, options, summary, placed);
    }

    inventory.forEach((entry, id) => {
      if (!placed.has(id)) {
        summary.unplacedKeys.push(entry.key);
      }
    });

    this.logger.debug(
      `Reconciled rows ${layout.firstDataRow}-${lastRow}. Matched=${summary.rowsMatched}, Unmatched=${summary.rowsUnmatched.length}, Incomplete=${summary.rowsIncomplete}, Unplaced keys=${summary.unplacedKeys.length}`,
    );

    return summary;
  }

  private reconcileRow(
    worksheet: ExcelJS.Worksheet,
    row: number,
    columns: TemplateColumns,
    state: FillDownState,
    inventory: InventoryMap,
    options: ReconcileOptions,
    summary: ReconcileSummary,
    placed: Set<string>,
  ): FillDownState {
    const modelCell = worksheet.getCell(row, columns.model);
    const styleCell = worksheet.getCell(row, columns.style);
    const bladeCell = worksheet.getCell(row, columns.blade);

    const { base: modelHere, style: styleFromModel } = splitModelAndStyle(
      readCell(worksheet, row, columns.model),
    );
    const styleCellHere = normalizeStyle(readCell(worksheet, row, columns.style));
    const extractedStyle = normalizeStyle(styleFromModel);
    const here: TemplateRowLabels = {
      model: modelHere,
      style: styleCellHere ?? extractedStyle,
      blade: normalizeBlade(readCell(worksheet, row, columns.blade)),
    };
    const flex = parseFlex(readCell(worksheet, row, columns.flex));

    // Legacy rows carry the style inside the model label.
    if (modelHere && extractedStyle) {
      modelCell.value = modelHere;
    }

    const next = advanceFillDown(state, here);
    const working: TemplateRowLabels = options.filldown ? next : here;

    if (options.filldown) {
      if (!here.model && working.model) {
        modelCell.value = working.model;
      }
      if (!styleCellHere && working.style) {
        styleCell.value = working.style;
      }
      if (!here.blade && working.blade) {
        bladeCell.value = working.blade;
      }
    }

    if (!working.model || !working.blade || flex === undefined) {
      if (here.model || here.blade || flex !== undefined) {
        summary.rowsIncomplete += 1;
      }
      return next;
    }

    const key = { model: working.model, style: working.style, blade: working.blade, flex };
    const id = canonicalKeyId(key);
    const entry = inventory.get(id);

    if (!entry) {
      summary.rowsUnmatched.push({ rowNumber: row, key });
      this.logger.debug(`Row ${row}: no stock recorded for ${describeKey(key)}`);
      return next;
    }

    placed.add(id);
    summary.rowsMatched += 1;
    worksheet.getCell(row, columns.left).value = entry.total.left;
    worksheet.getCell(row, columns.right).value = entry.total.right;
    return next;
  }
}
