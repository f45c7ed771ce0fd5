import { Injectable, Logger } from '@nestjs/common';
import { canonicalKeyId } from '../reconcile/canonical-key';
import { resolveMergedValue } from '../reconcile/merged-regions';
import {
  AggregationResult,
  FillDownState,
  InventoryEntry,
  InventoryMap,
  SourceBlock,
  SourceEntry,
  SourceLayout,
  SourceSheet,
} from '../reconcile/reconcile.types';
import {
  isDefectAnnotated,
  normalizeBlade,
  normalizeStyle,
  normalizeText,
  parseFlex,
  parseQuantity,
  splitModelAndStyle,
} from '../reconcile/value-normalizer';

export interface AggregateOptions {
  defectExclusion: boolean;
}

export type SourceRowOutcome = 'blank' | 'incomplete' | 'entry';

export interface SourceRowStep {
  state: FillDownState;
  outcome: SourceRowOutcome;
  entry?: SourceEntry;
  excluded: number;
}

interface SideSums {
  entry: SourceEntry;
  left: number;
  right: number;
}

@Injectable()
export class InventoryAggregatorService {
  private readonly logger = new Logger(InventoryAggregatorService.name);

  aggregate(
    sheet: SourceSheet,
    layout: SourceLayout,
    options: AggregateOptions,
  ): AggregationResult {
    const entries: SourceEntry[] = [];
    let rowsScanned = 0;
    let rowsIncomplete = 0;
    let quantitiesExcluded = 0;

    layout.blocks.forEach((block, index) => {
      // Each block keeps its own fill-down memory.
      let state: FillDownState = {};
      let blockEntries = 0;

      for (let row = layout.firstDataRow; row <= sheet.lastRow; row += 1) {
        const step = this.readSourceRow(sheet, block, row, state, options);
        state = step.state;
        rowsScanned += 1;
        quantitiesExcluded += step.excluded;

        if (step.outcome === 'incomplete') {
          rowsIncomplete += 1;
        } else if (step.entry) {
          entries.push(step.entry);
          blockEntries += 1;
        }
      }

      this.logger.debug(`Block ${index + 1}: ${blockEntries} contributing rows`);
    });

    const inventory = this.sumEntries(entries);

    if (!entries.length) {
      this.logger.warn('No contributing rows found in source sheet');
    }

    return {
      inventory,
      stats: {
        rowsScanned,
        rowsContributing: entries.length,
        rowsIncomplete,
        quantitiesExcluded,
        keys: inventory.size,
      },
    };
  }

  /** One row of one block: the next fill-down state plus what the row contributes. */
  readSourceRow(
    sheet: SourceSheet,
    block: SourceBlock,
    row: number,
    state: FillDownState,
    options: AggregateOptions,
  ): SourceRowStep {
    const modelHere = normalizeText(resolveMergedValue(sheet, row, block.model));
    const bladeHere = normalizeBlade(resolveMergedValue(sheet, row, block.blade));
    const flexValue = sheet.valueAt(row, block.flex);
    const leftValue = sheet.valueAt(row, block.left);
    const rightValue = sheet.valueAt(row, block.right);

    const next: FillDownState = {
      model: modelHere ?? state.model,
      blade: bladeHere ?? state.blade,
    };

    const { base, style } = splitModelAndStyle(next.model);
    const flex = parseFlex(flexValue);

    if (!base || !next.blade || flex === undefined) {
      const touched = [modelHere, bladeHere, flexValue, leftValue, rightValue].some(
        (value) => normalizeText(value) !== undefined,
      );
      return { state: next, outcome: touched ? 'incomplete' : 'blank', excluded: 0 };
    }

    const left = parseQuantity(leftValue, options.defectExclusion);
    const right = parseQuantity(rightValue, options.defectExclusion);
    const excluded = options.defectExclusion
      ? [leftValue, rightValue].filter((value) => isDefectAnnotated(value)).length
      : 0;

    return {
      state: next,
      outcome: 'entry',
      excluded,
      entry: {
        rowNumber: row,
        key: { model: base, style: normalizeStyle(style), blade: next.blade, flex },
        left,
        right,
      },
    };
  }

  /** Order of entries does not affect the result. */
  sumEntries(entries: SourceEntry[]): InventoryMap {
    const sums = new Map<string, SideSums>();

    entries.forEach((entry) => {
      const id = canonicalKeyId(entry.key);
      const current = sums.get(id) ?? { entry, left: 0, right: 0 };
      current.left += entry.left ?? 0;
      current.right += entry.right ?? 0;
      sums.set(id, current);
    });

    const inventory = new Map<string, InventoryEntry>();
    sums.forEach((sum, id) => {
      inventory.set(id, {
        key: sum.entry.key,
        total: {
          left: sum.left > 0 ? sum.left : null,
          right: sum.right > 0 ? sum.right : null,
        },
      });
    });

    return inventory;
  }
}
