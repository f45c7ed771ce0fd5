import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { access, readFile } from 'node:fs/promises';
import { APP_CONFIG, AppConfig } from '../config/stick-list.config';
import { DiffReportService } from '../services/diff-report.service';
import { ExcelService } from '../services/excel.service';
import { InventoryAggregatorService } from '../services/inventory-aggregator.service';
import { TemplateReconcilerService } from '../services/template-reconciler.service';
import { StickListOptions, StickListResponse, StickListRun, toKeyRow } from './stick-list.types';

@Injectable()
export class StickListService {
  private readonly logger = new Logger(StickListService.name);
  private readonly config: AppConfig;

  constructor(
    private readonly excelService: ExcelService,
    private readonly aggregator: InventoryAggregatorService,
    private readonly reconciler: TemplateReconcilerService,
    private readonly diffReporter: DiffReportService,
  ) {
    this.config = APP_CONFIG;
  }

  resolveOptions(overrides: Partial<StickListOptions>): StickListOptions {
    return {
      defectExclusion: overrides.defectExclusion ?? this.config.defaults.defectExclusion,
      filldown: overrides.filldown ?? this.config.defaults.filldown,
      diffReport: overrides.diffReport ?? this.config.defaults.diffReport,
    };
  }

  async transform(
    source: Buffer,
    template: Buffer | undefined,
    options: StickListOptions,
    now: Date = new Date(),
  ): Promise<StickListRun> {
    const templateBuffer = template ?? (await this.readDefaultTemplate());

    const sourceSheet = this.excelService.readSourceSheet(source);
    const { inventory, stats } = this.aggregator.aggregate(sourceSheet, this.config.sourceLayout, {
      defectExclusion: options.defectExclusion,
    });
    this.logger.log(
      `Aggregated ${stats.keys} keys from ${stats.rowsContributing} rows (excluded quantities=${stats.quantitiesExcluded})`,
    );

    const workbook = await this.excelService.loadWorkbook(templateBuffer);
    const worksheet = this.excelService.firstWorksheet(workbook);
    const reconciliation = this.reconciler.reconcile(
      worksheet,
      inventory,
      this.config.templateLayout,
      { filldown: options.filldown },
    );
    const output = await this.excelService.writeWorkbook(workbook);

    const run: StickListRun = {
      fileName: this.buildOutputFileName(now),
      workbook: output,
      aggregation: stats,
      reconciliation,
    };

    if (options.diffReport) {
      const pristine = await this.excelService.loadWorkbook(templateBuffer);
      const diffs = this.diffReporter.compare(
        this.excelService.firstWorksheet(pristine),
        worksheet,
        this.config.templateLayout,
      );
      run.diffReport = {
        fileName: this.config.diffFileName,
        csv: this.diffReporter.toCsv(diffs),
        differences: diffs.length,
      };
    }

    this.logger.log(
      `Stick list complete. Matched=${reconciliation.rowsMatched}, Unmatched=${reconciliation.rowsUnmatched.length}, Unplaced=${reconciliation.unplacedKeys.length}`,
    );

    return run;
  }

  toResponse(run: StickListRun): StickListResponse {
    return {
      fileName: run.fileName,
      workbookBase64: run.workbook.toString('base64'),
      diffReport: run.diffReport,
      summary: {
        keysAggregated: run.aggregation.keys,
        rowsContributing: run.aggregation.rowsContributing,
        rowsIncompleteInSource: run.aggregation.rowsIncomplete,
        quantitiesExcluded: run.aggregation.quantitiesExcluded,
        styleColumnInserted: run.reconciliation.styleColumnInserted,
        rowsMatched: run.reconciliation.rowsMatched,
        rowsIncompleteInTemplate: run.reconciliation.rowsIncomplete,
        unmatched: run.reconciliation.rowsUnmatched.map((row) => toKeyRow(row.key, row.rowNumber)),
        unplaced: run.reconciliation.unplacedKeys.map((key) => toKeyRow(key)),
      },
    };
  }

  /** `Stick_List_YYYY-MM-DD.xlsx`, dated in the configured time zone. */
  buildOutputFileName(now: Date): string {
    const parts = new Intl.DateTimeFormat('en-US', {
      timeZone: this.config.outputTimeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    }).formatToParts(now);
    const part = (type: Intl.DateTimeFormatPartTypes): string =>
      parts.find((entry) => entry.type === type)?.value ?? '';

    return `${this.config.outputFilePrefix}_${part('year')}-${part('month')}-${part('day')}.xlsx`;
  }

  private async readDefaultTemplate(): Promise<Buffer> {
    const path = this.config.defaultTemplatePath;

    try {
      await access(path);
    } catch {
      throw new BadRequestException(
        `No template uploaded and default template not found at ${path}`,
      );
    }

    return readFile(path);
  }
}
