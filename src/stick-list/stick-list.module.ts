import { Module } from '@nestjs/common';
import { DiffReportService } from '../services/diff-report.service';
import { ExcelService } from '../services/excel.service';
import { InventoryAggregatorService } from '../services/inventory-aggregator.service';
import { TemplateReconcilerService } from '../services/template-reconciler.service';
import { StickListController } from './stick-list.controller';
import { StickListService } from './stick-list.service';

@Module({
  controllers: [StickListController],
  providers: [
    ExcelService,
    InventoryAggregatorService,
    TemplateReconcilerService,
    DiffReportService,
    StickListService,
  ],
})
export class StickListModule {}
