import { BadRequestException } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { sourceWorkbookBuffer, templateWorkbook } from '../testing/workbooks';
import { ExcelService } from './excel.service';

describe('ExcelService', () => {
  const service = new ExcelService();

  describe('readSourceSheet', () => {
    it('exposes values, merges and the last row of the first sheet', () => {
      const buffer = sourceWorkbookBuffer(
        { B5: 'FT8 Pro (RED)', C5: 'L92', D5: '85', E5: 10, D6: '85', E6: 5, F6: 3 },
        ['B5:B6', 'C5:C6'],
      );

      const sheet = service.readSourceSheet(buffer);

      expect(sheet.lastRow).toBe(6);
      expect(sheet.merges).toEqual([
        { top: 5, left: 2, bottom: 6, right: 2 },
        { top: 5, left: 3, bottom: 6, right: 3 },
      ]);
      expect(sheet.valueAt(5, 2)).toBe('FT8 Pro (RED)');
      expect(sheet.valueAt(5, 5)).toBe(10);
      expect(sheet.valueAt(6, 6)).toBe(3);
      expect(sheet.valueAt(6, 2)).toBeNull();
    });

    it('reports an empty sheet as having no rows', () => {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(workbook, {}, 'Empty');

      const sheet = service.toSourceSheet(workbook.Sheets.Empty);

      expect(sheet.lastRow).toBe(0);
      expect(sheet.merges).toEqual([]);
    });
  });

  describe('workbook round trip', () => {
    it('writes and reloads a template workbook', async () => {
      const { workbook } = templateWorkbook([['#', 'Model'], [1, 'Vapor']]);

      const buffer = await service.writeWorkbook(workbook);
      const reloaded = service.firstWorksheet(await service.loadWorkbook(buffer));

      expect(reloaded.getCell(2, 2).value).toBe('Vapor');
    });

    it('rejects a workbook without worksheets', () => {
      const { workbook, worksheet } = templateWorkbook([]);
      workbook.removeWorksheet(worksheet.id);

      expect(() => service.firstWorksheet(workbook)).toThrow(BadRequestException);
    });
  });

  describe('renderCsv', () => {
    it('writes a header and one line per record', () => {
      const csv = service.renderCsv(
        ['row', 'column', 'template', 'generated'],
        [{ row: 2, column: 'Left', template: null, generated: 15 }],
      );

      expect(csv.split('\n')).toEqual(['row,column,template,generated', '2,Left,,15']);
    });
  });
});
