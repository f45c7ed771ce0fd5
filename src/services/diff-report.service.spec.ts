import { APP_CONFIG } from '../config/stick-list.config';
import { canonicalKeyId } from '../reconcile/canonical-key';
import { LEGACY_HEADER, STYLED_HEADER, templateWorkbook } from '../testing/workbooks';
import { DiffReportService } from './diff-report.service';
import { ExcelService } from './excel.service';
import { TemplateReconcilerService } from './template-reconciler.service';

const layout = APP_CONFIG.templateLayout;

describe('DiffReportService', () => {
  const reconciler = new TemplateReconcilerService();
  const service = new DiffReportService(new ExcelService(), reconciler);
  const key = { model: 'FT8 Pro', style: 'RED', blade: 'L92', flex: 85 };
  const inventory = new Map([[canonicalKeyId(key), { key, total: { left: 15, right: 3 } }]]);

  it('compares a legacy template against the migrated output', () => {
    const rows = [LEGACY_HEADER, [1, 'FT8 Pro (RED)', 'L92', '85', 1, null]];
    const original = templateWorkbook(rows).worksheet;
    const generated = templateWorkbook(rows).worksheet;
    reconciler.reconcile(generated, inventory, layout, { filldown: true });

    const diffs = service.compare(original, generated, layout);

    expect(diffs).toEqual([
      { row: 1, column: 'Style/Color', template: null, generated: 'Style/Color' },
      { row: 2, column: 'Model', template: 'FT8 Pro (RED)', generated: 'FT8 Pro' },
      { row: 2, column: 'Style/Color', template: null, generated: 'RED' },
      { row: 2, column: 'Left', template: 1, generated: 15 },
      { row: 2, column: 'Right', template: null, generated: 3 },
    ]);
    expect(service.toCsv(diffs).split('\n')).toEqual([
      'row,column,template,generated',
      '1,Style/Color,,Style/Color',
      '2,Model,FT8 Pro (RED),FT8 Pro',
      '2,Style/Color,,RED',
      '2,Left,1,15',
      '2,Right,,3',
    ]);
  });

  it('reports nothing when the output equals the template', () => {
    const rows = [STYLED_HEADER, [1, 'FT8 Pro', 'RED', 'L92', 85, 15, 3]];
    const original = templateWorkbook(rows).worksheet;
    const generated = templateWorkbook(rows).worksheet;
    reconciler.reconcile(generated, inventory, layout, { filldown: true });

    expect(service.compare(original, generated, layout)).toEqual([]);
  });
});
