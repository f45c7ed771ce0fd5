import { SourceLayout, TemplateLayout } from '../reconcile/reconcile.types';

export interface RunDefaults {
  defectExclusion: boolean;
  filldown: boolean;
  diffReport: boolean;
}

export interface AppConfig {
  port: number;
  openUiOnStart: boolean;
  uploadLimitBytes: number;
  defaultTemplatePath: string;
  outputFilePrefix: string;
  outputTimeZone: string;
  diffFileName: string;
  defaults: RunDefaults;
  sourceLayout: SourceLayout;
  templateLayout: TemplateLayout;
}

// Runtime configuration.

export const APP_CONFIG: AppConfig = {
  port: 3000,
  openUiOnStart: true,
  uploadLimitBytes: 10 * 1024 * 1024,
  defaultTemplatePath: 'templates/stick-list-template.xlsx',
  outputFilePrefix: 'Stick_List',
  outputTimeZone: 'America/New_York',
  diffFileName: 'diff_report.csv',
  defaults: {
    defectExclusion: true,
    filldown: true,
    diffReport: false,
  },
  // Three stick blocks: B-F, H-L, N-R. Headers on row 4.
  sourceLayout: {
    firstDataRow: 5,
    blocks: [
      { model: 2, blade: 3, flex: 4, left: 5, right: 6 },
      { model: 8, blade: 9, flex: 10, left: 11, right: 12 },
      { model: 14, blade: 15, flex: 16, left: 17, right: 18 },
    ],
  },
  templateLayout: {
    headerRow: 1,
    firstDataRow: 2,
    modelColumn: 2,
    styleHeader: 'Style/Color',
  },
};
