import { TestCaseRecord, TextField } from '../models/test-case';
import { SourceType } from '../models/test-case-document';

export type StatusValues = Record<string, string>;

export const NOT_TESTED = 'Not Tested';

export const BASE_COLUMNS = [
  'Section',
  'Title',
  'Scenario',
  'Steps',
  'Expected Result',
  'Status',
  'Actual Result',
  'Priority',
] as const;

// Appended after the base columns when any record carries them
export const EXTRA_COLUMNS: ReadonlyArray<{ column: string; field: TextField }> = [
  { column: 'Preconditions', field: 'preconditions' },
  { column: 'Test Data', field: 'test_data' },
];

export type TabularRow = Record<string, string>;

export interface TabularData {
  columns: string[];
  rows: TabularRow[];
}

export interface ExportDocument {
  url_key?: string;
  source_type: SourceType;
  item_ids: string[];
  test_data: TestCaseRecord[];
  status: StatusValues;
}

export const PRIORITY_COLORS: Record<string, { bg: string; text: string }> = {
  critical: { bg: 'FDECEA', text: 'D94841' },
  high: { bg: 'FDECEA', text: 'D94841' },
  medium: { bg: 'FDF3E7', text: 'D97706' },
  low: { bg: 'E7F5EE', text: '0F766E' },
};

export const STATUS_COLORS: Record<string, { bg: string; text: string }> = {
  pass: { bg: 'E7F5EE', text: '0F766E' },
  passed: { bg: 'E7F5EE', text: '0F766E' },
  fail: { bg: 'FDECEA', text: 'D94841' },
  failed: { bg: 'FDECEA', text: 'D94841' },
  blocked: { bg: 'FDF3E7', text: 'D97706' },
  'not tested': { bg: 'F3F0ED', text: '7A6F65' },
};
