import { TestCaseRecord } from '../models/test-case';
import { BASE_COLUMNS, EXTRA_COLUMNS, StatusValues, TabularData, TabularRow } from './export-types';

export function formatSteps(steps: readonly string[] | undefined): string {
  if (!steps) {
    return '';
  }
  return steps.map((step, index) => `${index + 1}. ${step}`).join('\n');
}

/**
 * Status set by a user wins over a `Status:` line in the generated text.
 */
export function resolveStatus(record: TestCaseRecord, statusValues: StatusValues): string {
  if (Object.hasOwn(statusValues, record.title)) {
    return statusValues[record.title];
  }
  return record.status ?? '';
}

export function toTabularRows(records: readonly TestCaseRecord[], statusValues: StatusValues = {}): TabularData {
  const extras = EXTRA_COLUMNS.filter(({ field }) => records.some(record => record[field] !== undefined));
  const columns = [...BASE_COLUMNS, ...extras.map(extra => extra.column)];

  const rows = records.map(record => {
    const row: TabularRow = {
      Section: record.section,
      Title: record.title,
      Scenario: record.scenario ?? '',
      Steps: formatSteps(record.steps),
      'Expected Result': record.expected_result ?? '',
      Status: resolveStatus(record, statusValues),
      'Actual Result': record.actual_result ?? '',
      Priority: record.priority ?? '',
    };
    for (const { column, field } of extras) {
      row[column] = record[field] ?? '';
    }
    return row;
  });

  return { columns, rows };
}
