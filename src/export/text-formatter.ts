import { TestCaseRecord } from '../models/test-case';
import { SECTION_MARKER } from '../pipeline/section-splitter';
import { StatusValues } from './export-types';
import { resolveStatus } from './tabular-rows';

function formatRecord(record: TestCaseRecord, statusValues: StatusValues): string {
  const lines = [`Title: ${record.title}`];

  if (record.scenario !== undefined) lines.push(`Scenario: ${record.scenario}`);
  if (record.preconditions !== undefined) lines.push(`Preconditions: ${record.preconditions}`);
  if (record.steps !== undefined) {
    lines.push('Steps to reproduce:');
    record.steps.forEach((step, index) => lines.push(`${index + 1}. ${step}`));
  }
  if (record.expected_result !== undefined) lines.push(`Expected Result: ${record.expected_result}`);
  if (record.actual_result !== undefined) lines.push(`Actual Result: ${record.actual_result}`);

  const status = resolveStatus(record, statusValues);
  if (status) lines.push(`Status: ${status}`);

  if (record.priority !== undefined) lines.push(`Priority: ${record.priority}`);
  if (record.test_data !== undefined) lines.push(`Test Data: ${record.test_data}`);

  return lines.join('\n');
}

/**
 * Renders records in the layout the generation prompt asks for, grouped
 * under `TEST TYPE:` headers in order of first appearance.
 */
export function formatTestCasesAsText(records: readonly TestCaseRecord[], statusValues: StatusValues = {}): string {
  const bySection = new Map<string, TestCaseRecord[]>();
  for (const record of records) {
    const group = bySection.get(record.section) ?? [];
    group.push(record);
    bySection.set(record.section, group);
  }

  const sections: string[] = [];
  for (const [section, group] of bySection) {
    const body = group.map(record => formatRecord(record, statusValues)).join('\n\n');
    sections.push(`${SECTION_MARKER} ${section}\n\n${body}`);
  }

  return sections.join('\n\n');
}
