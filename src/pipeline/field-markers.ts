import { TestCaseField, TestCaseRecord, TextField } from '../models/test-case';

export interface FieldMarkerDefinition {
  field: TestCaseField;
  labels: string[];
}

export interface FieldMarkerMatch {
  field: TestCaseField;
  value: string;
}

export const FIELD_MARKERS: readonly FieldMarkerDefinition[] = [
  { field: 'title', labels: ['Title'] },
  { field: 'scenario', labels: ['Scenario'] },
  { field: 'preconditions', labels: ['Preconditions', 'Precondition', 'Pre-conditions'] },
  { field: 'steps', labels: ['Steps to reproduce', 'Test Steps', 'Steps'] },
  { field: 'expected_result', labels: ['Expected Results', 'Expected Result'] },
  { field: 'actual_result', labels: ['Actual Results', 'Actual Result'] },
  { field: 'status', labels: ['Status'] },
  { field: 'priority', labels: ['Priority'] },
  { field: 'test_data', labels: ['Test Data'] },
];

/**
 * Where an unmarked line goes when it follows free text. Reverse of the
 * prompt layout, so the field furthest down the record wins.
 */
export const CONTINUATION_ORDER: readonly TextField[] = [
  'test_data',
  'priority',
  'actual_result',
  'expected_result',
  'preconditions',
  'scenario',
];

export const STEPS_TO_REPRODUCE_LABEL = 'steps to reproduce';

function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/\s+/g, ' ').trim();
}

function labelPattern(label: string): string {
  return label
    .split(/\s+/)
    .map(part => part.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&'))
    .join('\\s+');
}

const fieldByLabel = new Map<string, TestCaseField>();
for (const marker of FIELD_MARKERS) {
  for (const label of marker.labels) {
    fieldByLabel.set(normalizeLabel(label), marker.field);
  }
}

const MARKER_REGEX = new RegExp(
  `^(?:#+\\s*)?(?:\\d+[.)]\\s*)?(${FIELD_MARKERS.flatMap(m => m.labels).map(labelPattern).join('|')})\\s*:\\s*(.*)$`,
  'i'
);

const STEP_ITEM_REGEX = /^(?:\d+[.)]|[-*•])\s*(.*)$/;
const HEADING_REGEX = /^#+/;
const HORIZONTAL_RULE_REGEX = /^(?:-{3,}|\*{3,}|_{3,})$/;
const TEST_CASE_ID_REGEX = /^TC_[A-Z]+_\d+/;

/**
 * Removes bold markup and surrounding whitespace.
 */
export function cleanFieldText(text: string): string {
  return text.replace(/\*\*/g, '').trim();
}

export function matchFieldMarker(line: string): FieldMarkerMatch | null {
  const match = MARKER_REGEX.exec(cleanFieldText(line));
  if (!match) {
    return null;
  }

  const field = fieldByLabel.get(normalizeLabel(match[1]));
  if (!field) {
    return null;
  }

  return { field, value: cleanFieldText(match[2]) };
}

/**
 * True when the line opens the long "Steps to reproduce:" form, which gates
 * block-mode parsing.
 */
export function isStepsToReproduceMarker(line: string): boolean {
  const match = MARKER_REGEX.exec(cleanFieldText(line));
  return !!match && normalizeLabel(match[1]) === STEPS_TO_REPRODUCE_LABEL;
}

/**
 * Returns the step text after a `1.`, `1)`, `-`, `*` or `•` item marker.
 */
export function matchStepItem(line: string): string | null {
  const match = STEP_ITEM_REGEX.exec(cleanFieldText(line));
  return match ? cleanFieldText(match[1]) : null;
}

export function isHeadingLine(line: string): boolean {
  return HEADING_REGEX.test(line.trim());
}

export function headingText(line: string): string {
  return cleanFieldText(line.trim().replace(HEADING_REGEX, ''));
}

export function isHorizontalRule(line: string): boolean {
  return HORIZONTAL_RULE_REGEX.test(line.replace(/\s+/g, ''));
}

export function isTestCaseIdLine(line: string): boolean {
  return TEST_CASE_ID_REGEX.test(cleanFieldText(line));
}

export function joinContinuation(existing: string, addition: string): string {
  if (!existing) {
    return addition;
  }
  return addition ? `${existing} ${addition}` : existing;
}

export function resolveContinuationTarget(record: Partial<TestCaseRecord>): TextField | null {
  return CONTINUATION_ORDER.find(field => record[field] !== undefined) ?? null;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
