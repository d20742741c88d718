import { TestCaseField, TestCaseRecord } from '../../models/test-case';
import {
  cleanFieldText,
  isHorizontalRule,
  isStepsToReproduceMarker,
  isTestCaseIdLine,
  joinContinuation,
  matchFieldMarker,
  matchStepItem,
  splitLines,
} from '../field-markers';
import { ParsingStrategy } from './types';
import { createContextLogger } from '../../utils/logger';

const logger = createContextLogger({ step: 'block-parsing' });

export const MIN_BLOCK_LENGTH = 10;

const PARAGRAPH_BREAK = /\r?\n[ \t\r]*\n\s*/;

// Fields that only take the rest of their own line
const SINGLE_LINE_FIELDS: ReadonlySet<TestCaseField> = new Set(['title', 'scenario', 'status', 'priority']);

interface FieldSegment {
  field: TestCaseField;
  value: string;
  lines: string[];
}

interface BlockLayout {
  preamble: string[];
  segments: FieldSegment[];
}

function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BREAK)
    .map(block => block.trim())
    .filter(block => block.length >= MIN_BLOCK_LENGTH);
}

function layoutBlock(block: string): BlockLayout {
  const layout: BlockLayout = { preamble: [], segments: [] };

  for (const rawLine of splitLines(block)) {
    const line = rawLine.trim();
    if (!line || isHorizontalRule(line)) {
      continue;
    }

    const marker = matchFieldMarker(line);
    if (marker) {
      layout.segments.push({ field: marker.field, value: marker.value, lines: [] });
      continue;
    }

    const current = layout.segments[layout.segments.length - 1];
    if (current) {
      current.lines.push(line);
    } else {
      layout.preamble.push(line);
    }
  }

  return layout;
}

function countTitles(layout: BlockLayout): number {
  const titleSegments = layout.segments.filter(segment => segment.field === 'title').length;
  if (titleSegments > 0) {
    return titleSegments;
  }
  return layout.preamble.length > 0 && isTestCaseIdLine(layout.preamble[0]) ? 1 : 0;
}

/**
 * A paragraph with fields but no single title means records are not
 * separated by blank lines. Untitled text after a record may be the rest
 * of that record cut off by a blank line. Either way this strategy cannot
 * isolate the records.
 */
function findAmbiguousLayout(layouts: readonly BlockLayout[]): BlockLayout | undefined {
  let afterRecord = false;

  for (const layout of layouts) {
    const titles = countTitles(layout);
    if (layout.segments.length > 0 && titles !== 1) {
      return layout;
    }
    if (titles === 0 && layout.preamble.length > 0 && afterRecord) {
      return layout;
    }
    if (titles === 1) {
      afterRecord = true;
    }
  }

  return undefined;
}

/**
 * Numbered or bulleted lines each start a step and unmarked lines continue
 * the previous one. Without any item marker the span is a single step.
 */
export function splitStepItems(lines: string[]): string[] {
  const hasItemMarkers = lines.some(line => matchStepItem(line) !== null);

  if (!hasItemMarkers) {
    const joined = lines.map(cleanFieldText).filter(Boolean).join(' ');
    return joined ? [joined] : [];
  }

  const items: string[] = [];
  for (const line of lines) {
    const item = matchStepItem(line);
    if (item !== null) {
      if (item) {
        items.push(item);
      }
      continue;
    }

    const text = cleanFieldText(line);
    if (!text) {
      continue;
    }
    if (items.length === 0) {
      items.push(text);
    } else {
      items[items.length - 1] = joinContinuation(items[items.length - 1], text);
    }
  }

  return items;
}

function buildRecord(layout: BlockLayout, section: string): TestCaseRecord | null {
  const titleSegment = layout.segments.find(segment => segment.field === 'title');
  const title = titleSegment ? titleSegment.value : cleanFieldText(layout.preamble[0] ?? '');

  if (!title) {
    return null;
  }

  const record: TestCaseRecord = { section, title };

  for (const { field, value, lines } of layout.segments) {
    // First occurrence of a field wins
    if (field === 'title' || record[field] !== undefined) {
      continue;
    }

    if (field === 'steps') {
      record.steps = splitStepItems(value ? [value, ...lines] : lines);
    } else if (SINGLE_LINE_FIELDS.has(field)) {
      record[field] = value;
    } else {
      record[field] = lines.map(cleanFieldText).reduce(joinContinuation, value);
    }
  }

  return record;
}

/**
 * Paragraph-delimited parsing: each blank-line separated block holds one
 * complete test case.
 */
export class BlockModeStrategy implements ParsingStrategy {
  public readonly name = 'block';

  canAttempt(text: string): boolean {
    const lines = splitLines(text);
    if (!lines.some(isStepsToReproduceMarker)) {
      return false;
    }
    return lines.some(line => matchFieldMarker(line)?.field === 'title' || isTestCaseIdLine(line));
  }

  attempt(text: string, defaultSection: string): TestCaseRecord[] {
    const layouts = splitParagraphs(text).map(layoutBlock);

    const ambiguous = findAmbiguousLayout(layouts);
    if (ambiguous) {
      logger.debug('Paragraphs do not isolate test cases, skipping block parsing', {
        title_count: countTitles(ambiguous),
        untitled_lines: ambiguous.preamble.length,
      });
      return [];
    }

    const records: TestCaseRecord[] = [];
    for (const layout of layouts) {
      if (countTitles(layout) === 0) {
        continue;
      }
      const record = buildRecord(layout, defaultSection);
      if (record) {
        records.push(record);
      }
    }

    logger.debug(`Extracted ${records.length} test cases using block parsing`, { section: defaultSection });
    return records;
  }
}
