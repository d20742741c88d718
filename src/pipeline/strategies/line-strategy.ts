import { TestCaseRecord, TextField } from '../../models/test-case';
import {
  cleanFieldText,
  headingText,
  isHeadingLine,
  isHorizontalRule,
  joinContinuation,
  matchFieldMarker,
  matchStepItem,
  resolveContinuationTarget,
  splitLines,
} from '../field-markers';
import { ParsingStrategy } from './types';
import { createContextLogger } from '../../utils/logger';

const logger = createContextLogger({ step: 'line-parsing' });

export type ParserMode =
  | { kind: 'idle' }
  | { kind: 'accumulatingSteps' }
  | { kind: 'accumulatingField'; target: TextField };

export interface LineParserState {
  readonly records: readonly TestCaseRecord[];
  readonly draft: TestCaseRecord | null;
  readonly section: string;
  readonly mode: ParserMode;
  readonly steps: readonly string[];
}

const IDLE: ParserMode = { kind: 'idle' };
const ACCUMULATING_STEPS: ParserMode = { kind: 'accumulatingSteps' };

export function initialLineParserState(defaultSection: string): LineParserState {
  return { records: [], draft: null, section: defaultSection, mode: IDLE, steps: [] };
}

function withField(record: TestCaseRecord, field: TextField, value: string): TestCaseRecord {
  const next = { ...record };
  next[field] = value;
  return next;
}

function modeFor(record: TestCaseRecord): ParserMode {
  const target = resolveContinuationTarget(record);
  return target ? { kind: 'accumulatingField', target } : IDLE;
}

/**
 * Writes the step accumulator to the open record and leaves step mode.
 */
function commitSteps(state: LineParserState): LineParserState {
  if (state.mode.kind !== 'accumulatingSteps' || !state.draft) {
    return state;
  }
  const draft = { ...state.draft, steps: [...state.steps] };
  return { ...state, draft, mode: modeFor(draft), steps: [] };
}

function closeDraft(state: LineParserState): readonly TestCaseRecord[] {
  const committed = commitSteps(state);
  return committed.draft ? [...committed.records, committed.draft] : committed.records;
}

function stepText(line: string): string {
  const item = matchStepItem(line);
  return item !== null ? item : cleanFieldText(line);
}

/**
 * Builds the transition function for one parse. Headings with no text fall
 * back to the default section.
 */
export function createLineReducer(defaultSection: string) {
  return function reduceLine(state: LineParserState, rawLine: string): LineParserState {
    const line = rawLine.trim();
    if (!line || isHorizontalRule(line)) {
      return state;
    }

    const marker = matchFieldMarker(line);

    if (marker?.field === 'title') {
      return {
        records: closeDraft(state),
        draft: { section: state.section, title: marker.value },
        section: state.section,
        mode: IDLE,
        steps: [],
      };
    }

    if (!marker && isHeadingLine(line)) {
      return { ...state, section: headingText(line) || defaultSection };
    }

    if (!state.draft) {
      return state;
    }

    if (marker?.field === 'steps') {
      const first = marker.value ? stepText(marker.value) : '';
      return { ...state, mode: ACCUMULATING_STEPS, steps: first ? [first] : [] };
    }

    if (state.mode.kind === 'accumulatingSteps' && !marker) {
      const text = stepText(line);
      return text ? { ...state, steps: [...state.steps, text] } : state;
    }

    // Any other field marker ends step accumulation
    const current = commitSteps(state);
    const draft = current.draft;
    if (!draft) {
      return current;
    }

    if (marker) {
      const { field, value } = marker;
      const updated = withField(draft, field, value);
      return { ...current, draft: updated, mode: modeFor(updated) };
    }

    if (current.mode.kind === 'accumulatingField') {
      const { target } = current.mode;
      const text = cleanFieldText(line);
      return { ...current, draft: withField(draft, target, joinContinuation(draft[target] ?? '', text)) };
    }

    return current;
  };
}

export function finishLineParse(state: LineParserState): TestCaseRecord[] {
  return [...closeDraft(state)];
}

/**
 * Streaming field state machine. Always applicable; the fallback when block
 * parsing cannot isolate records.
 */
export class LineModeStrategy implements ParsingStrategy {
  public readonly name = 'line';

  canAttempt(_text: string): boolean {
    return true;
  }

  attempt(text: string, defaultSection: string): TestCaseRecord[] {
    const finalState = splitLines(text).reduce(createLineReducer(defaultSection), initialLineParserState(defaultSection));
    const records = finishLineParse(finalState);

    logger.debug(`Extracted ${records.length} test cases using line-by-line parsing`, { section: defaultSection });
    return records;
  }
}
