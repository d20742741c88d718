import { DEFAULT_SECTION, ParseOptions, ParseResult, TestCaseRecord } from '../models/test-case';
import { splitSections } from './section-splitter';
import { BlockModeStrategy } from './strategies/block-strategy';
import { LineModeStrategy } from './strategies/line-strategy';
import { ParsingStrategy } from './strategies/types';
import { createContextLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const logger = createContextLogger({ step: 'test-case-parsing' });

export const DEFAULT_STRATEGIES: readonly ParsingStrategy[] = [new BlockModeStrategy(), new LineModeStrategy()];

function resolveSection(section: string | undefined): string {
  return section?.trim() || DEFAULT_SECTION;
}

/**
 * Extracts test cases from one chunk of text. Strategies run in order and
 * the first one returning records wins; an empty array means nothing in the
 * chunk looked like a test case.
 */
export function parseTestCaseBlock(
  text: string,
  defaultSection: string = DEFAULT_SECTION,
  strategies: readonly ParsingStrategy[] = DEFAULT_STRATEGIES
): TestCaseRecord[] {
  const section = resolveSection(defaultSection);

  for (const strategy of strategies) {
    if (!strategy.canAttempt(text)) {
      continue;
    }

    const records = strategy.attempt(text, section);
    if (records.length > 0) {
      logger.debug('Parsed test case chunk', { strategy: strategy.name, section, count: records.length });
      return records;
    }
  }

  return [];
}

function parseChunkIsolated(
  text: string,
  section: string,
  strategies: readonly ParsingStrategy[]
): TestCaseRecord[] {
  try {
    return parseTestCaseBlock(text, section, strategies);
  } catch (error) {
    logger.error('Failed to parse test case section, skipping it', {
      section,
      error: errorMessage(error),
    });
    return [];
  }
}

export function parseTestCases(
  text: string,
  options: ParseOptions = {},
  strategies: readonly ParsingStrategy[] = DEFAULT_STRATEGIES
): ParseResult {
  if (typeof text !== 'string') {
    throw new TypeError('parseTestCases expects the generated text as a string');
  }

  const defaultSection = resolveSection(options.defaultSection);
  const sections = splitSections(text, defaultSection);

  if (sections.size === 0) {
    logger.debug('No TEST TYPE sections found, parsing text as a single chunk');
    return {
      test_cases: parseChunkIsolated(text, defaultSection, strategies),
      sections: [],
    };
  }

  logger.debug(`Found ${sections.size} TEST TYPE sections`);

  const testCases: TestCaseRecord[] = [];
  for (const [section, content] of sections) {
    testCases.push(...parseChunkIsolated(content, section, strategies));
  }

  return { test_cases: testCases, sections: [...sections.keys()] };
}
