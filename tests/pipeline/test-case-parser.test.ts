import { describe, it, expect } from 'vitest';
import { parseTestCaseBlock, parseTestCases } from '../../src/pipeline/test-case-parser';
import { LineModeStrategy } from '../../src/pipeline/strategies/line-strategy';
import { ParsingStrategy } from '../../src/pipeline/strategies/types';
import { TestCaseRecord } from '../../src/models/test-case';

describe('parseTestCases', () => {
  it('parses a sectioned single test case', () => {
    const text =
      'TEST TYPE: dashboard_functional\n\nTitle: TC_FUNC_1_Login\nScenario: User logs in\nSteps to reproduce:\n1. Open page\n2. Enter credentials\nExpected Result: Dashboard shown\nActual Result: \nPriority: High';

    const result = parseTestCases(text);

    expect(result.sections).toEqual(['dashboard_functional']);
    expect(result.test_cases).toEqual([
      {
        section: 'dashboard_functional',
        title: 'TC_FUNC_1_Login',
        scenario: 'User logs in',
        steps: ['Open page', 'Enter credentials'],
        expected_result: 'Dashboard shown',
        actual_result: '',
        priority: 'High',
      },
    ]);
  });

  it('tags blocks with the default section when there are no markers', () => {
    const text =
      'Title: First case\nSteps to reproduce:\n1. Do a\nExpected Result: A done\n\nTitle: Second case\nSteps to reproduce:\n1. Do b\nExpected Result: B done';

    const result = parseTestCases(text);

    expect(result.sections).toEqual([]);
    expect(result.test_cases).toEqual([
      { section: 'General', title: 'First case', steps: ['Do a'], expected_result: 'A done' },
      { section: 'General', title: 'Second case', steps: ['Do b'], expected_result: 'B done' },
    ]);
  });

  it('separates records that are not divided by blank lines', () => {
    const text =
      'Title: A\nSteps to reproduce:\n1. x\nExpected Result: y\nTitle: B\nSteps to reproduce:\n1. z\nExpected Result: w';

    expect(parseTestCases(text).test_cases).toEqual([
      { section: 'General', title: 'A', steps: ['x'], expected_result: 'y' },
      { section: 'General', title: 'B', steps: ['z'], expected_result: 'w' },
    ]);
  });

  it('keeps steps separated from their marker by a blank line', () => {
    expect(parseTestCases('Title: A\nSteps to reproduce:\n\n1. Open the login page\n2. Enter credentials').test_cases).toEqual([
      { section: 'General', title: 'A', steps: ['Open the login page', 'Enter credentials'] },
    ]);
  });

  it('reports prose without titles as zero records', () => {
    expect(parseTestCases('Just some notes about the release.\nNothing structured here.')).toEqual({
      test_cases: [],
      sections: [],
    });
  });

  it('uses the caller default section', () => {
    const result = parseTestCases('Title: A\nPriority: Low', { defaultSection: 'Smoke' });

    expect(result.test_cases).toEqual([{ section: 'Smoke', title: 'A', priority: 'Low' }]);
  });

  it('never returns an empty section name', () => {
    const result = parseTestCases('Title: A\nPriority: Low', { defaultSection: '   ' });

    expect(result.test_cases[0].section).toBe('General');
  });

  it('trims whitespace around every field', () => {
    const [record] = parseTestCases('Title:   Spaced   \nScenario:   padded  ').test_cases;

    expect(record).toEqual({ section: 'General', title: 'Spaced', scenario: 'padded' });
  });

  it('is deterministic', () => {
    const text = 'TEST TYPE: ui\n\nTitle: A\nSteps to reproduce:\n- a\n- b\nExpected Result: c\n\nTEST TYPE: ux\n\nTitle: B\nPriority: Low\nmore';

    expect(parseTestCases(text)).toEqual(parseTestCases(text));
  });

  it('isolates a failing section from the others', () => {
    const exploding: ParsingStrategy = {
      name: 'exploding',
      canAttempt: () => true,
      attempt: (text: string): TestCaseRecord[] => {
        if (text.includes('BOOM')) {
          throw new Error('unexpected artifact');
        }
        return [];
      },
    };

    const result = parseTestCases('TEST TYPE: a\nTitle: BOOM\n\nTEST TYPE: b\nTitle: fine', {}, [
      exploding,
      new LineModeStrategy(),
    ]);

    expect(result.sections).toEqual(['a', 'b']);
    expect(result.test_cases).toEqual([{ section: 'b', title: 'fine' }]);
  });

  it('rejects input that is not a string', () => {
    expect(() => Reflect.apply(parseTestCases, undefined, [42])).toThrow(TypeError);
  });
});

describe('parseTestCaseBlock', () => {
  it('falls through to line parsing when block parsing finds nothing', () => {
    expect(parseTestCaseBlock('Title: Only line mode\nPriority: Low', 'ui')).toEqual([
      { section: 'ui', title: 'Only line mode', priority: 'Low' },
    ]);
  });

  it('keeps steps in source order whatever their numbers', () => {
    const [record] = parseTestCaseBlock('Title: A\nSteps to reproduce:\n3. third\n1. first\n7. seventh', 'General');

    expect(record.steps).toEqual(['third', 'first', 'seventh']);
  });
});
