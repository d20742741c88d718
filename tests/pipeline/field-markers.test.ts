import { describe, it, expect } from 'vitest';
import {
  headingText,
  isHeadingLine,
  isHorizontalRule,
  isStepsToReproduceMarker,
  isTestCaseIdLine,
  joinContinuation,
  matchFieldMarker,
  matchStepItem,
  resolveContinuationTarget,
} from '../../src/pipeline/field-markers';

describe('matchFieldMarker', () => {
  it('strips bold markup before matching', () => {
    expect(matchFieldMarker('**Title:** TC_FUNC_1_Login')).toEqual({ field: 'title', value: 'TC_FUNC_1_Login' });
  });

  it('accepts a leading list number or heading marks', () => {
    expect(matchFieldMarker('1. Expected Result: Dashboard shown')).toEqual({
      field: 'expected_result',
      value: 'Dashboard shown',
    });
    expect(matchFieldMarker('### Priority: Low')).toEqual({ field: 'priority', value: 'Low' });
  });

  it('matches labels case-insensitively and trims the value', () => {
    expect(matchFieldMarker('expected results:   done  ')).toEqual({ field: 'expected_result', value: 'done' });
  });

  it('maps every steps label to the steps field', () => {
    expect(matchFieldMarker('Steps to reproduce:')).toEqual({ field: 'steps', value: '' });
    expect(matchFieldMarker('Test Steps:')).toEqual({ field: 'steps', value: '' });
    expect(matchFieldMarker('Steps: 1. Open')).toEqual({ field: 'steps', value: '1. Open' });
  });

  it('recognizes the extra fields', () => {
    expect(matchFieldMarker('Pre-conditions: Logged out')).toEqual({ field: 'preconditions', value: 'Logged out' });
    expect(matchFieldMarker('Test Data: user=qa')).toEqual({ field: 'test_data', value: 'user=qa' });
    expect(matchFieldMarker('Status: Pass')).toEqual({ field: 'status', value: 'Pass' });
  });

  it('returns null for lines that only resemble a marker', () => {
    expect(matchFieldMarker('Titles: many')).toBeNull();
    expect(matchFieldMarker('The title: is missing')).toBeNull();
    expect(matchFieldMarker('Open the page')).toBeNull();
  });
});

describe('isStepsToReproduceMarker', () => {
  it('accepts only the long form', () => {
    expect(isStepsToReproduceMarker('**Steps to Reproduce:**')).toBe(true);
    expect(isStepsToReproduceMarker('Steps:')).toBe(false);
  });
});

describe('matchStepItem', () => {
  it('strips numeric and bullet item markers', () => {
    expect(matchStepItem('2) Click login')).toBe('Click login');
    expect(matchStepItem('- Open page')).toBe('Open page');
    expect(matchStepItem('* Enter password')).toBe('Enter password');
    expect(matchStepItem('•  Tap submit')).toBe('Tap submit');
  });

  it('returns null for unmarked lines', () => {
    expect(matchStepItem('Open page')).toBeNull();
  });
});

describe('line classification', () => {
  it('detects headings and their text', () => {
    expect(isHeadingLine('## Login tests')).toBe(true);
    expect(headingText('## **Login tests**')).toBe('Login tests');
    expect(isHeadingLine('Login tests')).toBe(false);
  });

  it('detects horizontal rules', () => {
    expect(isHorizontalRule('---')).toBe(true);
    expect(isHorizontalRule('- - -')).toBe(true);
    expect(isHorizontalRule('***')).toBe(true);
    expect(isHorizontalRule('--')).toBe(false);
  });

  it('detects test case id lines', () => {
    expect(isTestCaseIdLine('TC_FUNC_12_Login')).toBe(true);
    expect(isTestCaseIdLine('Login TC_FUNC_1')).toBe(false);
  });
});

describe('joinContinuation', () => {
  it('joins with a single space and skips empty parts', () => {
    expect(joinContinuation('', 'next')).toBe('next');
    expect(joinContinuation('High', '')).toBe('High');
    expect(joinContinuation('High', 'more context')).toBe('High more context');
  });
});

describe('resolveContinuationTarget', () => {
  it('prefers the field furthest down the layout', () => {
    expect(resolveContinuationTarget({ scenario: 'a', priority: 'b' })).toBe('priority');
    expect(resolveContinuationTarget({ scenario: 'a', expected_result: 'b' })).toBe('expected_result');
    expect(resolveContinuationTarget({ title: 'only a title' })).toBeNull();
  });
});
