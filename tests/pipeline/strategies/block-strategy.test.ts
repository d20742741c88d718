import { describe, it, expect } from 'vitest';
import { BlockModeStrategy, splitStepItems } from '../../../src/pipeline/strategies/block-strategy';

const strategy = new BlockModeStrategy();

describe('BlockModeStrategy.canAttempt', () => {
  it('needs a steps-to-reproduce marker and a title', () => {
    expect(strategy.canAttempt('Title: A\nSteps to reproduce:\n1. x')).toBe(true);
    expect(strategy.canAttempt('TC_FUNC_1_Login\nSteps to reproduce:\n1. x')).toBe(true);
    expect(strategy.canAttempt('Title: A\nSteps:\n1. x')).toBe(false);
    expect(strategy.canAttempt('Steps to reproduce:\n1. x')).toBe(false);
  });
});

describe('BlockModeStrategy.attempt', () => {
  it('extracts one record per blank-line separated block', () => {
    const text = [
      'Title: TC_FUNC_1_Login',
      'Scenario: User logs in',
      'Steps to reproduce:',
      '1. Open page',
      '2. Enter credentials',
      'Expected Result: Dashboard shown',
      'Actual Result: ',
      'Priority: High',
      '',
      'Title: TC_FUNC_2_Logout',
      'Steps to reproduce:',
      '1. Click logout',
      'Expected Result: Login page shown',
      'Priority: Medium',
    ].join('\n');

    expect(strategy.attempt(text, 'dashboard_functional')).toEqual([
      {
        section: 'dashboard_functional',
        title: 'TC_FUNC_1_Login',
        scenario: 'User logs in',
        steps: ['Open page', 'Enter credentials'],
        expected_result: 'Dashboard shown',
        actual_result: '',
        priority: 'High',
      },
      {
        section: 'dashboard_functional',
        title: 'TC_FUNC_2_Logout',
        steps: ['Click logout'],
        expected_result: 'Login page shown',
        priority: 'Medium',
      },
    ]);
  });

  it('joins multi-line fields up to the next marker', () => {
    const text = [
      'Title: TC_UI_1_Layout',
      'Preconditions: Logged in',
      'as an admin',
      'Steps to reproduce:',
      '1. Open the dashboard',
      'Expected Result: Widgets are aligned',
      'in a two column grid',
      'Actual Result: To be filled during execution',
    ].join('\n');

    const [record] = strategy.attempt(text, 'ui');

    expect(record.preconditions).toBe('Logged in as an admin');
    expect(record.expected_result).toBe('Widgets are aligned in a two column grid');
    expect(record.actual_result).toBe('To be filled during execution');
  });

  it('takes the title from a leading test case id line', () => {
    const text = 'TC_FUNC_1_Login\nScenario: Valid login\nSteps to reproduce:\n1. Submit form\nExpected Result: Logged in';

    expect(strategy.attempt(text, 'General')).toEqual([
      {
        section: 'General',
        title: 'TC_FUNC_1_Login',
        scenario: 'Valid login',
        steps: ['Submit form'],
        expected_result: 'Logged in',
      },
    ]);
  });

  it('keeps the first occurrence of a repeated field', () => {
    const text = 'Title: A\nSteps to reproduce:\n1. x\nPriority: High\nPriority: Low';

    expect(strategy.attempt(text, 'General')[0].priority).toBe('High');
  });

  it('skips paragraphs without any field markers', () => {
    const text = 'Here are the generated test cases\n\nTitle: A\nSteps to reproduce:\n1. x\nExpected Result: y';

    expect(strategy.attempt(text, 'General')).toEqual([
      { section: 'General', title: 'A', steps: ['x'], expected_result: 'y' },
    ]);
  });

  it('gives up when a paragraph holds more than one title', () => {
    const text = 'Title: A\nSteps to reproduce:\n1. x\nExpected Result: y\nTitle: B\nSteps to reproduce:\n1. z';

    expect(strategy.attempt(text, 'General')).toEqual([]);
  });

  it('gives up when a blank line cuts a record off from its steps', () => {
    const text = 'Title: A\nSteps to reproduce:\n\n1. Open the login page\n2. Enter credentials';

    expect(strategy.attempt(text, 'General')).toEqual([]);
  });

  it('gives up on untitled text between records', () => {
    const text = 'Title: A\nSteps to reproduce:\n1. x\n\nand then wait a minute\n\nTitle: B\nSteps to reproduce:\n1. y';

    expect(strategy.attempt(text, 'General')).toEqual([]);
  });

  it('strips mixed step markers', () => {
    const text = 'Title: TC_UI_1\nSteps to reproduce:\n1. Step one\n- Step two\n* Step three\nExpected Result: Fine';

    expect(strategy.attempt(text, 'General')[0].steps).toEqual(['Step one', 'Step two', 'Step three']);
  });

  it('treats inline steps text as the first step', () => {
    const text = 'Title: A\nSteps to reproduce: Open the app\nExpected Result: App opens';

    expect(strategy.attempt(text, 'General')[0].steps).toEqual(['Open the app']);
  });
});

describe('splitStepItems', () => {
  it('appends unmarked lines to the previous step', () => {
    expect(splitStepItems(['1. Open', 'the page', '2. Click login'])).toEqual(['Open the page', 'Click login']);
  });

  it('treats a span without item markers as a single step', () => {
    expect(splitStepItems(['Open the page', 'and click login'])).toEqual(['Open the page and click login']);
  });

  it('returns no steps for an empty span', () => {
    expect(splitStepItems([])).toEqual([]);
  });
});
