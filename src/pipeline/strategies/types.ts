import { TestCaseRecord } from '../../models/test-case';

/**
 * One way of turning a chunk of LLM output into records. Strategies are
 * tried in order; the first non-empty result wins.
 */
export interface ParsingStrategy {
  readonly name: string;
  canAttempt(text: string): boolean;
  attempt(text: string, defaultSection: string): TestCaseRecord[];
}
