/**
 * Structured test case extracted from free-form LLM output.
 * Only `section` and `title` are guaranteed; every other field is present
 * when the source text carried its marker.
 */
export interface TestCaseRecord {
  section: string;
  title: string;
  scenario?: string;
  preconditions?: string;
  steps?: string[];
  expected_result?: string;
  actual_result?: string;
  status?: string;
  priority?: string;
  test_data?: string;
}

export type TestCaseField = Exclude<keyof TestCaseRecord, 'section'>;

// Fields holding a single string value
export type TextField = Exclude<TestCaseField, 'steps'>;

export const DEFAULT_SECTION = 'General';

export interface ParseOptions {
  defaultSection?: string;
}

export interface ParseResult {
  test_cases: TestCaseRecord[];
  sections: string[];
}
