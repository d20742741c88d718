import { TestCaseRecord } from './test-case';

export type SourceType = 'jira' | 'azure' | 'url' | 'text' | 'image';

export const SOURCE_TYPES: readonly SourceType[] = ['jira', 'azure', 'url', 'text', 'image'];

/**
 * A saved generation result, addressed by its share key.
 */
export interface TestCaseDocument {
  url_key: string;
  source_type: SourceType;
  item_ids: string[];
  test_types: string[];
  created_at: string;
  raw_text: string;
  test_data: TestCaseRecord[];
  // Status per test case title, filled in by users
  status: Record<string, string>;
  status_updated_at?: string;
}

export interface TestCaseDocumentSummary {
  url_key: string;
  source_type: SourceType;
  item_ids: string[];
  created_at: string;
  test_case_count: number;
}

export type NewTestCaseDocument = Omit<TestCaseDocument, 'url_key' | 'created_at' | 'status'> & {
  status?: Record<string, string>;
};
