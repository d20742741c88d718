import { describe, it, expect, vi } from 'vitest';
import {
  fetchJiraIssues,
  fetchRecentJiraIssues,
  JiraConnection,
  JiraIssueFinder,
  JiraSearchOptions,
  toIssueSourceItem,
  verifyJiraConnection,
} from '../../src/integrations/jira-client';
import { SourceFetchError } from '../../src/utils/errors';

const issue = {
  key: 'QA-1',
  fields: {
    summary: 'Reset password',
    description: {
      type: 'doc',
      content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Users get a reset link by email' }] }],
    },
  },
};

describe('toIssueSourceItem', () => {
  it('flattens the ADF description', () => {
    expect(toIssueSourceItem('QA-1', issue)).toEqual({
      id: 'QA-1',
      summary: 'Reset password',
      description: 'Users get a reset link by email',
    });
  });

  it('falls back to the summary when there is no description', () => {
    expect(toIssueSourceItem('QA-2', { fields: { summary: 'Only a title' } })).toEqual({
      id: 'QA-2',
      summary: 'Only a title',
      description: 'Only a title',
    });
  });
});

describe('fetchJiraIssues', () => {
  it('asks the finder for every key in order', async () => {
    const finder: JiraIssueFinder = {
      findIssue: vi.fn(async (key: string) => ({ key, fields: { summary: `Summary ${key}`, description: 'Text' } })),
    };

    const items = await fetchJiraIssues(['QA-1', 'QA-2'], finder);

    expect(items.map(item => item.id)).toEqual(['QA-1', 'QA-2']);
    expect(finder.findIssue).toHaveBeenCalledTimes(2);
  });

  it('wraps lookup failures in SourceFetchError', async () => {
    const finder: JiraIssueFinder = {
      findIssue: async () => {
        throw new Error('Issue does not exist');
      },
    };

    const error = await fetchJiraIssues(['QA-9'], finder).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceFetchError);
    expect(error instanceof SourceFetchError && error.message).toBe('Failed to fetch Jira issue QA-9: Issue does not exist');
  });
});

function connectionWith(overrides: Partial<JiraConnection>): JiraConnection {
  return {
    findIssue: async () => ({}),
    getCurrentUser: async () => ({ displayName: 'Test User' }),
    searchJira: async () => ({ issues: [] }),
    ...overrides,
  };
}

describe('verifyJiraConnection', () => {
  it('returns the display name of the signed-in user', async () => {
    await expect(verifyJiraConnection(connectionWith({}))).resolves.toBe('Test User');
  });

  it('wraps authentication failures in SourceFetchError', async () => {
    const connection = connectionWith({
      getCurrentUser: async () => {
        throw new Error('401 - Unauthorized');
      },
    });

    await expect(verifyJiraConnection(connection)).rejects.toThrow('Could not connect to Jira: 401 - Unauthorized');
  });
});

describe('fetchRecentJiraIssues', () => {
  it('searches open statuses and summarizes each issue', async () => {
    const searches: Array<{ jql: string; options?: JiraSearchOptions }> = [];
    const connection = connectionWith({
      searchJira: async (jql: string, options?: JiraSearchOptions) => {
        searches.push({ jql, options });
        return {
          issues: [
            { key: 'QA-1', fields: { summary: 'Login', issuetype: { name: 'Story' }, status: { name: 'To Do' } } },
            { key: 'QA-2', fields: { summary: 'Logout' } },
          ],
        };
      },
    });

    const items = await fetchRecentJiraIssues(connection, 10);

    expect(searches).toEqual([
      {
        jql: 'status in ("To Do", "Ready for QA") ORDER BY updated DESC',
        options: { maxResults: 10, fields: ['summary', 'issuetype', 'status'] },
      },
    ]);
    expect(items).toEqual([
      { id: 'QA-1', title: 'Login', type: 'Story', status: 'To Do' },
      { id: 'QA-2', title: 'Logout', type: 'Issue', status: '' },
    ]);
  });
});
