import JiraApi from 'jira-client';
import { SourceItem } from '../models/generation-request';
import { retryWithBackoff, isRetryableError } from '../utils/retry-handler';
import { adfToText, isRecord } from '../utils/adf-to-text';
import { SourceFetchError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface JiraCredentials {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface JiraIssueFinder {
  findIssue(issueKey: string): Promise<unknown>;
}

export interface JiraSearchOptions {
  startAt?: number;
  maxResults?: number;
  fields?: string[];
}

/** What the connection check and issue suggestions need from a Jira client. */
export interface JiraConnection extends JiraIssueFinder {
  getCurrentUser(): Promise<unknown>;
  searchJira(jql: string, options?: JiraSearchOptions): Promise<unknown>;
}

export interface JiraIssueSummary {
  id: string;
  title: string;
  type: string;
  status: string;
}

export const SUGGESTION_STATUSES = ['To Do', 'Ready for QA'];

export function jiraCredentialsFromEnv(): JiraCredentials | null {
  const baseUrl = process.env.JIRA_BASE_URL;
  const email = process.env.JIRA_EMAIL;
  const apiToken = process.env.JIRA_API_TOKEN;

  if (!baseUrl || !email || !apiToken) {
    return null;
  }
  return { baseUrl, email, apiToken };
}

export function createJiraApi(credentials: JiraCredentials): JiraApi {
  const url = new URL(/^https?:\/\//.test(credentials.baseUrl) ? credentials.baseUrl : `https://${credentials.baseUrl}`);

  return new JiraApi({
    protocol: url.protocol.replace(':', ''),
    host: url.hostname,
    port: url.port || undefined,
    username: credentials.email,
    password: credentials.apiToken,
    apiVersion: '3',
    strictSSL: true,
  });
}

/**
 * Reads summary and description off an issue payload. The description is
 * ADF under API v3 and a plain string on older servers.
 */
export function toIssueSourceItem(issueKey: string, issue: unknown): SourceItem {
  const fields = isRecord(issue) && isRecord(issue.fields) ? issue.fields : {};
  const summary = typeof fields.summary === 'string' ? fields.summary : '';
  const description = adfToText(fields.description);

  return {
    id: isRecord(issue) && typeof issue.key === 'string' ? issue.key : issueKey,
    summary,
    description: description || summary,
  };
}

export async function getJiraIssue(finder: JiraIssueFinder, issueKey: string): Promise<SourceItem> {
  logger.debug('Fetching Jira issue', { issue_key: issueKey });

  try {
    const issue = await retryWithBackoff(() => finder.findIssue(issueKey), {
      maxAttempts: 3,
      delayMs: 2000,
      exponentialBackoff: true,
      shouldRetry: isRetryableError,
    });

    const item = toIssueSourceItem(issueKey, issue);
    logger.debug('Jira issue fetched', { issue_key: issueKey, summary: item.summary });
    return item;
  } catch (error) {
    logger.error('Failed to fetch Jira issue', { issue_key: issueKey, error: errorMessage(error) });
    throw new SourceFetchError(
      `Failed to fetch Jira issue ${issueKey}: ${errorMessage(error)}`,
      'jira'
    );
  }
}

export async function fetchJiraIssues(issueKeys: string[], finder?: JiraIssueFinder): Promise<SourceItem[]> {
  let resolvedFinder = finder;
  if (!resolvedFinder) {
    const credentials = jiraCredentialsFromEnv();
    if (!credentials) {
      throw new SourceFetchError('Jira credentials not configured (JIRA_BASE_URL, JIRA_EMAIL, JIRA_API_TOKEN)', 'jira');
    }
    resolvedFinder = createJiraApi(credentials);
  }

  const items: SourceItem[] = [];
  for (const issueKey of issueKeys) {
    items.push(await getJiraIssue(resolvedFinder, issueKey));
  }
  return items;
}

export async function verifyJiraConnection(connection: JiraConnection): Promise<string> {
  try {
    const user = await connection.getCurrentUser();
    const displayName = isRecord(user) && typeof user.displayName === 'string' ? user.displayName : 'Unknown';
    logger.info('Jira connection verified', { user: displayName });
    return displayName;
  } catch (error) {
    logger.error('Jira connection check failed', { error: errorMessage(error) });
    throw new SourceFetchError(`Could not connect to Jira: ${errorMessage(error)}`, 'jira');
  }
}

function nameOf(value: unknown, fallback: string): string {
  return isRecord(value) && typeof value.name === 'string' ? value.name : fallback;
}

export function toIssueSummary(issue: unknown): JiraIssueSummary {
  const fields = isRecord(issue) && isRecord(issue.fields) ? issue.fields : {};
  return {
    id: isRecord(issue) && typeof issue.key === 'string' ? issue.key : '',
    title: typeof fields.summary === 'string' ? fields.summary : '',
    type: nameOf(fields.issuetype, 'Issue'),
    status: nameOf(fields.status, ''),
  };
}

/**
 * Lists issues that are waiting for test cases, most recently updated
 * first, for the issue picker.
 */
export async function fetchRecentJiraIssues(connection: JiraConnection, maxResults: number = 50): Promise<JiraIssueSummary[]> {
  const statuses = SUGGESTION_STATUSES.map(status => `"${status}"`).join(', ');
  const jql = `status in (${statuses}) ORDER BY updated DESC`;

  try {
    const response = await retryWithBackoff(
      () => connection.searchJira(jql, { maxResults, fields: ['summary', 'issuetype', 'status'] }),
      {
        maxAttempts: 3,
        delayMs: 2000,
        exponentialBackoff: true,
        shouldRetry: isRetryableError,
      }
    );

    const issues = isRecord(response) && Array.isArray(response.issues) ? response.issues : [];
    logger.debug('Jira issues listed', { issue_count: issues.length });
    return issues.map(toIssueSummary);
  } catch (error) {
    logger.error('Failed to list Jira issues', { error: errorMessage(error) });
    throw new SourceFetchError(`Failed to list Jira issues: ${errorMessage(error)}`, 'jira');
  }
}
