import axios, { AxiosInstance } from 'axios';
import { SourceItem } from '../models/generation-request';
import { retryWithBackoff, isRetryableError } from '../utils/retry-handler';
import { stripHTMLTags } from '../utils/html-parser';
import { isRecord } from '../utils/adf-to-text';
import { SourceFetchError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

const API_VERSION = '6.0';

export interface AzureDevOpsSettings {
  baseUrl: string;
  organization: string;
  project: string;
  pat: string;
}

export function azureSettingsFromEnv(): AzureDevOpsSettings | null {
  const baseUrl = process.env.AZURE_DEVOPS_URL || 'https://dev.azure.com';
  const organization = process.env.AZURE_DEVOPS_ORG;
  const project = process.env.AZURE_DEVOPS_PROJECT;
  const pat = process.env.AZURE_DEVOPS_PAT;

  if (!organization || !project || !pat) {
    return null;
  }
  return { baseUrl, organization, project, pat };
}

export function normalizeBaseUrl(baseUrl: string): string {
  const withScheme = /^https?:\/\//.test(baseUrl) ? baseUrl : `https://${baseUrl}`;
  return withScheme.replace(/\/+$/, '');
}

export function workItemUrl(settings: AzureDevOpsSettings, workItemId: string): string {
  const org = encodeURIComponent(settings.organization);
  const project = encodeURIComponent(settings.project);
  const id = encodeURIComponent(workItemId);
  return `${normalizeBaseUrl(settings.baseUrl)}/${org}/${project}/_apis/wit/workitems/${id}?api-version=${API_VERSION}`;
}

export function projectUrl(settings: AzureDevOpsSettings): string {
  const org = encodeURIComponent(settings.organization);
  const project = encodeURIComponent(settings.project);
  return `${normalizeBaseUrl(settings.baseUrl)}/${org}/_apis/projects/${project}?api-version=${API_VERSION}`;
}

export function toWorkItemSourceItem(workItemId: string, workItem: unknown): SourceItem {
  const fields = isRecord(workItem) && isRecord(workItem.fields) ? workItem.fields : {};
  const title = fields['System.Title'];
  const description = fields['System.Description'];

  return {
    id: workItemId,
    summary: typeof title === 'string' ? title : 'No Title Found',
    description: typeof description === 'string' ? stripHTMLTags(description) : 'No Description Found',
  };
}

function describeFailure(workItemId: string, error: unknown): string {
  const status = axios.isAxiosError(error) ? error.response?.status : undefined;
  if (status === 401) {
    return 'Azure DevOps authentication failed. Check the Personal Access Token and its "Work Items (Read)" permission.';
  }
  if (status === 404) {
    return `Work item ${workItemId} not found in Azure DevOps.`;
  }
  return `Failed to fetch work item ${workItemId} from Azure DevOps: ${errorMessage(error)}`;
}

export async function fetchAzureWorkItems(
  workItemIds: string[],
  settings: AzureDevOpsSettings | null = azureSettingsFromEnv(),
  http: AxiosInstance = axios.create()
): Promise<SourceItem[]> {
  if (!settings) {
    throw new SourceFetchError(
      'Azure DevOps settings not configured (AZURE_DEVOPS_ORG, AZURE_DEVOPS_PROJECT, AZURE_DEVOPS_PAT)',
      'azure'
    );
  }

  const items: SourceItem[] = [];

  for (const workItemId of workItemIds) {
    logger.debug('Fetching Azure DevOps work item', { work_item_id: workItemId });

    try {
      const response = await retryWithBackoff(
        () =>
          http.get<unknown>(workItemUrl(settings, workItemId), {
            auth: { username: '', password: settings.pat },
            headers: { Accept: 'application/json' },
            timeout: 30000,
          }),
        {
          maxAttempts: 3,
          delayMs: 1000,
          exponentialBackoff: true,
          shouldRetry: isRetryableError,
        }
      );

      items.push(toWorkItemSourceItem(workItemId, response.data));
    } catch (error) {
      const message = describeFailure(workItemId, error);
      logger.error('Failed to fetch Azure DevOps work item', { work_item_id: workItemId, error: message });
      throw new SourceFetchError(message, 'azure');
    }
  }

  return items;
}

/**
 * Reads the configured project to check the organization, project and
 * token. Returns the project name.
 */
export async function verifyAzureProject(
  settings: AzureDevOpsSettings,
  http: AxiosInstance = axios.create()
): Promise<string> {
  try {
    const response = await http.get<unknown>(projectUrl(settings), {
      auth: { username: '', password: settings.pat },
      headers: { Accept: 'application/json' },
      timeout: 30000,
    });

    const name = isRecord(response.data) && typeof response.data.name === 'string' ? response.data.name : 'Unknown';
    logger.info('Azure DevOps connection verified', { organization: settings.organization, project: name });
    return name;
  } catch (error) {
    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    const message = status === 401
      ? 'Azure DevOps authentication failed. Check the Personal Access Token.'
      : status === 404
        ? `Project ${settings.project} not found in organization ${settings.organization}.`
        : `Could not connect to Azure DevOps: ${errorMessage(error)}`;
    logger.error('Azure DevOps connection check failed', { organization: settings.organization, error: message });
    throw new SourceFetchError(message, 'azure');
  }
}
