import { describe, it, expect } from 'vitest';
import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import {
  AzureDevOpsSettings,
  fetchAzureWorkItems,
  normalizeBaseUrl,
  projectUrl,
  toWorkItemSourceItem,
  verifyAzureProject,
  workItemUrl,
} from '../../src/integrations/azure-devops-client';

const settings: AzureDevOpsSettings = {
  baseUrl: 'dev.azure.com/',
  organization: 'contoso',
  project: 'Web Shop',
  pat: 'test-secret',
};

describe('workItemUrl', () => {
  it('builds the REST url with an escaped project', () => {
    expect(workItemUrl(settings, '42')).toBe(
      'https://dev.azure.com/contoso/Web%20Shop/_apis/wit/workitems/42?api-version=6.0'
    );
  });

  it('normalizes the base url', () => {
    expect(normalizeBaseUrl('http://tfs.local//')).toBe('http://tfs.local');
  });
});

describe('toWorkItemSourceItem', () => {
  it('strips html from the description', () => {
    const item = toWorkItemSourceItem('42', {
      fields: { 'System.Title': 'Checkout', 'System.Description': '<div>Pay <b>now</b></div>' },
    });

    expect(item).toEqual({ id: '42', summary: 'Checkout', description: 'Pay now' });
  });

  it('fills in placeholders for missing fields', () => {
    expect(toWorkItemSourceItem('7', {})).toEqual({
      id: '7',
      summary: 'No Title Found',
      description: 'No Description Found',
    });
  });
});

describe('fetchAzureWorkItems', () => {
  it('fetches each id with the token as basic auth password', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async config => {
        seen.push(config);
        return {
          data: { fields: { 'System.Title': 'Checkout', 'System.Description': 'Plain' } },
          status: 200,
          statusText: 'OK',
          headers: {},
          config,
        };
      },
    });

    const items = await fetchAzureWorkItems(['42'], settings, http);

    expect(items).toEqual([{ id: '42', summary: 'Checkout', description: 'Plain' }]);
    expect(seen[0].url).toBe(workItemUrl(settings, '42'));
    expect(seen[0].auth).toEqual({ username: '', password: 'test-secret' });
  });

  it('explains a missing work item', async () => {
    const http = axios.create({
      adapter: async config => {
        throw new AxiosError('Not Found', 'ERR_BAD_REQUEST', config, null, {
          data: {},
          status: 404,
          statusText: 'Not Found',
          headers: {},
          config,
        });
      },
    });

    await expect(fetchAzureWorkItems(['99'], settings, http)).rejects.toThrow('Work item 99 not found in Azure DevOps.');
  });

  it('requires settings', async () => {
    await expect(fetchAzureWorkItems(['1'], null)).rejects.toThrow('Azure DevOps settings not configured');
  });
});

describe('verifyAzureProject', () => {
  it('reads the project and returns its name', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async config => {
        seen.push(config);
        return { data: { id: 'p-1', name: 'Web Shop' }, status: 200, statusText: 'OK', headers: {}, config };
      },
    });

    await expect(verifyAzureProject(settings, http)).resolves.toBe('Web Shop');
    expect(seen[0].url).toBe('https://dev.azure.com/contoso/_apis/projects/Web%20Shop?api-version=6.0');
    expect(seen[0].url).toBe(projectUrl(settings));
    expect(seen[0].auth).toEqual({ username: '', password: 'test-secret' });
  });

  it('explains a rejected token', async () => {
    const http = axios.create({
      adapter: async config => {
        throw new AxiosError('Unauthorized', 'ERR_BAD_REQUEST', config, null, {
          data: {},
          status: 401,
          statusText: 'Unauthorized',
          headers: {},
          config,
        });
      },
    });

    await expect(verifyAzureProject(settings, http)).rejects.toThrow(
      'Azure DevOps authentication failed. Check the Personal Access Token.'
    );
  });
});
