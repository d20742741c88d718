import { GenerationRequest, SourceItem } from '../models/generation-request';
import { TestCaseDocument } from '../models/test-case-document';
import { TestCaseRecord } from '../models/test-case';
import { fetchJiraIssues } from '../integrations/jira-client';
import { fetchAzureWorkItems } from '../integrations/azure-devops-client';
import { fetchWebPage } from '../integrations/web-page-client';
import { loadImageSource } from '../integrations/image-client';
import { generateTestCaseText, GeneratorDeps } from './test-case-generator';
import { parseTestCases } from './test-case-parser';
import { saveTestCaseDocument } from '../storage/test-case-store';
import { createContextLogger } from '../utils/logger';
import { GenerationError, SourceFetchError, errorMessage } from '../utils/errors';

export interface OrchestratorDeps extends GeneratorDeps {
  fetchSourceItems?: (request: GenerationRequest) => Promise<SourceItem[]>;
}

export interface OrchestrationResult {
  document: TestCaseDocument;
  generated_types: string[];
  failed_types: string[];
}

export async function resolveSourceItems(request: GenerationRequest): Promise<SourceItem[]> {
  switch (request.source_type) {
    case 'jira':
      return fetchJiraIssues(request.item_ids ?? []);
    case 'azure':
      return fetchAzureWorkItems(request.item_ids ?? []);
    case 'url':
      if (!request.url) {
        throw new SourceFetchError('A URL is required for url sources', 'url');
      }
      return [await fetchWebPage(request.url)];
    case 'text':
      if (!request.text?.trim()) {
        throw new SourceFetchError('Text is required for text sources', 'text');
      }
      return [{ id: 'text', summary: request.summary || 'Provided requirements', description: request.text }];
    case 'image':
      return [await loadImageSource(request)];
  }
}

function itemIdsFor(request: GenerationRequest, items: SourceItem[]): string[] {
  if (request.source_type === 'url' && request.url) {
    return [request.url];
  }
  return request.item_ids && request.item_ids.length > 0 ? request.item_ids : items.map(item => item.id);
}

/**
 * Runs one generation request end to end: resolve the source, ask the LLM
 * per source item and test type, parse the answers and save them as a
 * shareable document. Items are parsed separately so that two items
 * producing the same test type do not collapse into one section.
 */
export async function runGeneration(
  request: GenerationRequest,
  deps: OrchestratorDeps,
  jobId?: string
): Promise<OrchestrationResult> {
  const contextLogger = createContextLogger({
    step: 'generation-orchestration',
    job_id: jobId,
    source_type: request.source_type,
  });
  const startTime = Date.now();

  const items = await (deps.fetchSourceItems ?? resolveSourceItems)(request);
  contextLogger.info('Source resolved', { item_count: items.length });

  const rawBlocks: string[] = [];
  const records: TestCaseRecord[] = [];
  const generatedTypes = new Set<string>();
  const failedTypes = new Set<string>();

  for (const item of items) {
    try {
      const output = await generateTestCaseText(
        {
          source_type: request.source_type,
          summary: item.summary,
          description: item.description,
          url: request.url,
          images: item.images,
          test_types: request.test_case_types,
        },
        deps,
        jobId
      );

      rawBlocks.push(output.raw_text);
      records.push(...parseTestCases(output.raw_text).test_cases);
      output.generated_types.forEach(type => generatedTypes.add(type));
      output.failed_types.forEach(type => failedTypes.add(type));
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      contextLogger.warn('No test cases generated for source item', { item_id: item.id, error: errorMessage(error) });
      error.failedTypes.forEach(type => failedTypes.add(type));
    }
  }

  if (rawBlocks.length === 0) {
    throw new GenerationError('Failed to generate any test cases', [...failedTypes]);
  }

  // A type counts as failed only when no item produced it
  const stillFailed = [...failedTypes].filter(type => !generatedTypes.has(type));

  const document = await saveTestCaseDocument({
    source_type: request.source_type,
    item_ids: itemIdsFor(request, items),
    test_types: [...generatedTypes],
    raw_text: rawBlocks.join('\n\n'),
    test_data: records,
  });

  contextLogger.info('Generation completed', {
    url_key: document.url_key,
    test_case_count: records.length,
    failed_types: stillFailed,
    duration_ms: Date.now() - startTime,
  });

  return {
    document,
    generated_types: [...generatedTypes],
    failed_types: stillFailed,
  };
}
