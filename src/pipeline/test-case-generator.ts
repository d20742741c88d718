import { TestTypesConfig } from '../models/config';
import { ChatMessage, LlmProvider } from '../llm/types';
import { buildPrompt, PromptInput, PromptMessages } from './prompt-builder';
import { SECTION_MARKER } from './section-splitter';
import { ContextLogger, createContextLogger } from '../utils/logger';
import { GenerationError, errorMessage } from '../utils/errors';

export interface GenerationInput extends PromptInput {
  test_types: string[];
}

export interface GenerationOutput {
  raw_text: string;
  generated_types: string[];
  failed_types: string[];
  skipped_types: string[];
}

export interface GeneratorDeps {
  primary: LlmProvider;
  fallback?: LlmProvider;
  testTypes: TestTypesConfig;
}

export function formatSectionBlock(testType: string, content: string): string {
  return `${SECTION_MARKER} ${testType}\n\n${content}`;
}

async function executeAttempt(
  provider: LlmProvider,
  promptMessages: PromptMessages,
  attemptType: 'primary' | 'fallback',
  contextLogger: ContextLogger
): Promise<string | null> {
  const startTime = Date.now();

  const messages: ChatMessage[] = [
    { role: 'system', content: promptMessages.systemMessage },
    { role: 'user', content: promptMessages.userMessage, ...(promptMessages.images && { images: promptMessages.images }) },
  ];

  try {
    const response = await provider.generateCompletion(messages);
    const content = response.content.trim();

    contextLogger.debug(`${attemptType} attempt finished`, {
      provider: provider.name,
      duration_ms: Date.now() - startTime,
      response_length: content.length,
    });

    if (!content) {
      contextLogger.warn(`Received empty response on ${attemptType} attempt`, { provider: provider.name });
      return null;
    }
    return content;
  } catch (error) {
    contextLogger.error(`${attemptType} attempt failed`, {
      provider: provider.name,
      error: errorMessage(error),
      duration_ms: Date.now() - startTime,
    });
    return null;
  }
}

/**
 * Asks the LLM for each selected test type in turn and concatenates the
 * answers, each under its own `TEST TYPE:` header. A type that fails on
 * both providers is reported in `failed_types`; the rest still go through.
 */
export async function generateTestCaseText(
  input: GenerationInput,
  deps: GeneratorDeps,
  jobId?: string
): Promise<GenerationOutput> {
  const contextLogger = createContextLogger({
    step: 'test-case-generation',
    job_id: jobId,
    source_type: input.source_type,
  });

  if (!input.description.trim()) {
    throw new GenerationError('No description provided for test case generation');
  }
  if (input.test_types.length === 0) {
    throw new GenerationError('No test types selected for test case generation');
  }

  contextLogger.info('Generating test cases', {
    test_types: input.test_types,
    description_length: input.description.length,
  });

  const blocks: string[] = [];
  const generatedTypes: string[] = [];
  const failedTypes: string[] = [];
  const skippedTypes: string[] = [];

  for (const testType of input.test_types) {
    const typeConfig = deps.testTypes[testType];
    if (!typeConfig) {
      contextLogger.warn('Skipping unknown test type', { test_type: testType });
      skippedTypes.push(testType);
      continue;
    }

    const promptMessages = buildPrompt(testType, typeConfig, input);

    let content = await executeAttempt(deps.primary, promptMessages, 'primary', contextLogger);
    if (content === null && deps.fallback) {
      contextLogger.info('Primary attempt produced nothing, attempting fallback', { test_type: testType });
      content = await executeAttempt(deps.fallback, promptMessages, 'fallback', contextLogger);
    }

    if (content === null) {
      failedTypes.push(testType);
      continue;
    }

    blocks.push(formatSectionBlock(testType, content));
    generatedTypes.push(testType);
    contextLogger.info('Generated test cases for type', { test_type: testType });
  }

  if (blocks.length === 0) {
    throw new GenerationError('Failed to generate any test cases', failedTypes);
  }

  contextLogger.info('Test case generation completed', {
    generated_types: generatedTypes,
    failed_types: failedTypes,
    skipped_types: skippedTypes,
  });

  return {
    raw_text: blocks.join('\n\n'),
    generated_types: generatedTypes,
    failed_types: failedTypes,
    skipped_types: skippedTypes,
  };
}
