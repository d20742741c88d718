import { TestTypeConfig } from '../models/config';
import { SourceType } from '../models/test-case-document';
import { createContextLogger } from '../utils/logger';

export interface PromptMessages {
  systemMessage: string;
  userMessage: string;
  images?: string[];
}

export interface PromptInput {
  source_type: SourceType;
  summary: string;
  description: string;
  url?: string;
  images?: string[];
}

export function maxCountFor(typeConfig: TestTypeConfig, sourceType: SourceType): number {
  return sourceType === 'url' ? typeConfig.url_max_count : typeConfig.max_count;
}

function buildLayoutInstructions(typeConfig: TestTypeConfig): string {
  return `You are an expert QA engineer. Your task is to create clear, detailed, and professional test cases.

STRICT FORMAT for each test case:

Title: ${typeConfig.prefix}_[SequentialNumber]_[Meaningful_Brief_Title]
Scenario: [One or two lines describing the intent of the test]
Preconditions: [State assumptions, setup, or required data before execution]
Steps to Reproduce:
1. [Step 1 in action-oriented language]
2. [Step 2]
...
Expected Result: [Clear, testable outcome of the steps]
Actual Result: [Leave as 'To be filled during execution']
Priority: [High / Medium / Low]
Test Data: [If applicable, specify input values, files, or environment details]

RULES:
- Separate test cases with a blank line.
- Each test case must cover a unique and valuable scenario.
- Steps must be clear, actionable, and written like instructions to a QA engineer.
- Expected Results must be specific and measurable.
- Do NOT duplicate scenarios.
- Do NOT mix with other test types.
- Use professional QA terminology.`;
}

function buildUrlUserMessage(testType: string, typeConfig: TestTypeConfig, input: PromptInput, maxCount: number): string {
  return `Website URL: ${input.url || input.summary}
Content Description: ${input.description}

Generate up to ${maxCount} test cases for ${typeConfig.description}.

ANALYSIS REQUIREMENTS:
- Carefully review the website's structure and functionality
- Think about real-world user workflows and how they may fail
- Consider UI, UX, and interaction edge cases
- Include cross-browser compatibility (Chrome, Firefox, Safari, Edge)
- Consider mobile responsiveness (desktop vs. mobile behavior)

TEST CASE REQUIREMENTS:
1. Prefix all test case titles with ${typeConfig.prefix}
2. Focus only on ${testType} test scenarios for web testing
3. Write detailed, step-by-step instructions that can be executed by QA
4. Specify exact expected results for every step or final outcome
5. Ensure scenarios are unique and non-overlapping
6. Include both happy paths and edge cases
7. Add test data where necessary

${buildLayoutInstructions(typeConfig)}`;
}

function buildImageUserMessage(testType: string, typeConfig: TestTypeConfig, input: PromptInput, maxCount: number): string {
  return `Image: ${input.summary}
Notes: ${input.description}

Generate up to ${maxCount} test cases for ${typeConfig.description}, based on the attached image.

ANALYSIS CHECKLIST:
1. Identify all visible UI elements: buttons, inputs, menus, text, images, icons and layout
2. Consider the user interactions and workflows the image suggests
3. Think about role-based access or permission levels if implied
4. Include edge cases, error states and unusual user behaviors
5. Consider platform variations (desktop, mobile, tablet) if applicable
6. Prioritize scenarios that impact core functionality or user experience

TEST CASE REQUIREMENTS:
1. Prefix all test case titles with ${typeConfig.prefix}
2. Focus only on ${testType} scenarios
3. Only describe elements that are visible in the image or stated in the notes
4. Provide clear and measurable expected results
5. Do not add filler cases to reach the maximum

${buildLayoutInstructions(typeConfig)}`;
}

function buildTaskUserMessage(testType: string, typeConfig: TestTypeConfig, input: PromptInput, maxCount: number): string {
  return `Task Title: ${input.summary}
Task Description: ${input.description}

Generate up to ${maxCount} test cases for ${typeConfig.description}.

ANALYSIS REQUIREMENTS:
- Carefully analyze the task description
- Identify all functional components and user actions
- Think about positive, negative, and edge case scenarios
- Consider different user roles, permissions, and data inputs
- Anticipate possible failure points or boundary conditions

TEST CASE REQUIREMENTS:
1. Prefix all test case titles with ${typeConfig.prefix}
2. Focus only on ${testType} scenarios
3. Write step-by-step reproducible instructions
4. Provide clear and measurable expected results
5. Ensure each case is unique and does not overlap
6. Include test data where relevant
7. Include priority level for execution planning

${buildLayoutInstructions(typeConfig)}`;
}

export function buildPrompt(testType: string, typeConfig: TestTypeConfig, input: PromptInput): PromptMessages {
  const maxCount = maxCountFor(typeConfig, input.source_type);

  const contextLogger = createContextLogger({
    step: 'prompt-building',
    test_type: testType,
    source_type: input.source_type,
  });

  const webFocus = input.source_type === 'url'
    ? ' specializing in web testing'
    : '';

  const systemMessage = input.source_type === 'image'
    ? `You are a senior QA engineer generating test cases from the provided image. Analyze the image thoroughly and generate the appropriate number of ${testType} test cases (up to ${maxCount} maximum) based on the image complexity. Use ${typeConfig.prefix} as the prefix. Focus on quality and relevance over quantity.`
    : `You are a senior QA engineer${webFocus}. Generate the appropriate number of ${testType} test cases (up to ${maxCount} maximum) by analyzing the content complexity and generating only what's truly needed. Use ${typeConfig.prefix} as the prefix. Focus on quality and relevance over quantity.`;

  let userMessage: string;
  if (input.source_type === 'url') {
    userMessage = buildUrlUserMessage(testType, typeConfig, input, maxCount);
  } else if (input.source_type === 'image') {
    userMessage = buildImageUserMessage(testType, typeConfig, input, maxCount);
  } else {
    userMessage = buildTaskUserMessage(testType, typeConfig, input, maxCount);
  }

  contextLogger.debug('Prompt built', {
    max_count: maxCount,
    system_message_length: systemMessage.length,
    user_message_length: userMessage.length,
    image_count: input.images?.length ?? 0,
  });

  return input.images && input.images.length > 0
    ? { systemMessage, userMessage, images: input.images }
    : { systemMessage, userMessage };
}
