import Joi from 'joi';
import { ApiError } from './error-handler';
import { errorMessage } from '../../utils/errors';
import { GenerationRequest } from '../../models/generation-request';
import { SOURCE_TYPES, SourceType } from '../../models/test-case-document';
import { DEFAULT_SECTION, TestCaseRecord } from '../../models/test-case';
import { IMAGE_DATA_URL_PATTERN } from '../../integrations/image-client';

export interface ParseRequestBody {
  text: string;
  default_section?: string;
}

export interface ShareRequestBody {
  test_cases: TestCaseRecord[];
  source_type: SourceType;
  item_ids: string[];
  test_types: string[];
  raw_text: string;
  status_values: Record<string, string>;
}

export interface StatusValuesBody {
  status_values: Record<string, string>;
}

export interface JiraConnectionBody {
  jira_url: string;
  jira_user: string;
  jira_token: string;
}

export interface AzureConnectionBody {
  azure_url: string;
  azure_org: string;
  azure_project: string;
  azure_pat: string;
}

export interface UpdateStatusBody {
  key: string;
  test_case_id: string;
  status: string;
}

const generateRequestSchema = Joi.object<GenerationRequest>({
  source_type: Joi.string().valid(...SOURCE_TYPES).required(),
  test_case_types: Joi.array().items(Joi.string().trim().min(1)).min(1).required(),
  item_ids: Joi.when('source_type', {
    is: Joi.valid('jira', 'azure'),
    then: Joi.array().items(Joi.string().trim().min(1)).min(1).required(),
    otherwise: Joi.array().items(Joi.string()).optional(),
  }),
  url: Joi.when('source_type', {
    is: 'url',
    then: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
    otherwise: Joi.string().optional(),
  }),
  text: Joi.when('source_type', {
    is: 'text',
    then: Joi.string().trim().min(1).required(),
    otherwise: Joi.string().allow('').optional(),
  }),
  summary: Joi.string().allow('').optional(),
  image_url: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  image_data: Joi.string()
    .pattern(IMAGE_DATA_URL_PATTERN, 'base64 image data URL')
    .optional(),
});

const parseRequestSchema = Joi.object<ParseRequestBody>({
  text: Joi.string().allow('').required(),
  default_section: Joi.string().allow('').optional(),
});

const testCaseRecordSchema = Joi.object<TestCaseRecord>({
  section: Joi.string().allow('').default(DEFAULT_SECTION),
  title: Joi.string().allow('').required(),
  scenario: Joi.string().allow('').optional(),
  preconditions: Joi.string().allow('').optional(),
  steps: Joi.array().items(Joi.string().allow('')).optional(),
  expected_result: Joi.string().allow('').optional(),
  actual_result: Joi.string().allow('').optional(),
  status: Joi.string().allow('').optional(),
  priority: Joi.string().allow('').optional(),
  test_data: Joi.string().allow('').optional(),
});

const shareRequestSchema = Joi.object<ShareRequestBody>({
  test_cases: Joi.array().items(testCaseRecordSchema).min(1).required(),
  source_type: Joi.string().valid(...SOURCE_TYPES).default('text'),
  item_ids: Joi.array().items(Joi.string()).default([]),
  test_types: Joi.array().items(Joi.string()).default([]),
  raw_text: Joi.string().allow('').default(''),
  status_values: Joi.object().pattern(Joi.string(), Joi.string().allow('')).default({}),
});

const updateStatusSchema = Joi.object<UpdateStatusBody>({
  key: Joi.string().trim().min(1).required(),
  test_case_id: Joi.string().trim().min(1).required(),
  status: Joi.string().trim().min(1).required(),
});

const statusValuesSchema = Joi.object<StatusValuesBody>({
  status_values: Joi.object().pattern(Joi.string(), Joi.string().allow('')).required(),
});

const jiraConnectionSchema = Joi.object<JiraConnectionBody>({
  jira_url: Joi.string().trim().min(1).required(),
  jira_user: Joi.string().trim().min(1).required(),
  jira_token: Joi.string().trim().min(1).required(),
});

const azureConnectionSchema = Joi.object<AzureConnectionBody>({
  azure_url: Joi.string().trim().min(1).default('https://dev.azure.com'),
  azure_org: Joi.string().trim().min(1).required(),
  azure_project: Joi.string().trim().min(1).required(),
  azure_pat: Joi.string().trim().min(1).required(),
});

const statusOverridesSchema = Joi.object<Record<string, string>>().pattern(Joi.string(), Joi.string().allow(''));

function validateBody<T>(schema: Joi.ObjectSchema<T>, body: unknown): T {
  const result = schema.required().validate(body, { stripUnknown: true });
  if (result.error) {
    throw new ApiError(`Invalid request body: ${result.error.message}`, 400);
  }
  return result.value;
}

export function validateGenerateRequest(body: unknown): GenerationRequest {
  const request = validateBody(generateRequestSchema, body);
  if (request.source_type === 'image' && !request.image_url && !request.image_data) {
    throw new ApiError('Invalid request body: "image_url" or "image_data" is required for image sources', 400);
  }
  return request;
}

export function validateParseRequest(body: unknown): ParseRequestBody {
  return validateBody(parseRequestSchema, body);
}

export function validateShareRequest(body: unknown): ShareRequestBody {
  return validateBody(shareRequestSchema, body);
}

export function validateUpdateStatusRequest(body: unknown): UpdateStatusBody {
  return validateBody(updateStatusSchema, body);
}

export function validateStatusValuesRequest(body: unknown): StatusValuesBody {
  return validateBody(statusValuesSchema, body);
}

export function validateJiraConnectionRequest(body: unknown): JiraConnectionBody {
  return validateBody(jiraConnectionSchema, body);
}

export function validateAzureConnectionRequest(body: unknown): AzureConnectionBody {
  return validateBody(azureConnectionSchema, body);
}

/**
 * Parses the `status` query parameter of the Excel export: a JSON object
 * mapping test case titles to status values.
 */
export function parseStatusOverrides(raw: unknown): Record<string, string> {
  if (raw === undefined || raw === '') {
    return {};
  }
  if (typeof raw !== 'string') {
    throw new ApiError('Invalid status parameter: expected a JSON object', 400);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ApiError(`Invalid status parameter: ${errorMessage(error)}`, 400);
  }

  const result = statusOverridesSchema.validate(parsed);
  if (result.error) {
    throw new ApiError(`Invalid status parameter: ${result.error.message}`, 400);
  }
  return result.value;
}
