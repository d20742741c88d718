import { describe, it, expect } from 'vitest';
import {
  parseStatusOverrides,
  validateGenerateRequest,
  validateShareRequest,
} from '../../../src/api/middleware/request-validator';
import { ApiError } from '../../../src/api/middleware/error-handler';

describe('parseStatusOverrides', () => {
  it('treats a missing parameter as no overrides', () => {
    expect(parseStatusOverrides(undefined)).toEqual({});
    expect(parseStatusOverrides('')).toEqual({});
  });

  it('parses a JSON object of title to status', () => {
    expect(parseStatusOverrides('{"Login works":"Pass"}')).toEqual({ 'Login works': 'Pass' });
  });

  it('rejects repeated parameters, bad JSON and non-string values', () => {
    expect(() => parseStatusOverrides(['a', 'b'])).toThrow(ApiError);
    expect(() => parseStatusOverrides('{oops')).toThrow(/^Invalid status parameter: /);
    expect(() => parseStatusOverrides('{"A":1}')).toThrow(ApiError);
  });
});

describe('validateGenerateRequest', () => {
  it('requires item ids for issue trackers', () => {
    expect(() => validateGenerateRequest({ source_type: 'azure', test_case_types: ['dashboard_ui'] })).toThrow(
      'Invalid request body: "item_ids" is required'
    );
  });

  it('requires an http url for url sources', () => {
    expect(() =>
      validateGenerateRequest({ source_type: 'url', url: 'ftp://files.test', test_case_types: ['dashboard_ui'] })
    ).toThrow(ApiError);
  });

  it('strips unknown keys', () => {
    expect(
      validateGenerateRequest({ source_type: 'jira', item_ids: ['QA-1'], test_case_types: ['dashboard_ui'], extra: true })
    ).toEqual({ source_type: 'jira', item_ids: ['QA-1'], test_case_types: ['dashboard_ui'] });
  });

  it('accepts an uploaded image data url', () => {
    expect(
      validateGenerateRequest({
        source_type: 'image',
        image_data: 'data:image/webp;base64,UklGRg==',
        test_case_types: ['dashboard_ui'],
      })
    ).toEqual({ source_type: 'image', image_data: 'data:image/webp;base64,UklGRg==', test_case_types: ['dashboard_ui'] });
  });

  it('rejects image data that is not a base64 image', () => {
    expect(() =>
      validateGenerateRequest({
        source_type: 'image',
        image_data: 'data:text/html;base64,PGI+',
        test_case_types: ['dashboard_ui'],
      })
    ).toThrow(ApiError);
  });
});

describe('validateShareRequest', () => {
  it('fills defaults for optional fields', () => {
    expect(validateShareRequest({ test_cases: [{ title: 'A' }] })).toEqual({
      test_cases: [{ section: 'General', title: 'A' }],
      source_type: 'text',
      item_ids: [],
      test_types: [],
      raw_text: '',
      status_values: {},
    });
  });

  it('rejects an empty list', () => {
    expect(() => validateShareRequest({ test_cases: [] })).toThrow(ApiError);
  });
});
