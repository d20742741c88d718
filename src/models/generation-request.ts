import { SourceType } from './test-case-document';

/**
 * Body of a generation request. `item_ids` are Jira issue keys or Azure
 * DevOps work item ids; `url` and `text` carry the web page and text
 * sources. An image source comes as `image_url` or as an uploaded
 * `image_data` data URL, with `text` as optional notes.
 */
export interface GenerationRequest {
  source_type: SourceType;
  test_case_types: string[];
  item_ids?: string[];
  url?: string;
  text?: string;
  summary?: string;
  image_url?: string;
  image_data?: string;
}

/**
 * What a source resolves to before prompting: one entry per issue, work
 * item or page.
 */
export interface SourceItem {
  id: string;
  summary: string;
  description: string;
  // base64 data URLs
  images?: string[];
}
