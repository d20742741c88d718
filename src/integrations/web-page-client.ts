import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { SourceItem } from '../models/generation-request';
import { retryWithBackoff, isRetryableError } from '../utils/retry-handler';
import { SourceFetchError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

const TEXT_SUMMARY_LENGTH = 500;

export interface WebPageHeading {
  level: number;
  text: string;
}

export interface WebPageLink {
  text: string;
  href: string;
}

export interface WebPageForm {
  action: string;
  method: string;
  inputs: Array<{ type: string; name: string; placeholder: string }>;
}

export interface WebPageData {
  url: string;
  title: string;
  meta_description: string;
  headings: WebPageHeading[];
  links: WebPageLink[];
  forms: WebPageForm[];
  buttons: string[];
  images: number;
  navigation: string[];
  text_content: string;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function resolveHref(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch (error) {
    logger.debug('Keeping unresolvable link as written', { href, error: errorMessage(error) });
    return href;
  }
}

export function extractWebPageData(html: string, url: string): WebPageData {
  const $ = cheerio.load(html);

  const headings: WebPageHeading[] = [];
  $('h1, h2, h3, h4, h5, h6').each((_, element) => {
    const text = collapse($(element).text());
    if (text) {
      headings.push({ level: Number(element.tagName.slice(1)), text });
    }
  });

  const links: WebPageLink[] = [];
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') || '';
    if (!href || href.startsWith('#') || href.startsWith('javascript:')) {
      return;
    }
    links.push({ text: collapse($(element).text()), href: resolveHref(href, url) });
  });

  const forms: WebPageForm[] = [];
  $('form').each((_, form) => {
    const inputs: WebPageForm['inputs'] = [];
    $(form)
      .find('input, select, textarea')
      .each((__, input) => {
        const field = $(input);
        inputs.push({
          type: field.attr('type') || input.tagName,
          name: field.attr('name') || '',
          placeholder: field.attr('placeholder') || '',
        });
      });
    forms.push({
      action: $(form).attr('action') || '',
      method: ($(form).attr('method') || 'get').toUpperCase(),
      inputs,
    });
  });

  const buttons: string[] = [];
  $('button, input[type="submit"], input[type="button"]').each((_, element) => {
    const button = $(element);
    const label = collapse(button.text()) || button.attr('value') || button.attr('aria-label') || '';
    if (label) {
      buttons.push(label);
    }
  });

  const navigation: string[] = [];
  $('nav a').each((_, element) => {
    const text = collapse($(element).text());
    if (text) {
      navigation.push(text);
    }
  });

  const images = $('img').length;
  const title = collapse($('title').first().text());
  const metaDescription = $('meta[name="description"]').attr('content') || '';

  $('script, style, noscript').remove();
  const textContent = collapse($('body').text());

  return {
    url,
    title,
    meta_description: collapse(metaDescription),
    headings,
    links,
    forms,
    buttons,
    images,
    navigation,
    text_content: textContent,
  };
}

/**
 * Condenses extracted page data into the description handed to the prompt.
 */
export function summarizeWebPage(data: WebPageData): string {
  const inputCount = data.forms.reduce((total, form) => total + form.inputs.length, 0);
  const lines = [
    `URL: ${data.url}`,
    `Title: ${data.title}`,
    `Meta Description: ${data.meta_description}`,
    '',
    'Page Structure:',
    `- Headings: ${data.headings.length} headings found`,
    `- Links: ${data.links.length} links found`,
    `- Forms: ${data.forms.length} forms found (${inputCount} inputs)`,
    `- Buttons: ${data.buttons.length} buttons found`,
    `- Images: ${data.images} images found`,
    `- Main navigation: ${data.navigation.length} items`,
  ];

  if (data.headings.length > 0) {
    lines.push('', 'Headings:', ...data.headings.map(heading => `- H${heading.level}: ${heading.text}`));
  }
  if (data.buttons.length > 0) {
    lines.push('', `Buttons: ${data.buttons.join(', ')}`);
  }
  if (data.navigation.length > 0) {
    lines.push('', `Navigation: ${data.navigation.join(', ')}`);
  }

  const summary = data.text_content.length > TEXT_SUMMARY_LENGTH
    ? `${data.text_content.slice(0, TEXT_SUMMARY_LENGTH)}...`
    : data.text_content;
  lines.push('', `Content Summary: ${summary}`);

  return lines.join('\n');
}

export async function fetchWebPage(url: string, http: AxiosInstance = axios.create()): Promise<SourceItem> {
  logger.debug('Fetching web page', { url });

  try {
    const response = await retryWithBackoff(
      () =>
        http.get<string>(url, {
          responseType: 'text',
          timeout: 30000,
          headers: {
            'User-Agent': 'Mozilla/5.0 (compatible; QA-Test-Case-Studio/1.0)',
            Accept: 'text/html,application/xhtml+xml',
          },
        }),
      {
        maxAttempts: 2,
        delayMs: 1000,
        exponentialBackoff: true,
        shouldRetry: isRetryableError,
      }
    );

    const data = extractWebPageData(String(response.data), url);
    logger.info('Web page extracted', {
      url,
      headings: data.headings.length,
      forms: data.forms.length,
      links: data.links.length,
    });

    return {
      id: url,
      summary: data.title || url,
      description: summarizeWebPage(data),
    };
  } catch (error) {
    logger.error('Failed to fetch web page', { url, error: errorMessage(error) });
    throw new SourceFetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, 'url');
  }
}
