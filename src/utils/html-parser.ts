import * as cheerio from 'cheerio';
import logger from './logger';
import { errorMessage } from './errors';

export function stripHTMLTags(html: string): string {
  try {
    const $ = cheerio.load(html);

    $('script, style, noscript').remove();

    return $.text().replace(/\s+/g, ' ').trim();
  } catch (error) {
    logger.warn('HTML parsing error, attempting text extraction', { error: errorMessage(error) });
    return html.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
  }
}
