import axios, { AxiosInstance } from 'axios';
import { SourceItem } from '../models/generation-request';
import { retryWithBackoff, isRetryableError } from '../utils/retry-handler';
import { SourceFetchError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const IMAGE_DATA_URL_PATTERN = /^data:image\/(?:png|jpeg|jpg|gif|webp);base64,[A-Za-z0-9+/]+={0,2}$/;

const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export interface ImageSourceInput {
  image_url?: string;
  image_data?: string;
  summary?: string;
  text?: string;
}

/**
 * Downloads an image and returns it as a base64 data URL. Responses that
 * are not images are rejected.
 */
export async function fetchImageAsDataUrl(imageUrl: string, http: AxiosInstance = axios.create()): Promise<string> {
  logger.debug('Fetching image', { image_url: imageUrl });

  try {
    const response = await retryWithBackoff(
      () =>
        http.get<ArrayBuffer>(imageUrl, {
          responseType: 'arraybuffer',
          timeout: 30000,
          maxContentLength: MAX_IMAGE_BYTES,
        }),
      {
        maxAttempts: 2,
        delayMs: 1000,
        exponentialBackoff: false,
        shouldRetry: isRetryableError,
      }
    );

    const contentType = String(response.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();
    if (!contentType.startsWith('image/')) {
      throw new Error(`Expected an image but received ${contentType || 'no content type'}`);
    }

    const encoded = Buffer.from(response.data).toString('base64');
    logger.debug('Image fetched', { image_url: imageUrl, content_type: contentType, size_bytes: response.data.byteLength });
    return `data:${contentType};base64,${encoded}`;
  } catch (error) {
    logger.error('Failed to fetch image', { image_url: imageUrl, error: errorMessage(error) });
    throw new SourceFetchError(`Failed to fetch image ${imageUrl}: ${errorMessage(error)}`, 'image');
  }
}

export async function loadImageSource(input: ImageSourceInput, http?: AxiosInstance): Promise<SourceItem> {
  let dataUrl: string;
  if (input.image_data) {
    if (!IMAGE_DATA_URL_PATTERN.test(input.image_data)) {
      throw new SourceFetchError('Uploaded image must be a base64 PNG, JPEG, GIF or WebP data URL', 'image');
    }
    dataUrl = input.image_data;
  } else if (input.image_url) {
    dataUrl = await fetchImageAsDataUrl(input.image_url, http);
  } else {
    throw new SourceFetchError('An image URL or uploaded image is required for image sources', 'image');
  }

  return {
    id: input.image_url || 'image',
    summary: input.summary || 'Uploaded image',
    description: input.text?.trim() || 'No additional notes. Derive the test cases from the image alone.',
    images: [dataUrl],
  };
}
