import { describe, it, expect } from 'vitest';
import axios from 'axios';
import {
  extractWebPageData,
  fetchWebPage,
  resolveHref,
  summarizeWebPage,
  WebPageData,
} from '../../src/integrations/web-page-client';
import { SourceFetchError } from '../../src/utils/errors';

const PAGE = `<html>
<head><title> Demo Shop </title><meta name="description" content="Buy  things"></head>
<body>
<nav><a href="/">Home</a> <a href="/cart">Cart</a></nav>
<h1>Welcome</h1>
<h2>Deals</h2>
<a href="#top">Top</a> <a href="javascript:void(0)">Nothing</a>
<form action="/search"><input type="text" name="q" placeholder="Search"> <select name="category"></select> <button>Go</button></form>
<input type="submit" value="Send">
<img src="a.png"><img src="b.png">
<script>var tracking = true;</script>
</body>
</html>`;

describe('extractWebPageData', () => {
  const data = extractWebPageData(PAGE, 'https://shop.test/index.html');

  it('reads the head', () => {
    expect(data.title).toBe('Demo Shop');
    expect(data.meta_description).toBe('Buy things');
  });

  it('collects headings, resolved links and navigation', () => {
    expect(data.headings).toEqual([
      { level: 1, text: 'Welcome' },
      { level: 2, text: 'Deals' },
    ]);
    expect(data.links).toEqual([
      { text: 'Home', href: 'https://shop.test/' },
      { text: 'Cart', href: 'https://shop.test/cart' },
    ]);
    expect(data.navigation).toEqual(['Home', 'Cart']);
  });

  it('collects forms, buttons and images', () => {
    expect(data.forms).toEqual([
      {
        action: '/search',
        method: 'GET',
        inputs: [
          { type: 'text', name: 'q', placeholder: 'Search' },
          { type: 'select', name: 'category', placeholder: '' },
        ],
      },
    ]);
    expect(data.buttons).toEqual(['Go', 'Send']);
    expect(data.images).toBe(2);
  });

  it('leaves scripts out of the text content', () => {
    expect(data.text_content).not.toContain('tracking');
    expect(data.text_content.startsWith('Home Cart Welcome Deals')).toBe(true);
  });
});

describe('resolveHref', () => {
  it('resolves relative links against the page', () => {
    expect(resolveHref('../about', 'https://shop.test/a/b')).toBe('https://shop.test/about');
  });
});

describe('summarizeWebPage', () => {
  it('lists structure counts and details', () => {
    const data: WebPageData = {
      url: 'https://shop.test',
      title: 'Demo Shop',
      meta_description: 'Buy things',
      headings: [{ level: 1, text: 'Welcome' }],
      links: [],
      forms: [{ action: '/search', method: 'GET', inputs: [{ type: 'text', name: 'q', placeholder: '' }] }],
      buttons: ['Go'],
      images: 0,
      navigation: [],
      text_content: 'Welcome to the shop',
    };

    expect(summarizeWebPage(data)).toBe(
      [
        'URL: https://shop.test',
        'Title: Demo Shop',
        'Meta Description: Buy things',
        '',
        'Page Structure:',
        '- Headings: 1 headings found',
        '- Links: 0 links found',
        '- Forms: 1 forms found (1 inputs)',
        '- Buttons: 1 buttons found',
        '- Images: 0 images found',
        '- Main navigation: 0 items',
        '',
        'Headings:',
        '- H1: Welcome',
        '',
        'Buttons: Go',
        '',
        'Content Summary: Welcome to the shop',
      ].join('\n')
    );
  });

  it('truncates long page text', () => {
    const data = extractWebPageData(`<body><p>${'a'.repeat(600)}</p></body>`, 'https://shop.test');

    expect(summarizeWebPage(data).endsWith(`Content Summary: ${'a'.repeat(500)}...`)).toBe(true);
  });
});

describe('fetchWebPage', () => {
  it('turns the fetched page into a source item', async () => {
    const http = axios.create({
      adapter: async config => ({ data: PAGE, status: 200, statusText: 'OK', headers: {}, config }),
    });

    const item = await fetchWebPage('https://shop.test/index.html', http);

    expect(item.id).toBe('https://shop.test/index.html');
    expect(item.summary).toBe('Demo Shop');
    expect(item.description.startsWith('URL: https://shop.test/index.html\nTitle: Demo Shop\n')).toBe(true);
  });

  it('wraps failures in SourceFetchError', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('blocked');
      },
    });

    const error = await fetchWebPage('https://shop.test', http).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SourceFetchError);
    expect(error instanceof SourceFetchError && error.message).toBe('Failed to fetch https://shop.test: blocked');
  });
});
