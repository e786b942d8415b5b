/**
 * @fileoverview Unit tests for the web tools, against a stubbed fetch
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createApiRequestTool, createDownloadFileTool, createScrapeWebTool, createSearchWebTool, filenameFromUrl } from './web.js';
import { SEPARATOR } from './shared.js';

describe('web tools', () => {
  const fetchMock = vi.fn<Parameters<typeof fetch>, Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('api_request', () => {
    it('should pretty-print a JSON response', async () => {
      fetchMock.mockResolvedValueOnce(new Response('{"ok":true}', {
        status: 200,
        headers: { 'content-type': 'application/json' },
      }));

      const result = await createApiRequestTool().execute({
        url: 'https://api.example.test/items',
        params: { page: 2 },
      });

      expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://api.example.test/items?page=2');
      expect(result).toBe([
        'API Response from GET https://api.example.test/items:',
        'Status: 200',
        'Content-Type: application/json',
        SEPARATOR,
        '{\n  "ok": true\n}',
      ].join('\n'));
    });

    it('should send object data as JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('created', { status: 201 }));

      await createApiRequestTool().execute({
        url: 'https://api.example.test/items',
        method: 'post',
        data: { name: 'widget' },
      });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"name":"widget"}');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should cut long text bodies', async () => {
      fetchMock.mockResolvedValueOnce(new Response('a'.repeat(1500)));

      const result = await createApiRequestTool().execute({ url: 'https://api.example.test/text' });

      expect(result.split(`${SEPARATOR}\n`)[1]).toBe('a'.repeat(1000));
    });

    it('should report a failed request', async () => {
      fetchMock.mockRejectedValueOnce(new Error('offline'));

      expect(await createApiRequestTool().execute({ url: 'https://api.example.test/' }))
        .toBe('API request failed: offline');
    });

    it('should reject a malformed URL without fetching', async () => {
      expect(await createApiRequestTool().execute({ url: 'not a url' }))
        .toBe('Invalid arguments for api_request: url: Invalid url');
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('download_file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'taskpilot-web-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should save the body under the name taken from the URL', async () => {
      fetchMock.mockResolvedValueOnce(new Response('payload'));

      const result = await createDownloadFileTool({ cwd: dir }).execute({ url: 'https://files.example.test/data.bin' });

      expect(result).toBe('Downloaded https://files.example.test/data.bin to data.bin (0.00MB)');
      expect(await readFile(join(dir, 'data.bin'), 'utf-8')).toBe('payload');
    });

    it('should report HTTP errors', async () => {
      fetchMock.mockResolvedValueOnce(new Response('missing', { status: 404 }));

      expect(await createDownloadFileTool({ cwd: dir }).execute({ url: 'https://files.example.test/a.zip' }))
        .toBe('Download failed: HTTP 404');
    });

    it('should refuse a declared size above the limit', async () => {
      fetchMock.mockResolvedValueOnce(new Response('x', { headers: { 'content-length': String(2 * 1024 * 1024) } }));

      expect(await createDownloadFileTool({ cwd: dir }).execute({ url: 'https://files.example.test/a.zip', max_size: 1 }))
        .toBe('File too large (2.0MB). Max allowed: 1MB');
    });
  });

  describe('search_web', () => {
    const page = [
      '<html><body>',
      '<div class="result"><h2 class="result__title"><a href="https://a.test/">Alpha   Result</a></h2>',
      '<a class="result__url">a.test</a><div class="result__snippet">First <b>snippet</b></div></div>',
      '<div class="result"><h2 class="result__title"><a href="https://b.test/">No snippet</a></h2></div>',
      '<div class="result"><h2 class="result__title"><a>Gamma</a></h2><div class="result__snippet">Third</div></div>',
      '</body></html>',
    ].join('\n');

    it('should list titled results with their snippets', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page, { headers: { 'content-type': 'text/html' } }));

      const result = await createSearchWebTool().execute({ query: 'alpha beta' });

      expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://html.duckduckgo.com/html/?q=alpha+beta');
      expect(result).toBe([
        "Web search results for 'alpha beta':",
        SEPARATOR,
        '1. Alpha Result',
        '   a.test',
        '   First snippet',
        '2. Gamma',
        '   N/A',
        '   Third',
      ].join('\n'));
    });

    it('should look at no more than max_results entries', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page));

      const result = await createSearchWebTool().execute({ query: 'alpha', max_results: 1 });

      expect(result.split('\n').slice(2)).toEqual(['1. Alpha Result', '   a.test', '   First snippet']);
    });

    it('should say so when the page has no results', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html><body>nothing</body></html>'));

      expect(await createSearchWebTool().execute({ query: 'zzz' })).toBe('No search results found for: zzz');
    });

    it('should report a failed search', async () => {
      fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));

      expect(await createSearchWebTool().execute({ query: 'zzz' })).toBe('Web search failed: HTTP 503');
    });
  });

  describe('scrape_web', () => {
    const page = [
      '<html><head><title>Test Page</title><style>p { color: red; }</style></head>',
      '<body><h1>Welcome</h1><script>var x = 1;</script><p>First paragraph</p>',
      '<p class="note">A <a href="/docs">docs link</a></p>',
      '<a href="https://other.test/x">Other</a><a href="mailto:me@example.test">Mail</a></body></html>',
    ].join('');

    it('should return the title, visible text and links of a page', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page, { headers: { 'content-type': 'text/html' } }));

      const result = await createScrapeWebTool().execute({ url: 'https://site.test/page' });

      expect(result).toBe([
        'Content from https://site.test/page:',
        SEPARATOR,
        'Title: Test Page',
        '',
        'Welcome',
        'First paragraph',
        'A',
        'docs link',
        'Other',
        'Mail',
        '',
        'Links:',
        '- docs link: https://site.test/docs',
        '- Other: https://other.test/x',
      ].join('\n'));
    });

    it('should extract the elements matching a selector', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page));

      const result = await createScrapeWebTool().execute({ url: 'https://site.test/page', selector: 'p' });

      expect(result.split('\n').slice(2)).toEqual(['Title: Test Page', '', 'First paragraph', 'A docs link']);
    });

    it('should cut content at max_length', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page));

      const result = await createScrapeWebTool().execute({ url: 'https://site.test/page', selector: 'p', max_length: 10 });

      expect(result.split('\n').at(-1)).toBe('First para... (truncated)');
    });

    it('should say so when the selector matches nothing', async () => {
      fetchMock.mockResolvedValueOnce(new Response(page));

      const result = await createScrapeWebTool().execute({ url: 'https://site.test/page', selector: '.none' });

      expect(result.split('\n').at(-1)).toBe('No content found for selector: .none');
    });

    it('should report HTTP errors', async () => {
      fetchMock.mockResolvedValueOnce(new Response('gone', { status: 410 }));

      expect(await createScrapeWebTool().execute({ url: 'https://site.test/page' })).toBe('Scrape failed: HTTP 410');
    });
  });
});

describe('filenameFromUrl()', () => {
  it('should use the last segment when it has an extension', () => {
    expect(filenameFromUrl('https://x.example.test/a/report%20v1.pdf')).toBe('report v1.pdf');
    expect(filenameFromUrl('https://x.example.test/api/')).toBe('downloaded_file');
    expect(filenameFromUrl('https://x.example.test/api')).toBe('downloaded_file');
  });
});
