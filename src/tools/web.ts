/**
 * @fileoverview Web tools: HTTP API requests, file downloads, web search and
 * page scraping. HTML is parsed with cheerio.
 *
 * @module taskpilot/tools/web
 */

import { writeFile } from 'node:fs/promises';
import { load, type CheerioAPI } from 'cheerio';
import { z } from 'zod';
import type { Tool } from '../types/tools.types.js';
import { errorMessage } from '../types/errors.js';
import { SEPARATOR, defineTool, resolvePath, type ToolEnvironment } from './shared.js';

export const API_REQUEST_TIMEOUT_MS = 15_000;
export const DOWNLOAD_TIMEOUT_MS = 30_000;
export const SEARCH_TIMEOUT_MS = 10_000;
export const SCRAPE_TIMEOUT_MS = 15_000;

/** HTML endpoint queried by `search_web`. */
export const SEARCH_ENDPOINT = 'https://html.duckduckgo.com/html/';

/** Links listed under a scraped page. */
export const SCRAPE_LINK_LIMIT = 10;

const USER_AGENT = 'Mozilla/5.0 (compatible; taskpilot)';

/** Characters of a non-JSON response body returned to the model. */
export const RESPONSE_TEXT_LIMIT = 1000;

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

// ============ Input Schemas ============

const ApiRequestInputSchema = z.object({
  url: z.string().url(),
  method: z
    .preprocess(
      value => (typeof value === 'string' ? value.toUpperCase() : value),
      z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']),
    )
    .default('GET'),
  headers: z.record(z.string()).default({}),
  data: z.unknown().optional(),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

const DownloadFileInputSchema = z.object({
  url: z.string().url(),
  filename: z.string().min(1).optional(),
  max_size: z.number().positive().default(50),
});

const SearchWebInputSchema = z.object({
  query: z.string().min(1),
  max_results: z.number().int().positive().default(5),
});

const ScrapeWebInputSchema = z.object({
  url: z.string().url(),
  selector: z.string().min(1).optional(),
  max_length: z.number().int().positive().default(2000),
});

// ============ Tool Implementations ============

export function createApiRequestTool(): Tool {
  return defineTool(
    {
      name: 'api_request',
      description: 'Make HTTP API requests (GET, POST, PUT, PATCH, DELETE)',
      parameters: {
        url: { type: 'string', required: true, description: 'API endpoint URL' },
        method: { type: 'string', required: false, default: 'GET', description: 'HTTP method' },
        headers: { type: 'object', required: false, description: 'HTTP headers as a JSON object' },
        data: { type: 'object', required: false, description: 'Request body; objects are sent as JSON' },
        params: { type: 'object', required: false, description: 'Query parameters as a JSON object' },
      },
    },
    ApiRequestInputSchema,
    async input => {
      const url = new URL(input.url);
      for (const [key, value] of Object.entries(input.params ?? {})) {
        url.searchParams.set(key, String(value));
      }

      const headers: Record<string, string> = { ...input.headers };
      let body: string | undefined;
      if (input.data !== undefined && BODY_METHODS.has(input.method)) {
        if (typeof input.data === 'string') {
          body = input.data;
        } else {
          body = JSON.stringify(input.data);
          headers['Content-Type'] ??= 'application/json';
        }
      }

      let res: Response;
      let text: string;
      try {
        res = await fetch(url, {
          method: input.method,
          headers,
          body,
          signal: AbortSignal.timeout(API_REQUEST_TIMEOUT_MS),
        });
        text = await res.text();
      } catch (error) {
        return `API request failed: ${errorMessage(error)}`;
      }

      return [
        `API Response from ${input.method} ${input.url}:`,
        `Status: ${res.status}`,
        `Content-Type: ${res.headers.get('content-type') ?? 'N/A'}`,
        SEPARATOR,
        formatBody(text),
      ].join('\n');
    },
  );
}

export function createDownloadFileTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'download_file',
      description: 'Download a file from a URL',
      parameters: {
        url: { type: 'string', required: true, description: 'URL to download from' },
        filename: { type: 'string', required: false, description: 'Local filename to save as' },
        max_size: { type: 'integer', required: false, default: 50, description: 'Maximum file size in MB' },
      },
    },
    DownloadFileInputSchema,
    async input => {
      const maxBytes = input.max_size * 1024 * 1024;
      const filename = input.filename ?? filenameFromUrl(input.url);

      try {
        const res = await fetch(input.url, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });
        if (!res.ok) {
          return `Download failed: HTTP ${res.status}`;
        }

        const declared = Number(res.headers.get('content-length') ?? NaN);
        if (Number.isFinite(declared) && declared > maxBytes) {
          return `File too large (${(declared / 1024 / 1024).toFixed(1)}MB). Max allowed: ${input.max_size}MB`;
        }

        const chunks: Uint8Array[] = [];
        let received = 0;
        if (res.body) {
          const reader = res.body.getReader();
          for (;;) {
            const { done, value } = await reader.read();
            if (done) break;
            received += value.byteLength;
            if (received > maxBytes) {
              await reader.cancel();
              return `Download cancelled: file exceeded size limit (${input.max_size}MB)`;
            }
            chunks.push(value);
          }
        }

        await writeFile(resolvePath(environment, filename), Buffer.concat(chunks));
        return `Downloaded ${input.url} to ${filename} (${(received / 1024 / 1024).toFixed(2)}MB)`;
      } catch (error) {
        return `Download failed: ${errorMessage(error)}`;
      }
    },
  );
}

export function createSearchWebTool(): Tool {
  return defineTool(
    {
      name: 'search_web',
      description: 'Search the web using DuckDuckGo',
      parameters: {
        query: { type: 'string', required: true, description: 'Search query' },
        max_results: { type: 'integer', required: false, default: 5, description: 'Maximum number of results' },
      },
    },
    SearchWebInputSchema,
    async input => {
      const url = new URL(SEARCH_ENDPOINT);
      url.searchParams.set('q', input.query);

      let html: string;
      try {
        const res = await fetch(url, {
          headers: { 'User-Agent': USER_AGENT },
          signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
        });
        if (!res.ok) {
          return `Web search failed: HTTP ${res.status}`;
        }
        html = await res.text();
      } catch (error) {
        return `Web search failed: ${errorMessage(error)}`;
      }

      const $ = load(html);
      const results: string[] = [];
      for (const element of $('.result').slice(0, input.max_results).toArray()) {
        const result = $(element);
        const title = collapse(result.find('.result__title a').first().text());
        const snippet = collapse(result.find('.result__snippet').first().text());
        if (!title || !snippet) continue;

        const link = collapse(result.find('.result__url').first().text()) || 'N/A';
        results.push(`${results.length + 1}. ${title}\n   ${link}\n   ${snippet}`);
      }

      if (results.length === 0) {
        return `No search results found for: ${input.query}`;
      }
      return `Web search results for '${input.query}':\n${SEPARATOR}\n${results.join('\n')}`;
    },
  );
}

export function createScrapeWebTool(): Tool {
  return defineTool(
    {
      name: 'scrape_web',
      description: 'Scrape content from a web page',
      parameters: {
        url: { type: 'string', required: true, description: 'URL to scrape' },
        selector: { type: 'string', required: false, description: 'CSS selector to extract specific content' },
        max_length: { type: 'integer', required: false, default: 2000, description: 'Maximum content length' },
      },
    },
    ScrapeWebInputSchema,
    async input => {
      try {
        const res = await fetch(input.url, {
          headers: { 'User-Agent': USER_AGENT },
          signal: AbortSignal.timeout(SCRAPE_TIMEOUT_MS),
        });
        if (!res.ok) {
          return `Scrape failed: HTTP ${res.status}`;
        }

        const $ = load(await res.text());
        $('script, style, noscript').remove();

        const title = collapse($('title').first().text());
        let content: string;
        let links: string[] = [];

        if (input.selector) {
          const texts = $(input.selector)
            .toArray()
            .map(element => collapse($(element).text()))
            .filter(text => text.length > 0);
          content = texts.length > 0 ? texts.join('\n') : `No content found for selector: ${input.selector}`;
        } else {
          links = pageLinks($, input.url);
          content = pageText($);
        }

        if (content.length > input.max_length) {
          content = `${content.slice(0, input.max_length)}... (truncated)`;
        }

        const lines = [`Content from ${input.url}:`, SEPARATOR];
        if (title) lines.push(`Title: ${title}`, '');
        lines.push(content);
        if (links.length > 0) lines.push('', 'Links:', ...links);
        return lines.join('\n');
      } catch (error) {
        return `Scrape failed: ${errorMessage(error)}`;
      }
    },
  );
}

/**
 * All web tools.
 */
export function createWebTools(environment: ToolEnvironment = {}): Tool[] {
  return [createApiRequestTool(), createDownloadFileTool(environment), createSearchWebTool(), createScrapeWebTool()];
}

/**
 * Last path segment of a URL when it looks like a file name.
 */
export function filenameFromUrl(url: string): string {
  const last = new URL(url).pathname.split('/').pop() ?? '';
  return last.includes('.') ? decodeURIComponent(last) : 'downloaded_file';
}

/**
 * Visible body text, one line per text run.
 */
function pageText($: CheerioAPI): string {
  $('body *').each((_, element) => {
    $(element).prepend('\n').append('\n');
  });
  return $('body')
    .text()
    .split('\n')
    .map(collapse)
    .filter(line => line.length > 0)
    .join('\n');
}

/**
 * Distinct http(s) links resolved against the page URL, as `- text: url`.
 */
function pageLinks($: CheerioAPI, base: string): string[] {
  const seen = new Set<string>();
  const links: string[] = [];

  for (const element of $('a[href]').toArray()) {
    if (links.length >= SCRAPE_LINK_LIMIT) break;
    const href = $(element).attr('href') ?? '';
    let resolved: URL;
    try {
      resolved = new URL(href, base);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    if (seen.has(resolved.href)) continue;

    seen.add(resolved.href);
    const text = collapse($(element).text());
    links.push(text ? `- ${text}: ${resolved.href}` : `- ${resolved.href}`);
  }

  return links;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function formatBody(text: string): string {
  const parsed = parseJson(text);
  return parsed !== null && typeof parsed === 'object'
    ? JSON.stringify(parsed, null, 2)
    : text.slice(0, RESPONSE_TEXT_LIMIT);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
