import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { TimeoutError, UnreachableError, ValidationError } from '../errors.js';
import { logger } from '../log/logger.js';
import type { CompanyPage } from '../types.js';

const HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

const NOISE_SELECTORS =
  'script, style, noscript, iframe, svg, template, link, meta, .cookie-banner, #cookie-banner, .cookie-consent, [aria-hidden="true"]';

export interface NormalizedUrl {
  url: string;
  scheme: 'http' | 'https';
  schemeInferred: boolean;
}

export interface CompanyFetcherOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
  maxTextChars?: number;
}

export type CompanyFetcher = (url: string) => Promise<CompanyPage>;

export function normalizeCompanyUrl(input: string): NormalizedUrl {
  const trimmed = input.trim();
  if (!trimmed) throw new ValidationError('company_url must not be empty');

  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed);
  const candidate = hasScheme ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    throw new ValidationError(`Malformed company URL: ${input}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Unsupported URL scheme "${parsed.protocol}" (expected http or https)`);
  }
  const host = parsed.hostname;
  if (!host || (host !== 'localhost' && !host.includes('.'))) {
    throw new ValidationError(`Malformed company URL: ${input}`);
  }

  return {
    url: parsed.href,
    scheme: parsed.protocol === 'http:' ? 'http' : 'https',
    schemeInferred: !hasScheme,
  };
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parseCompanyPage(html: string, maxTextChars: number): Omit<CompanyPage, 'url' | 'scheme'> {
  const $ = cheerio.load(html);

  const title =
    collapse($('title').first().text()) || $('meta[property="og:title"]').attr('content')?.trim() || null;
  const description =
    $('meta[name="description"]').attr('content')?.trim() ||
    $('meta[property="og:description"]').attr('content')?.trim() ||
    null;

  $(NOISE_SELECTORS).remove();

  // Block-level boundaries would otherwise glue neighbouring words together
  $('p, div, li, h1, h2, h3, h4, h5, h6, br, section, article, header, footer, td, th').after(' ');

  const text = collapse($('body').text()).slice(0, maxTextChars);

  return { title, description, text };
}

// Cancellation only ever comes from the deadline signal passed to each request
function isTimeout(err: unknown): boolean {
  if (axios.isCancel(err)) return true;
  return axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
}

/** True when the request never got an HTTP response (DNS, refused, reset, TLS). */
function isConnectionFailure(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response === undefined && !isTimeout(err);
}

export function createCompanyFetcher(options: CompanyFetcherOptions = {}): CompanyFetcher {
  const http = options.http ?? axios.create();
  const timeoutMs = options.timeoutMs ?? 10_000;
  const maxTextChars = options.maxTextChars ?? 50_000;

  async function get(url: string, budgetMs: number): Promise<string> {
    const response = await http.get<string>(url, {
      headers: HEADERS,
      // `timeout` only covers an idle socket; the signal bounds the whole exchange
      timeout: budgetMs,
      signal: AbortSignal.timeout(budgetMs),
      responseType: 'text',
      maxContentLength: 5 * 1024 * 1024,
      validateStatus: (status) => status < 400,
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  }

  return async function fetchCompanyPage(input: string): Promise<CompanyPage> {
    const target = normalizeCompanyUrl(input);
    const deadline = Date.now() + timeoutMs;
    const attempts: NormalizedUrl[] = [target];
    if (target.schemeInferred) {
      attempts.push({ url: target.url.replace(/^https:/, 'http:'), scheme: 'http', schemeInferred: true });
    }

    let lastError: unknown;
    for (const attempt of attempts) {
      const budgetMs = deadline - Date.now();
      if (budgetMs <= 0) {
        throw new TimeoutError(`Fetching ${target.url} exceeded ${timeoutMs}ms`);
      }
      try {
        logger.debug({ url: attempt.url }, 'Fetching company page');
        const html = await get(attempt.url, budgetMs);
        return { url: attempt.url, scheme: attempt.scheme, ...parseCompanyPage(html, maxTextChars) };
      } catch (err) {
        if (isTimeout(err)) {
          throw new TimeoutError(`Fetching ${attempt.url} exceeded ${timeoutMs}ms`, { cause: err });
        }
        if (!isConnectionFailure(err)) {
          const status = axios.isAxiosError(err) ? err.response?.status : undefined;
          throw new UnreachableError(
            status ? `${attempt.url} answered with HTTP ${status}` : `Could not fetch ${attempt.url}`,
            { cause: err },
          );
        }
        logger.debug({ url: attempt.url, code: axios.isAxiosError(err) ? err.code : undefined }, 'Connection failed');
        lastError = err;
      }
    }

    throw new UnreachableError(`Could not connect to ${target.url}`, { cause: lastError });
  };
}
