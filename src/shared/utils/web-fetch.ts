// HTTPS-only fetching of supplementary content; everything fetched is untrusted
import { TransportError } from './error-handling';
import { sanitizeScrapedText } from './sanitize';
import { validateUrl } from './validation';

export const WEB_FETCH_DEFAULTS = {
  TIMEOUT_MS: 20000,
  MAX_RESPONSE_BYTES: 10 * 1024 * 1024,
  MAX_ITEMS: 18,
  MAX_REDIRECTS: 5,
  USER_AGENT: 'Mozilla/5.0 (compatible; QuoteEngine/1.0)'
} as const;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SafeGetOptions {
  timeoutMs?: number;
  maxBytes?: number;
  maxRedirects?: number;
  allowedDomains?: string[];
  fetchImpl?: FetchLike;
}

export interface FetchedPage {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

const BOILERPLATE_WORDS = [
  'cookie',
  'privacy policy',
  'javascript',
  'newsletter',
  'subscribe',
  '©',
  'all rights reserved',
  'terms of service',
  'disclaimer'
];

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function checkTarget(url: string, allowedDomains: string[]): string {
  const check = validateUrl(url, 'url', { allowedDomains, requireHttps: true });
  if (!check.isValid || !check.normalizedValue) {
    throw new TransportError(`Refusing to fetch ${url}: ${check.reason}`, 'The supplementary content source is not allowed');
  }
  return check.normalizedValue;
}

function tooLarge(url: string, maxBytes: number): TransportError {
  return new TransportError(`Response from ${url} exceeds ${maxBytes} bytes`, 'The supplementary content is too large');
}

/**
 * Reads a response body chunk by chunk and stops as soon as it passes `maxBytes`
 */
async function readCapped(response: Response, url: string, maxBytes: number): Promise<Buffer> {
  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw tooLarge(url, maxBytes);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

/**
 * GETs an HTTPS URL with a hard timeout and a response size cap. Redirects are
 * followed by hand so that every hop passes the same scheme and domain checks.
 */
export async function safeGet(url: string, options: SafeGetOptions = {}): Promise<FetchedPage> {
  const {
    timeoutMs = WEB_FETCH_DEFAULTS.TIMEOUT_MS,
    maxBytes = WEB_FETCH_DEFAULTS.MAX_RESPONSE_BYTES,
    maxRedirects = WEB_FETCH_DEFAULTS.MAX_REDIRECTS,
    allowedDomains = [],
    fetchImpl = fetch
  } = options;

  let target = checkTarget(url, allowedDomains);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    for (let hop = 0; ; hop++) {
      const response = await fetchImpl(target, {
        method: 'GET',
        redirect: 'manual',
        signal: controller.signal,
        headers: {
          'User-Agent': WEB_FETCH_DEFAULTS.USER_AGENT,
          Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9,el;q=0.8'
        }
      });

      // A fetch implementation that followed a redirect on its own reports where it ended up
      if (response.url && response.url !== target) {
        target = checkTarget(response.url, allowedDomains);
      }

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        await response.body?.cancel();
        if (!location) {
          throw new TransportError(`Redirect from ${target} without a Location header`, 'The supplementary content could not be retrieved');
        }
        if (hop >= maxRedirects) {
          throw new TransportError(`Too many redirects fetching ${url}`, 'The supplementary content could not be retrieved');
        }
        target = checkTarget(new URL(location, target).toString(), allowedDomains);
        continue;
      }

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} from ${target}`, 'The supplementary content could not be retrieved');
      }

      const declaredLength = Number(response.headers.get('content-length') ?? '0');
      if (declaredLength > maxBytes) {
        throw tooLarge(target, maxBytes);
      }

      const buffer = await readCapped(response, target, maxBytes);

      console.log('Fetched supplementary content', { url: target, bytes: buffer.length, redirects: hop });

      return {
        url: target,
        status: response.status,
        contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
        body: buffer.toString('utf8')
      };
    }
  } catch (error) {
    if (error instanceof TransportError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new TransportError(`Request to ${target} timed out after ${timeoutMs}ms`, 'The supplementary content request timed out', 'ETIMEDOUT', error);
    }
    throw new TransportError(
      `Request to ${target} failed: ${error instanceof Error ? error.message : String(error)}`,
      'The supplementary content could not be retrieved',
      'ECONNECTION',
      error
    );
  } finally {
    clearTimeout(timer);
  }
}

function extractBlocks(html: string, tags: string[]): string[] {
  const pattern = new RegExp(`<(${tags.join('|')})\\b[^>]*>([\\s\\S]*?)</\\1>`, 'gi');
  const blocks: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(html)) !== null) {
    blocks.push(match[2]);
  }
  return blocks;
}

/**
 * Pulls short, sanitized text snippets (headings, list items, then paragraphs) from a page
 */
export function extractHighlights(html: string, maxItems: number = WEB_FETCH_DEFAULTS.MAX_ITEMS): string[] {
  const cleaned = html.replace(/<(script|style|noscript|iframe|object|embed)\b[\s\S]*?<\/\1>/gi, ' ');

  const candidates = extractBlocks(cleaned, ['h1', 'h2', 'h3', 'li'])
    .map(block => sanitizeScrapedText(block, 240))
    .filter(text => text.length >= 28 && text.length <= 240);

  if (candidates.length < maxItems) {
    for (const block of extractBlocks(cleaned, ['p'])) {
      const text = sanitizeScrapedText(block, 300);
      if (text.length >= 60 && text.length <= 300) {
        candidates.push(text);
      }
      if (candidates.length >= maxItems * 3) {
        break;
      }
    }
  }

  const seen = new Set<string>();
  const highlights: string[] = [];

  for (const text of candidates) {
    const lower = text.toLowerCase();
    if (seen.has(lower) || BOILERPLATE_WORDS.some(word => lower.includes(word))) {
      continue;
    }
    seen.add(lower);
    highlights.push(text);
    if (highlights.length >= maxItems) {
      break;
    }
  }

  return highlights;
}

/**
 * Fetches a page and returns its highlights. Failures are logged and yield no highlights.
 */
export async function fetchHighlights(
  url: string,
  options: SafeGetOptions & { maxItems?: number } = {}
): Promise<string[]> {
  try {
    const page = await safeGet(url, options);
    const highlights = extractHighlights(page.body, options.maxItems);
    console.log('Extracted highlights', { url: page.url, count: highlights.length });
    return highlights;
  } catch (error) {
    console.error('Failed to fetch highlights', {
      url,
      error: error instanceof Error ? error.message : String(error)
    });
    return [];
  }
}
