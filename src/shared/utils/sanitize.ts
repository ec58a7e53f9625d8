/**
 * Context-aware sanitization for strings headed into email bodies, headers,
 * filenames and logs. Every context is idempotent.
 */

export type SanitizeContext = 'plainText' | 'htmlBody' | 'emailHeader' | 'filename';

export type SanitizeResult =
  | { ok: true; value: string }
  | { ok: false; reason: string };

const MAX_FILENAME_LENGTH = 255;
const MAX_KEPT_EXTENSION_LENGTH = 16;

// Control and format characters, keeping TAB and LF
const CONTROL_EXCEPT_TAB_LF = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F\u200B-\u200F\u202A-\u202E\u2060-\u2064\uFEFF]/g;
const CONTROL_EXCEPT_TAB = /[\u0000-\u0008\u000A-\u001F\u007F-\u009F\u200B-\u200F\u202A-\u202E\u2060-\u2064\uFEFF]/g;
const HEADER_BREAKERS = /[\r\n\u0000]/;

// `&` that does not already start one of the entities produced below
const BARE_AMPERSAND = /&(?!(?:amp|lt|gt|quot|#39);)/g;

const HTML_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

function cleanPlainText(value: string): string {
  return value
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_EXCEPT_TAB_LF, '')
    .trim();
}

/**
 * Escapes `& < > " '`. Already-escaped entities are kept as they are.
 */
export function escapeHtml(value: string): string {
  return value
    .replace(BARE_AMPERSAND, '&amp;')
    .replace(/[<>"']/g, char => HTML_ENTITIES[char]);
}

function sanitizeHeader(value: string): SanitizeResult {
  if (HEADER_BREAKERS.test(value)) {
    return { ok: false, reason: 'Header value contains line breaks or NUL characters' };
  }

  return { ok: true, value: value.replace(CONTROL_EXCEPT_TAB, '').trim() };
}

function splitExtension(name: string): [string, string] {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return [name, ''];
  }
  return [name.slice(0, dot), name.slice(dot + 1)];
}

function truncate(value: string, maxCodePoints: number): string {
  return Array.from(value).slice(0, maxCodePoints).join('');
}

function sanitizeFilename(value: string): SanitizeResult {
  const withoutControls = value.replace(/[\p{Cc}\p{Cf}]/gu, '');
  const segments = withoutControls.split(/[\\/]+/).filter(segment => segment.trim() !== '');
  const basename = segments.length > 0 ? segments[segments.length - 1] : '';

  let name = basename
    .replace(/[^\p{L}\p{M}\p{N}_ .-]/gu, '_')
    .replace(/\.{2,}/g, '.')
    .replace(/^[ .]+|[ .]+$/g, '');

  // Lengths are counted in code points so truncation never splits a surrogate pair
  if (Array.from(name).length > MAX_FILENAME_LENGTH) {
    const [stem, extension] = splitExtension(name);
    name = extension && extension.length <= MAX_KEPT_EXTENSION_LENGTH
      ? `${truncate(stem, MAX_FILENAME_LENGTH - Array.from(extension).length - 1)}.${extension}`
      : truncate(name, MAX_FILENAME_LENGTH);
    name = name.replace(/\.{2,}/g, '.').replace(/^[ .]+|[ .]+$/g, '');
  }

  if (name === '') {
    return { ok: false, reason: 'Filename is empty after removing unsafe characters' };
  }

  return { ok: true, value: name };
}

export function sanitize(value: string, context: SanitizeContext): SanitizeResult {
  switch (context) {
    case 'plainText':
      return { ok: true, value: cleanPlainText(value) };
    case 'htmlBody':
      return { ok: true, value: escapeHtml(cleanPlainText(value)) };
    case 'emailHeader':
      return sanitizeHeader(value);
    case 'filename':
      return sanitizeFilename(value);
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' '
};

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      const code = parseInt(body.slice(2), 16);
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';
    }
    if (body.startsWith('#')) {
      const code = parseInt(body.slice(1), 10);
      return code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * Turns fetched markup into a short, HTML-escaped line of text
 */
export function sanitizeScrapedText(value: string, maxLength: number = 500): string {
  if (!value) {
    return '';
  }

  let text = decodeEntities(value)
    .replace(/<[^>]*>/g, ' ')
    .replace(/[\p{Cc}\p{Cf}]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (text.length > maxLength) {
    text = `${text.slice(0, Math.max(0, maxLength - 3)).trimEnd()}...`;
  }

  return escapeHtml(text);
}

/**
 * Masks the local part of an address for log lines: `c***@example.com`
 */
export function maskEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at <= 0) {
    return '***';
  }
  return `${email[0]}***${email.slice(at)}`;
}
