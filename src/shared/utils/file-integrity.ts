// Attachment integrity checks: size caps, magic bytes and PDF structure
import type { Attachment, AttachmentKind, DetectedFileType, IntegrityVerdict } from '../models';
import { ALLOWED_IMAGE_EXTENSIONS, DEFAULT_LIMITS, type QuoteEngineLimits } from './environment';

export type IntegrityLimits = Pick<QuoteEngineLimits, 'maxImageSizeBytes' | 'maxPdfSizeBytes'>;

const PDF_SIGNATURE = '%PDF-';
const PDF_EOF_MARKER = '%%EOF';
const PDF_TRAILER_WINDOW = 1024;

// `/Type /Page` but not `/Type /Pages`
const PDF_PAGE_MARKER = /\/Type\s*\/Page(?![A-Za-z0-9])/g;

const IMAGE_EXTENSIONS: Record<Exclude<DetectedFileType, 'pdf'>, readonly string[]> = {
  jpeg: ['jpg', 'jpeg'],
  png: ['png'],
  webp: ['webp']
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export const CONTENT_TYPES: Record<DetectedFileType, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  pdf: 'application/pdf'
};

function startsWithBytes(bytes: Uint8Array, signature: readonly number[], offset: number = 0): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((byte, index) => bytes[offset + index] === byte);
}

function startsWithAscii(bytes: Uint8Array, text: string, offset: number = 0): boolean {
  return startsWithBytes(bytes, Array.from(text, char => char.charCodeAt(0)), offset);
}

/**
 * Detects the image format from its leading bytes
 */
export function detectImageType(bytes: Uint8Array): Exclude<DetectedFileType, 'pdf'> | undefined {
  if (startsWithBytes(bytes, [0xff, 0xd8, 0xff])) {
    return 'jpeg';
  }

  if (startsWithBytes(bytes, PNG_SIGNATURE)) {
    return 'png';
  }

  if (startsWithAscii(bytes, 'RIFF') && startsWithAscii(bytes, 'WEBP', 8)) {
    return 'webp';
  }

  return undefined;
}

export function getFileExtension(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}

export function sizeLimitFor(kind: AttachmentKind, limits: IntegrityLimits = DEFAULT_LIMITS): number {
  return kind === 'image' ? limits.maxImageSizeBytes : limits.maxPdfSizeBytes;
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

function reject(attachment: Attachment, reason: string, extra: Partial<IntegrityVerdict> = {}): IntegrityVerdict {
  return {
    isValid: false,
    filename: attachment.filename,
    kind: attachment.kind,
    sizeBytes: attachment.sizeBytes,
    ...extra,
    reason
  };
}

/**
 * A declared MIME type, when one was sent, must name the detected content.
 * Parameters (`; charset=...`) and case are ignored.
 */
export function matchesDeclaredType(mimeDeclared: string | undefined, detectedType: DetectedFileType): boolean {
  const declared = (mimeDeclared ?? '').split(';')[0].trim().toLowerCase();
  return declared === '' || declared === CONTENT_TYPES[detectedType];
}

function checkImage(attachment: Attachment): IntegrityVerdict {
  const detectedType = detectImageType(attachment.bytes);

  if (!detectedType) {
    return reject(attachment, 'Unrecognized image format (expected JPEG, PNG or WebP)');
  }

  const extension = getFileExtension(attachment.filename);
  const allowed: readonly string[] = ALLOWED_IMAGE_EXTENSIONS;

  if (!allowed.includes(extension)) {
    return reject(attachment, `Invalid file type. Allowed: ${ALLOWED_IMAGE_EXTENSIONS.join(', ')}`, { detectedType });
  }

  if (!IMAGE_EXTENSIONS[detectedType].includes(extension)) {
    return reject(attachment, `Content doesn't match extension (detected ${detectedType})`, { detectedType });
  }

  if (!matchesDeclaredType(attachment.mimeDeclared, detectedType)) {
    return reject(attachment, "Content doesn't match declared type", { detectedType });
  }

  return {
    isValid: true,
    filename: attachment.filename,
    kind: attachment.kind,
    sizeBytes: attachment.sizeBytes,
    detectedType
  };
}

/**
 * Counts `/Type /Page` object markers. PDFs that keep their page objects inside
 * compressed object streams report zero here even when they are valid.
 */
export function countPdfPages(content: string): number {
  return content.match(PDF_PAGE_MARKER)?.length ?? 0;
}

function checkDocument(attachment: Attachment): IntegrityVerdict {
  if (!startsWithAscii(attachment.bytes, PDF_SIGNATURE)) {
    return reject(attachment, 'Invalid PDF file (missing PDF signature)');
  }

  if (!matchesDeclaredType(attachment.mimeDeclared, 'pdf')) {
    return reject(attachment, "Content doesn't match declared type", { detectedType: 'pdf' });
  }

  const content = attachment.bytes.toString('latin1');
  const trailer = content.slice(-PDF_TRAILER_WINDOW);

  if (!trailer.includes(PDF_EOF_MARKER)) {
    return reject(attachment, 'PDF appears truncated (no end-of-file marker)', { detectedType: 'pdf' });
  }

  const pageCount = countPdfPages(content);
  if (pageCount === 0) {
    return reject(attachment, 'PDF has no pages', { detectedType: 'pdf', pageCount });
  }

  return {
    isValid: true,
    filename: attachment.filename,
    kind: attachment.kind,
    sizeBytes: attachment.sizeBytes,
    detectedType: 'pdf',
    pageCount
  };
}

/**
 * Verifies an attachment against its declared kind. The size cap is enforced before
 * any byte of content is inspected.
 */
export function checkAttachment(attachment: Attachment, limits: IntegrityLimits = DEFAULT_LIMITS): IntegrityVerdict {
  const maxSize = sizeLimitFor(attachment.kind, limits);

  if (attachment.sizeBytes > maxSize || attachment.bytes.length > maxSize) {
    return reject(
      attachment,
      `size limit exceeded: ${formatMegabytes(Math.max(attachment.sizeBytes, attachment.bytes.length))} (max: ${formatMegabytes(maxSize)})`
    );
  }

  if (attachment.bytes.length === 0) {
    return reject(attachment, 'Empty file');
  }

  return attachment.kind === 'image' ? checkImage(attachment) : checkDocument(attachment);
}

export function stripDataPrefix(base64: string): string {
  const index = base64.indexOf('base64,');
  return index >= 0 ? base64.slice(index + 'base64,'.length).trim() : base64.trim();
}

/**
 * Decoded size of a base64 payload, computed without decoding it
 */
export function estimateDecodedSize(base64: string): number {
  const body = stripDataPrefix(base64).replace(/\s/g, '');
  const padding = body.endsWith('==') ? 2 : body.endsWith('=') ? 1 : 0;
  return Math.max(0, Math.floor((body.length * 3) / 4) - padding);
}

export interface EncodedAttachment {
  filename: string;
  kind: AttachmentKind;
  contentBase64: string;
  mimeType?: string;
}

export type DecodeResult =
  | { ok: true; attachment: Attachment }
  | { ok: false; verdict: IntegrityVerdict };

/**
 * Decodes a base64 upload, refusing oversized payloads before allocating the buffer
 */
export function decodeBase64Attachment(encoded: EncodedAttachment, limits: IntegrityLimits = DEFAULT_LIMITS): DecodeResult {
  const estimatedSize = estimateDecodedSize(encoded.contentBase64);
  const maxSize = sizeLimitFor(encoded.kind, limits);

  if (estimatedSize > maxSize) {
    return {
      ok: false,
      verdict: {
        isValid: false,
        filename: encoded.filename,
        kind: encoded.kind,
        sizeBytes: estimatedSize,
        reason: `size limit exceeded: ${formatMegabytes(estimatedSize)} (max: ${formatMegabytes(maxSize)})`
      }
    };
  }

  const body = stripDataPrefix(encoded.contentBase64);
  if (!/^[A-Za-z0-9+\/\s]*={0,2}\s*$/.test(body)) {
    return {
      ok: false,
      verdict: {
        isValid: false,
        filename: encoded.filename,
        kind: encoded.kind,
        sizeBytes: estimatedSize,
        reason: 'Invalid base64 content'
      }
    };
  }

  const bytes = Buffer.from(body, 'base64');

  return {
    ok: true,
    attachment: {
      filename: encoded.filename,
      kind: encoded.kind,
      mimeDeclared: encoded.mimeType,
      bytes,
      sizeBytes: bytes.length
    }
  };
}

export type ParseAttachmentsResult =
  | { ok: true; attachments: EncodedAttachment[] }
  | { ok: false; message: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks the shape of the `attachments` array of a request body
 */
export function parseEncodedAttachments(value: unknown): ParseAttachmentsResult {
  if (value === undefined || value === null) {
    return { ok: true, attachments: [] };
  }

  if (!Array.isArray(value)) {
    return { ok: false, message: 'attachments must be an array' };
  }

  const attachments: EncodedAttachment[] = [];

  for (const [index, item] of value.entries()) {
    if (!isObject(item)) {
      return { ok: false, message: `attachments[${index}] must be an object` };
    }

    const { filename, kind, contentBase64, mimeType } = item;

    if (typeof filename !== 'string' || typeof contentBase64 !== 'string') {
      return { ok: false, message: `attachments[${index}] needs a filename and contentBase64` };
    }

    if (kind !== 'image' && kind !== 'document') {
      return { ok: false, message: `attachments[${index}].kind must be "image" or "document"` };
    }

    attachments.push({
      filename,
      kind,
      contentBase64,
      mimeType: typeof mimeType === 'string' ? mimeType : undefined
    });
  }

  return { ok: true, attachments };
}
