// Quote validator Lambda function
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type { FormInput, IntegrityVerdict } from '../../shared/models';
import { loadQuoteEngineConfig, type QuoteEngineConfig } from '../../shared/utils/environment';
import { checkAttachment, decodeBase64Attachment, parseEncodedAttachments } from '../../shared/utils/file-integrity';
import { createErrorResponse, createSuccessResponse, isRecord, parseJsonBody } from '../../shared/utils/responses';
import { sanitize } from '../../shared/utils/sanitize';
import { validateQuoteForm } from '../../shared/utils/validation';
import { fetchHighlights, type FetchLike } from '../../shared/utils/web-fetch';

export interface AttachmentSummary {
  filename: string;
  kind: IntegrityVerdict['kind'];
  sizeBytes: number;
  detectedType?: IntegrityVerdict['detectedType'];
  pageCount?: number;
}

export interface QuoteSubmissionResult {
  isValid: boolean;
  errors: Record<string, string>;
  values: Record<string, string | number>;
  attachments: AttachmentSummary[];
  highlights: string[];
}

export interface QuoteSubmission {
  fields: FormInput;
  attachments?: unknown;
  highlightsUrl?: unknown;
}

export interface ValidateSubmissionOptions {
  fetchImpl?: FetchLike;
}

function attachmentKey(index: number): string {
  return `attachments[${index}]`;
}

/**
 * Validates the quote form and its uploads and returns the values ready for the PDF renderer.
 * Text values come back in plain-text form; the renderer escapes them for its own markup.
 */
export async function validateQuoteSubmission(
  submission: QuoteSubmission,
  config: QuoteEngineConfig,
  options: ValidateSubmissionOptions = {}
): Promise<QuoteSubmissionResult> {
  const verdict = validateQuoteForm(submission.fields, config.limits);
  const errors: Record<string, string> = { ...verdict.errors };
  const values: Record<string, string | number> = {};

  for (const [field, value] of Object.entries(verdict.values)) {
    if (typeof value === 'number') {
      values[field] = value;
      continue;
    }
    const cleaned = sanitize(value, 'plainText');
    if (cleaned.ok) {
      values[field] = cleaned.value;
    }
  }

  const attachments: AttachmentSummary[] = [];
  const parsed = parseEncodedAttachments(submission.attachments);

  if (!parsed.ok) {
    errors.attachments = parsed.message;
  } else {
    const imageCount = parsed.attachments.filter(item => item.kind === 'image').length;
    if (imageCount > config.limits.maxImageAttachments) {
      errors.attachments = `Too many images (max ${config.limits.maxImageAttachments})`;
    }

    parsed.attachments.forEach((item, index) => {
      const name = sanitize(item.filename, 'filename');
      if (!name.ok) {
        errors[attachmentKey(index)] = name.reason;
        return;
      }

      const decoded = decodeBase64Attachment({ ...item, filename: name.value }, config.limits);
      const result = decoded.ok ? checkAttachment(decoded.attachment, config.limits) : decoded.verdict;

      if (!result.isValid) {
        errors[attachmentKey(index)] = `The file "${name.value}" was rejected: ${result.reason}`;
        return;
      }

      attachments.push({
        filename: result.filename,
        kind: result.kind,
        sizeBytes: result.sizeBytes,
        detectedType: result.detectedType,
        pageCount: result.pageCount
      });
    });
  }

  let highlights: string[] = [];
  if (typeof submission.highlightsUrl === 'string' && submission.highlightsUrl.trim() !== '') {
    highlights = await fetchHighlights(submission.highlightsUrl.trim(), {
      timeoutMs: config.webFetchTimeoutMs,
      allowedDomains: config.allowedFetchDomains,
      fetchImpl: options.fetchImpl
    });
  }

  const isValid = Object.keys(errors).length === 0;

  console.log('Quote submission validated', {
    isValid,
    invalidFields: Object.keys(errors),
    attachments: attachments.length,
    highlights: highlights.length
  });

  return { isValid, errors, values, attachments, highlights };
}

/**
 * API Gateway handler for POST /quote/validate
 */
export function createQuoteValidatorHandler(
  getConfig: () => QuoteEngineConfig = () => loadQuoteEngineConfig(),
  options: ValidateSubmissionOptions = {}
) {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    const requestId = event.requestContext?.requestId;

    const parsed = parseJsonBody(event);
    if (!parsed.ok) {
      return parsed.response;
    }

    const { fields, attachments, highlightsUrl } = parsed.body;
    if (!isRecord(fields)) {
      return createErrorResponse(400, 'Bad Request', 'fields must be a JSON object', undefined, requestId);
    }

    const result = await validateQuoteSubmission({ fields, attachments, highlightsUrl }, getConfig(), options);

    if (!result.isValid) {
      return createErrorResponse(400, 'Validation Failed', 'One or more fields are invalid', result.errors, requestId);
    }

    return createSuccessResponse(200, result, requestId);
  };
}

export const handler = createQuoteValidatorHandler();
