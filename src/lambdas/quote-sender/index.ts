// Quote sender Lambda function
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import type Mail from 'nodemailer/lib/mailer';
import { v4 as uuidv4 } from 'uuid';
import type {
  Attachment,
  DispatchResult,
  DispatchState,
  IntegrityVerdict,
  QuoteDetails,
  QuoteEmailRequest,
  QuoteLanguage,
  RateLimitStatus
} from '../../shared/models';
import { DEFAULT_LIMITS, loadQuoteEngineConfig, type QuoteEngineLimits } from '../../shared/utils/environment';
import {
  ConfigurationError,
  IntegrityError,
  QuoteEngineError,
  RateLimitError,
  ValidationError,
  toTransportError
} from '../../shared/utils/error-handling';
import { CONTENT_TYPES, checkAttachment, decodeBase64Attachment, parseEncodedAttachments } from '../../shared/utils/file-integrity';
import { EmailRateLimiter } from '../../shared/utils/rate-limiter';
import { createErrorResponse, createSuccessResponse, CORS_HEADERS, parseJsonBody } from '../../shared/utils/responses';
import { composeQuoteEmail, isQuoteLanguage, MAX_SUBJECT_LENGTH } from '../../shared/utils/quote-email';
import { escapeHtml, maskEmail, sanitize } from '../../shared/utils/sanitize';
import { createSMTPTransport, getSMTPConfig, type MailTransport, type SentMailInfo } from '../../shared/utils/smtp-config';
import { validateEmail, validateTextArea } from '../../shared/utils/validation';

export const X_MAILER = 'Quote Engine v1.0';

export interface SenderIdentity {
  address: string;
  name: string;
}

export interface QuoteDispatcherOptions {
  rateLimiter: EmailRateLimiter;
  transport: MailTransport;
  sender: SenderIdentity;
  limits?: QuoteEngineLimits;
  advisorEmail?: string;
  generateId?: () => string;
}

interface PreparedMessage {
  recipient: string;
  message: Mail.Options;
  attachmentCount: number;
}

function toHtmlBody(text: string): string {
  const escaped = escapeHtml(text).replace(/\n/g, '<br>\n');
  return `<div style="font-family: Arial, sans-serif; font-size: 14px; line-height: 1.5;">\n${escaped}\n</div>`;
}

/**
 * Runs one quote email through re-validation, the rate limiter and the SMTP handoff.
 * Every request-scoped failure comes back as a DispatchResult; nothing is retried.
 */
export class QuoteDispatcher {
  private readonly rateLimiter: EmailRateLimiter;
  private readonly transport: MailTransport;
  private readonly sender: SenderIdentity;
  readonly limits: QuoteEngineLimits;
  private readonly advisorEmail?: string;
  private readonly generateId: () => string;

  constructor(options: QuoteDispatcherOptions) {
    this.rateLimiter = options.rateLimiter;
    this.transport = options.transport;
    this.sender = options.sender;
    this.limits = options.limits ?? DEFAULT_LIMITS;
    this.generateId = options.generateId ?? uuidv4;

    if (options.advisorEmail) {
      const advisor = validateEmail(options.advisorEmail, 'advisorEmail', this.limits.maxEmailLength);
      if (!advisor.isValid) {
        throw new ConfigurationError(`ADVISOR_EMAIL is not a valid address: ${advisor.reason}`);
      }
      this.advisorEmail = advisor.normalizedValue;
    }
  }

  async sendQuoteEmail(request: QuoteEmailRequest, attachments: Attachment[] = []): Promise<DispatchResult> {
    const dispatchId = this.generateId();
    let state: DispatchState = 'Pending';
    const transition = (next: DispatchState): void => {
      console.log('Quote dispatch state change', { dispatchId, from: state, to: next });
      state = next;
    };

    try {
      const prepared = this.prepare(request, attachments);

      const decision = await this.rateLimiter.checkAndReserve();
      if (!decision.allowed) {
        throw new RateLimitError(decision.retryAfterMinutes ?? 1);
      }
      transition('RateChecked');

      console.log('Sending quote email', {
        dispatchId,
        recipient: maskEmail(prepared.recipient),
        attachments: prepared.attachmentCount,
        remainingQuota: decision.remaining
      });

      transition('Sending');
      let info: SentMailInfo;
      try {
        info = await this.transport.sendMail(prepared.message);
      } catch (error) {
        throw toTransportError(error, { operation: 'sendMail', dispatchId });
      }

      if (info.rejected && info.rejected.length > 0) {
        console.warn('Some recipients were refused', { dispatchId, refused: info.rejected.length });
      }

      transition('Sent');
      return {
        success: true,
        state: 'Sent',
        message: 'Quote email sent successfully',
        dispatchId,
        remainingQuota: decision.remaining,
        messageId: info.messageId,
        sentAt: new Date()
      };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }

      const result = this.toFailureResult(error, dispatchId);
      transition(result.state);
      return result;
    }
  }

  getRateLimitStatus(): RateLimitStatus {
    return this.rateLimiter.getStatus();
  }

  /**
   * Connects and authenticates against the SMTP server without sending anything
   */
  async verifyTransport(): Promise<boolean> {
    try {
      await this.transport.verify();
      return true;
    } catch (error) {
      const transportError = toTransportError(error, { operation: 'verify' });
      console.warn('SMTP verification failed', { error: transportError.message, code: transportError.code });
      return false;
    }
  }

  /**
   * Re-validates everything, regardless of what the caller already checked
   */
  private prepare(request: QuoteEmailRequest, attachments: Attachment[]): PreparedMessage {
    const to = validateEmail(request.to, 'to', this.limits.maxEmailLength);
    if (!to.isValid || !to.normalizedValue) {
      throw new ValidationError(to.reason ?? 'Invalid recipient email address', 'to');
    }
    const recipient = to.normalizedValue;

    const ccList: string[] = [];
    if (request.cc !== undefined && request.cc !== '') {
      const cc = validateEmail(request.cc, 'cc', this.limits.maxEmailLength);
      if (!cc.isValid || !cc.normalizedValue) {
        throw new ValidationError(cc.reason ?? 'Invalid CC email address', 'cc');
      }
      ccList.push(cc.normalizedValue);
    }
    if (this.advisorEmail) {
      ccList.push(this.advisorEmail);
    }
    const uniqueCc = [...new Set(ccList.map(address => address.toLowerCase()))]
      .filter(address => address !== recipient.toLowerCase());

    const composed = request.quote
      ? composeQuoteEmail(request.quote, { brandName: this.sender.name, maxFieldLength: this.limits.maxTextInputLength })
      : undefined;

    const subjectSource = request.subject || composed?.subject;
    const subject = subjectSource !== undefined ? sanitize(subjectSource, 'emailHeader') : undefined;
    if (!subject || !subject.ok) {
      throw new ValidationError(subject && !subject.ok ? subject.reason : 'Email subject is required', 'subject');
    }
    if (subject.value === '') {
      throw new ValidationError('Email subject cannot be empty', 'subject');
    }
    if (Array.from(subject.value).length > MAX_SUBJECT_LENGTH) {
      throw new ValidationError(`Subject too long (max ${MAX_SUBJECT_LENGTH} characters)`, 'subject');
    }

    // A caller-supplied body always wins over the composed one
    const composedBody = request.bodyText ? undefined : composed;
    const body = validateTextArea(composedBody ? composedBody.text : request.bodyText, 'bodyText', {
      maxLength: this.limits.maxTextAreaLength,
      required: true
    });
    if (!body.isValid || !body.normalizedValue) {
      throw new ValidationError(body.reason ?? 'Email body cannot be empty', 'bodyText');
    }
    const bodyText = sanitize(body.normalizedValue, 'plainText');
    if (!bodyText.ok || bodyText.value === '') {
      throw new ValidationError('Email body cannot be empty', 'bodyText');
    }

    const mailAttachments = this.prepareAttachments(attachments);

    return {
      recipient,
      attachmentCount: mailAttachments.length,
      message: {
        from: { name: this.sender.name, address: this.sender.address },
        to: recipient,
        cc: uniqueCc.length > 0 ? uniqueCc : undefined,
        replyTo: this.sender.address,
        subject: subject.value,
        text: bodyText.value,
        html: composedBody ? composedBody.html : toHtmlBody(bodyText.value),
        headers: {
          'X-Mailer': X_MAILER,
          'X-Priority': '3'
        },
        attachments: mailAttachments
      }
    };
  }

  private prepareAttachments(attachments: Attachment[]): Mail.Attachment[] {
    const imageCount = attachments.filter(attachment => attachment.kind === 'image').length;
    if (imageCount > this.limits.maxImageAttachments) {
      throw new ValidationError(`Too many images (max ${this.limits.maxImageAttachments})`, 'attachments');
    }

    const verdicts: IntegrityVerdict[] = [];
    const prepared: Mail.Attachment[] = [];

    for (const attachment of attachments) {
      const name = sanitize(attachment.filename, 'filename');
      if (!name.ok) {
        verdicts.push({
          isValid: false,
          filename: attachment.filename,
          kind: attachment.kind,
          sizeBytes: attachment.sizeBytes,
          reason: name.reason
        });
        continue;
      }

      let filename = name.value;
      if (attachment.kind === 'document' && !filename.toLowerCase().endsWith('.pdf')) {
        filename = `${filename}.pdf`;
      }

      const verdict = checkAttachment({ ...attachment, filename }, this.limits);
      verdicts.push(verdict);

      if (verdict.isValid && verdict.detectedType) {
        prepared.push({
          filename,
          content: attachment.bytes,
          contentType: CONTENT_TYPES[verdict.detectedType]
        });
      }
    }

    const rejected = verdicts.filter(verdict => !verdict.isValid);
    if (rejected.length > 0) {
      throw new AttachmentRejection(rejected);
    }

    return prepared;
  }

  private toFailureResult(error: unknown, dispatchId: string): DispatchResult {
    if (error instanceof AttachmentRejection) {
      console.warn('Quote dispatch rejected: attachment failed integrity check', {
        dispatchId,
        rejected: error.verdicts.map(verdict => ({ filename: verdict.filename, reason: verdict.reason }))
      });
      return {
        success: false,
        state: 'Rejected',
        message: error.userMessage,
        dispatchId,
        errorType: 'integrity',
        rejectedAttachments: error.verdicts
      };
    }

    if (error instanceof RateLimitError) {
      console.warn('Quote dispatch rejected: rate limit exceeded', { dispatchId, retryAfterMinutes: error.retryAfterMinutes });
      return {
        success: false,
        state: 'Rejected',
        message: error.userMessage,
        dispatchId,
        errorType: 'rate_limit',
        remainingQuota: 0,
        retryAfterMinutes: error.retryAfterMinutes
      };
    }

    if (error instanceof QuoteEngineError && error.errorType !== 'transport') {
      console.warn('Quote dispatch rejected', { dispatchId, errorType: error.errorType, error: error.message });
      return {
        success: false,
        state: 'Rejected',
        message: error.userMessage,
        dispatchId,
        errorType: error.errorType
      };
    }

    const transportError = toTransportError(error, { operation: 'sendQuoteEmail', dispatchId });
    console.error('Quote dispatch failed', {
      dispatchId,
      code: transportError.code,
      error: transportError.message
    });

    return {
      success: false,
      state: 'Failed',
      message: transportError.userMessage,
      dispatchId,
      errorType: 'transport',
      remainingQuota: this.rateLimiter.getStatus().remaining
    };
  }
}

/**
 * One or more attachments failed the integrity check; the whole send is aborted
 */
export class AttachmentRejection extends IntegrityError {
  readonly verdicts: IntegrityVerdict[];

  constructor(verdicts: IntegrityVerdict[]) {
    const first = verdicts[0];
    super(first.filename, first.reason ?? 'failed integrity check');
    this.verdicts = verdicts;
  }
}

/**
 * Builds a dispatcher from the environment. Throws ConfigurationError when
 * credentials or limits are missing or malformed.
 */
export async function createQuoteDispatcher(env: NodeJS.ProcessEnv = process.env): Promise<QuoteDispatcher> {
  const config = loadQuoteEngineConfig(env);
  const smtpConfig = await getSMTPConfig(env);

  console.log('Quote dispatcher configured', {
    smtpHost: smtpConfig.host,
    smtpPort: smtpConfig.port,
    maxEmailsPerHour: config.limits.maxEmailsPerHour
  });

  return new QuoteDispatcher({
    rateLimiter: new EmailRateLimiter({ maxPerWindow: config.limits.maxEmailsPerHour }),
    transport: createSMTPTransport(smtpConfig),
    sender: smtpConfig.from,
    limits: config.limits,
    advisorEmail: config.advisorEmail
  });
}

let defaultDispatcher: Promise<QuoteDispatcher> | undefined;

export function getDefaultDispatcher(): Promise<QuoteDispatcher> {
  if (!defaultDispatcher) {
    defaultDispatcher = createQuoteDispatcher();
  }
  return defaultDispatcher;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function statusCodeFor(result: DispatchResult): number {
  if (result.success) {
    return 200;
  }
  if (result.state === 'Failed') {
    return 502;
  }
  return result.errorType === 'rate_limit' ? 429 : 400;
}

/**
 * API Gateway handler for POST /quote/send
 */
export function createQuoteSenderHandler(getDispatcher: () => Promise<QuoteDispatcher> = getDefaultDispatcher) {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    const requestId = event.requestContext?.requestId;
    const dispatcher = await getDispatcher();

    const parsed = parseJsonBody(event);
    if (!parsed.ok) {
      return parsed.response;
    }
    const { body } = parsed;

    const encoded = parseEncodedAttachments(body.attachments);
    if (!encoded.ok) {
      return createErrorResponse(400, 'Bad Request', encoded.message, undefined, requestId);
    }

    const attachments: Attachment[] = [];
    for (const item of encoded.attachments) {
      const decoded = decodeBase64Attachment(item, dispatcher.limits);
      if (!decoded.ok) {
        return createErrorResponse(400, 'Invalid Attachment', `The file "${item.filename}" was rejected: ${decoded.verdict.reason}`, [decoded.verdict], requestId);
      }
      attachments.push(decoded.attachment);
    }

    const { clientName, totalPremium, language: requestedLanguage } = body;
    let language: QuoteLanguage | undefined;
    if (requestedLanguage !== undefined) {
      if (!isQuoteLanguage(requestedLanguage)) {
        return createErrorResponse(400, 'Bad Request', 'language must be "en" or "el"', undefined, requestId);
      }
      language = requestedLanguage;
    }
    const quote: QuoteDetails | undefined =
      clientName !== undefined || totalPremium !== undefined || language !== undefined
        ? { clientName: optionalString(clientName), totalPremium: optionalString(totalPremium), language }
        : undefined;

    const result = await dispatcher.sendQuoteEmail(
      {
        to: optionalString(body.to) ?? '',
        cc: optionalString(body.cc),
        subject: optionalString(body.subject),
        bodyText: optionalString(body.bodyText),
        quote
      },
      attachments
    );

    const statusCode = statusCodeFor(result);
    if (result.success) {
      return createSuccessResponse(statusCode, result, requestId);
    }

    const response = createErrorResponse(statusCode, result.state, result.message, result, requestId);
    if (result.retryAfterMinutes !== undefined) {
      response.headers = { ...CORS_HEADERS, 'Retry-After': String(result.retryAfterMinutes * 60) };
    }
    return response;
  };
}

export const handler = createQuoteSenderHandler();
