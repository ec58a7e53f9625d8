// Error taxonomy and transport error categorization
import type { DispatchErrorType } from '../models';

export interface ErrorContext {
  operation: string;
  dispatchId?: string;
}

/**
 * Base class for every error the quote engine raises on purpose.
 * `userMessage` is safe to show in the UI; `message` may carry internal detail for logs.
 */
export class QuoteEngineError extends Error {
  readonly errorType: DispatchErrorType;
  readonly userMessage: string;

  constructor(errorType: DispatchErrorType, message: string, userMessage: string = message, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.errorType = errorType;
    this.userMessage = userMessage;
  }
}

export class ValidationError extends QuoteEngineError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('validation', field ? `${field}: ${message}` : message, message);
    this.field = field;
  }
}

export class IntegrityError extends QuoteEngineError {
  readonly filename: string;

  constructor(filename: string, reason: string) {
    super('integrity', `${filename}: ${reason}`, `The file "${filename}" was rejected: ${reason}`);
    this.filename = filename;
  }
}

export class RateLimitError extends QuoteEngineError {
  readonly retryAfterMinutes: number;

  constructor(retryAfterMinutes: number) {
    super('rate_limit', 'rate limit exceeded', formatRateLimitMessage(retryAfterMinutes));
    this.retryAfterMinutes = retryAfterMinutes;
  }
}

export class TransportError extends QuoteEngineError {
  readonly code?: string;

  constructor(message: string, userMessage: string, code?: string, cause?: unknown) {
    super('transport', message, userMessage, { cause });
    this.code = code;
  }
}

/**
 * Missing or malformed configuration. Fatal: raised at startup, never per request.
 */
export class ConfigurationError extends QuoteEngineError {
  constructor(message: string) {
    super('configuration', message, 'The service is not configured correctly');
  }
}

export function formatRateLimitMessage(retryAfterMinutes: number): string {
  const unit = retryAfterMinutes === 1 ? 'minute' : 'minutes';
  return `rate limit exceeded, try again in ${retryAfterMinutes} ${unit}`;
}

export type TransportFailureKind =
  | 'authentication'
  | 'connection'
  | 'timeout'
  | 'tls'
  | 'recipient'
  | 'sender'
  | 'data'
  | 'sending';

const TRANSPORT_USER_MESSAGES: Record<TransportFailureKind, string> = {
  authentication: 'Email authentication failed. Please check the SMTP credentials.',
  connection: 'Could not connect to the email server. Please try again later.',
  timeout: 'Connection to the email server timed out. Please try again.',
  tls: 'A secure connection to the email server could not be established.',
  recipient: 'The recipient address was rejected by the email server.',
  sender: 'The sender address was rejected by the email server.',
  data: 'The email was rejected by the server. It may be too large or contain invalid content.',
  sending: 'The email could not be sent. Please try again.'
};

function readStringProperty(value: unknown, key: string): string {
  if (typeof value === 'object' && value !== null && key in value) {
    const property: unknown = Reflect.get(value, key);
    if (typeof property === 'string') {
      return property;
    }
  }
  return '';
}

function readNumberProperty(value: unknown, key: string): number | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const property: unknown = Reflect.get(value, key);
    if (typeof property === 'number') {
      return property;
    }
  }
  return undefined;
}

/**
 * Categorizes an SMTP/network failure from its error code, response code and message
 */
export function categorizeTransportError(error: unknown): { kind: TransportFailureKind; code: string; userMessage: string } {
  const code = readStringProperty(error, 'code');
  const responseCode = readNumberProperty(error, 'responseCode');
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  const command = readStringProperty(error, 'command').toUpperCase();

  let kind: TransportFailureKind = 'sending';

  if (code === 'EAUTH' || responseCode === 535 || message.includes('auth')) {
    kind = 'authentication';
  } else if (code === 'ETIMEDOUT' || message.includes('timeout') || message.includes('timed out')) {
    kind = 'timeout';
  } else if (code === 'ETLS' || message.includes('certificate') || message.includes('tls') || message.includes('ssl')) {
    kind = 'tls';
  } else if (code === 'EENVELOPE' || command === 'RCPT TO') {
    kind = 'recipient';
  } else if (command === 'MAIL FROM') {
    kind = 'sender';
  } else if (code === 'EMESSAGE' || command === 'DATA' || responseCode === 552 || responseCode === 554) {
    kind = 'data';
  } else if (code === 'ECONNECTION' || code === 'ESOCKET' || code === 'EDNS' || code === 'ECONNREFUSED') {
    kind = 'connection';
  }

  return {
    kind,
    code: code || 'SEND_ERROR',
    userMessage: TRANSPORT_USER_MESSAGES[kind]
  };
}

/**
 * Wraps any thrown value into a TransportError carrying only a generic user message
 */
export function toTransportError(error: unknown, context: ErrorContext): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const { kind, code, userMessage } = categorizeTransportError(error);
  const detail = error instanceof Error ? error.message : String(error);

  const scope = context.dispatchId ? `${context.operation} [${context.dispatchId}]` : context.operation;

  return new TransportError(`${scope} failed (${kind}): ${detail}`, userMessage, code, error);
}

export function isQuoteEngineError(error: unknown): error is QuoteEngineError {
  return error instanceof QuoteEngineError;
}
