// Environment configuration
import { ConfigurationError } from './error-handling';

const MB = 1024 * 1024;

export interface QuoteEngineLimits {
  maxEmailsPerHour: number;
  maxPdfSizeBytes: number;
  maxImageSizeBytes: number;
  maxTextInputLength: number;
  maxTextAreaLength: number;
  maxEmailLength: number;
  maxImageAttachments: number;
}

export interface QuoteEngineConfig {
  limits: QuoteEngineLimits;
  advisorEmail?: string;
  webFetchTimeoutMs: number;
  allowedFetchDomains: string[];
}

export const DEFAULT_LIMITS: QuoteEngineLimits = {
  maxEmailsPerHour: 20,
  maxPdfSizeBytes: 25 * MB,
  maxImageSizeBytes: 10 * MB,
  maxTextInputLength: 500,
  maxTextAreaLength: 5000,
  maxEmailLength: 254, // RFC 5321
  maxImageAttachments: 10
};

export const ALLOWED_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp'] as const;

/**
 * Parses a positive integer setting; anything else is a startup failure
 */
export function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }

  const value = parseInt(raw.trim(), 10);
  if (value <= 0 || !Number.isSafeInteger(value)) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }

  return value;
}

export function loadQuoteEngineConfig(env: NodeJS.ProcessEnv = process.env): QuoteEngineConfig {
  const advisorEmail = env.ADVISOR_EMAIL?.trim();

  return {
    limits: {
      maxEmailsPerHour: readPositiveInt(env, 'MAX_EMAILS_PER_HOUR', DEFAULT_LIMITS.maxEmailsPerHour),
      maxPdfSizeBytes: readPositiveInt(env, 'MAX_PDF_SIZE_MB', DEFAULT_LIMITS.maxPdfSizeBytes / MB) * MB,
      maxImageSizeBytes: readPositiveInt(env, 'MAX_IMAGE_SIZE_MB', DEFAULT_LIMITS.maxImageSizeBytes / MB) * MB,
      maxTextInputLength: readPositiveInt(env, 'MAX_TEXT_INPUT_LENGTH', DEFAULT_LIMITS.maxTextInputLength),
      maxTextAreaLength: readPositiveInt(env, 'MAX_TEXT_AREA_LENGTH', DEFAULT_LIMITS.maxTextAreaLength),
      maxEmailLength: readPositiveInt(env, 'MAX_EMAIL_LENGTH', DEFAULT_LIMITS.maxEmailLength),
      maxImageAttachments: readPositiveInt(env, 'MAX_IMAGE_ATTACHMENTS', DEFAULT_LIMITS.maxImageAttachments)
    },
    advisorEmail: advisorEmail ? advisorEmail : undefined,
    webFetchTimeoutMs: readPositiveInt(env, 'WEB_FETCH_TIMEOUT_MS', 20000),
    allowedFetchDomains: (env.ALLOWED_FETCH_DOMAINS || '')
      .split(',')
      .map(domain => domain.trim().toLowerCase())
      .filter(domain => domain !== '')
  };
}
