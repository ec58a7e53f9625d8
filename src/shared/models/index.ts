// Shared data models

/**
 * Raw field values as submitted by the quote form (strings, occasionally numbers)
 */
export type FormInput = Record<string, unknown>;

export interface FieldValidationResult<T = string> {
  field: string;
  isValid: boolean;
  normalizedValue?: T;
  reason?: string;
}

export type QuoteFieldKind = 'email' | 'phone' | 'text' | 'textarea' | 'amount' | 'count' | 'date';

export interface QuoteFieldDefinition {
  name: string;
  kind: QuoteFieldKind;
  required: boolean;
  maxLength?: number;
}

export interface FormVerdict {
  isValid: boolean;
  results: FieldValidationResult<string | number>[];
  errors: Record<string, string>;
  values: Record<string, string | number>;
}

export type AttachmentKind = 'image' | 'document';

export interface Attachment {
  filename: string;
  kind: AttachmentKind;
  mimeDeclared?: string;
  bytes: Buffer;
  sizeBytes: number;
}

export type DetectedFileType = 'jpeg' | 'png' | 'webp' | 'pdf';

export interface IntegrityVerdict {
  isValid: boolean;
  filename: string;
  kind: AttachmentKind;
  sizeBytes: number;
  detectedType?: DetectedFileType;
  pageCount?: number;
  reason?: string;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs?: number;
  retryAfterMinutes?: number;
  resetAt?: Date;
}

export interface RateLimitStatus {
  maxPerHour: number;
  used: number;
  remaining: number;
}

export type DispatchState = 'Pending' | 'RateChecked' | 'Sending' | 'Sent' | 'Rejected' | 'Failed';

export type DispatchErrorType = 'validation' | 'integrity' | 'rate_limit' | 'transport' | 'configuration';

export type QuoteLanguage = 'en' | 'el';

/**
 * Details for the default quote email, used when the caller supplies no subject or body
 */
export interface QuoteDetails {
  clientName?: string;
  totalPremium?: string;
  language?: QuoteLanguage;
}

export interface QuoteEmailRequest {
  to: string;
  cc?: string;
  subject?: string;
  bodyText?: string;
  quote?: QuoteDetails;
}

export interface DispatchResult {
  success: boolean;
  state: Extract<DispatchState, 'Sent' | 'Rejected' | 'Failed'>;
  message: string;
  dispatchId: string;
  remainingQuota?: number;
  retryAfterMinutes?: number;
  errorType?: DispatchErrorType;
  messageId?: string;
  sentAt?: Date;
  rejectedAttachments?: IntegrityVerdict[];
}
