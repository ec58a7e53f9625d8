// Form field validation utilities
import type { FieldValidationResult, FormInput, FormVerdict, QuoteFieldDefinition } from '../models';
import { ConfigurationError } from './error-handling';
import { DEFAULT_LIMITS, type QuoteEngineLimits } from './environment';

const CR_OR_LF = /[\r\n]/;

// Local part starts alphanumeric (max 64), domain has at least one dot and an alphabetic TLD
const EMAIL_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._%+-]{0,63}@[a-zA-Z0-9][a-zA-Z0-9.-]{0,253}\.[a-zA-Z]{2,}$/;

// Spaces and hyphens only; tabs and line breaks are not separators
const PHONE_PATTERN = /^\+?[\d -]+$/;
const MIN_PHONE_DIGITS = 7;
const MAX_PHONE_DIGITS = 15;

// Every C0 control, DEL and C1 control
const SINGLE_LINE_FORBIDDEN = /[\u0000-\u0008\u000A-\u001F\u007F-\u009F]/;
const MULTI_LINE_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/;

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;

export interface TextOptions {
  maxLength?: number;
  required?: boolean;
}

export interface RangeOptions {
  min?: number;
  max?: number;
}

export interface UrlOptions {
  allowedDomains?: string[];
  requireHttps?: boolean;
}

function pass<T>(field: string, normalizedValue: T): FieldValidationResult<T> {
  return { field, isValid: true, normalizedValue };
}

function fail<T>(field: string, reason: string): FieldValidationResult<T> {
  return { field, isValid: false, reason };
}

function assertBound(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive finite number, got ${value}`);
  }
}

/**
 * Validates an email address. CR/LF anywhere is rejected before any other check.
 */
export function validateEmail(
  value: unknown,
  field: string = 'email',
  maxLength: number = DEFAULT_LIMITS.maxEmailLength
): FieldValidationResult {
  assertBound('maxEmailLength', maxLength);

  if (typeof value !== 'string' || value === '') {
    return fail(field, 'Email address is required');
  }

  if (CR_OR_LF.test(value)) {
    return fail(field, 'Email address contains line breaks');
  }

  const email = value.trim();

  if (email.length > maxLength) {
    return fail(field, `Email address is too long (max ${maxLength} characters)`);
  }

  if (email.split('@').length !== 2 || !EMAIL_PATTERN.test(email)) {
    return fail(field, 'Invalid email address');
  }

  const [local, domain] = email.split('@');

  if (local.endsWith('.') || local.includes('..')) {
    return fail(field, 'Invalid email address');
  }

  if (domain.startsWith('-') || domain.endsWith('-') || domain.includes('..')) {
    return fail(field, 'Invalid email address');
  }

  return pass(field, email);
}

export function isValidEmailFormat(value: unknown): boolean {
  return validateEmail(value).isValid;
}

/**
 * Validates a phone number: digits, an optional leading +, spaces and hyphens
 */
export function validatePhone(value: unknown, field: string = 'phone'): FieldValidationResult {
  if (typeof value !== 'string' || value.trim() === '') {
    return fail(field, 'Phone number is required');
  }

  const phone = value.trim();

  if (!PHONE_PATTERN.test(phone)) {
    return fail(field, 'Phone number may only contain digits, spaces, hyphens and a leading +');
  }

  const digits = phone.replace(/\D/g, '');
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return fail(field, `Phone number must have between ${MIN_PHONE_DIGITS} and ${MAX_PHONE_DIGITS} digits`);
  }

  return pass(field, phone.startsWith('+') ? `+${digits}` : digits);
}

function validateText(
  value: unknown,
  field: string,
  forbidden: RegExp,
  maxLength: number,
  required: boolean
): FieldValidationResult {
  assertBound('maxLength', maxLength);

  if (value === undefined || value === null || value === '') {
    return required ? fail(field, 'This field is required') : pass(field, '');
  }

  if (typeof value !== 'string') {
    return fail(field, 'Expected text');
  }

  const text = value.trim();

  if (required && text === '') {
    return fail(field, 'This field is required');
  }

  if (text.length > maxLength) {
    return fail(field, `Input too long (max ${maxLength} characters)`);
  }

  if (forbidden.test(text)) {
    return fail(field, 'Input contains control characters');
  }

  return pass(field, text);
}

/**
 * Single-line free text. Only TAB is tolerated among control characters.
 */
export function validateTextInput(value: unknown, field: string = 'text', options: TextOptions = {}): FieldValidationResult {
  const { maxLength = DEFAULT_LIMITS.maxTextInputLength, required = false } = options;
  return validateText(value, field, SINGLE_LINE_FORBIDDEN, maxLength, required);
}

/**
 * Multi-line free text. TAB, LF and CR are tolerated.
 */
export function validateTextArea(value: unknown, field: string = 'text', options: TextOptions = {}): FieldValidationResult {
  const { maxLength = DEFAULT_LIMITS.maxTextAreaLength, required = false } = options;
  return validateText(value, field, MULTI_LINE_FORBIDDEN, maxLength, required);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }

  return undefined;
}

/**
 * Non-negative decimal amount (prices)
 */
export function validateAmount(value: unknown, field: string = 'amount', options: RangeOptions = {}): FieldValidationResult<number> {
  const { min = 0, max = 10000 } = options;
  const amount = toNumber(value);

  if (amount === undefined || !Number.isFinite(amount)) {
    return fail(field, 'Amount must be a number');
  }

  if (amount < 0 || amount < min) {
    return fail(field, `Amount must be at least ${Math.max(0, min)}`);
  }

  if (amount > max) {
    return fail(field, `Amount must not exceed ${max}`);
  }

  return pass(field, amount);
}

/**
 * Whole-number quantity (pet count)
 */
export function validateCount(value: unknown, field: string = 'count', options: RangeOptions = {}): FieldValidationResult<number> {
  const { min = 1, max = 50 } = options;
  const count = toNumber(value);

  if (count === undefined || !Number.isInteger(count)) {
    return fail(field, 'Count must be a whole number');
  }

  if (count < min || count > max) {
    return fail(field, `Count must be between ${min} and ${max}`);
  }

  return pass(field, count);
}

/**
 * Date in dd/mm/yyyy that exists on the calendar
 */
export function validateDate(value: unknown, field: string = 'date'): FieldValidationResult {
  if (typeof value !== 'string') {
    return fail(field, 'Invalid date format (use dd/mm/yyyy)');
  }

  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return fail(field, 'Invalid date format (use dd/mm/yyyy)');
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return fail(field, 'Date does not exist');
  }

  return pass(field, match[0]);
}

/**
 * Absolute URL, HTTPS by default, optionally restricted to a domain allow-list
 */
export function validateUrl(value: unknown, field: string = 'url', options: UrlOptions = {}): FieldValidationResult {
  const { allowedDomains = [], requireHttps = true } = options;

  if (typeof value !== 'string' || value.trim() === '' || /\s/.test(value.trim())) {
    return fail(field, 'Invalid URL');
  }

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return fail(field, 'Invalid URL');
  }

  if (url.protocol !== 'https:' && (requireHttps || url.protocol !== 'http:')) {
    return fail(field, `URL scheme not allowed: ${url.protocol.replace(':', '')}`);
  }

  if (url.username || url.password) {
    return fail(field, 'URL must not contain credentials');
  }

  const host = url.hostname.toLowerCase();
  if (allowedDomains.length > 0) {
    const permitted = allowedDomains.some(domain => {
      const allowed = domain.toLowerCase();
      return host === allowed || host.endsWith(`.${allowed}`);
    });
    if (!permitted) {
      return fail(field, `Domain not allowed: ${host}`);
    }
  }

  return pass(field, url.toString());
}

export const QUOTE_FORM_FIELDS: readonly QuoteFieldDefinition[] = [
  { name: 'clientName', kind: 'text', required: true },
  { name: 'clientEmail', kind: 'email', required: true },
  { name: 'clientPhone', kind: 'phone', required: true },
  { name: 'location', kind: 'text', required: false },
  { name: 'petCount', kind: 'count', required: false },
  { name: 'bulkSummary', kind: 'textarea', required: false },
  { name: 'petName', kind: 'text', required: false },
  { name: 'petSpecies', kind: 'text', required: false, maxLength: 20 },
  { name: 'petBreed', kind: 'text', required: false },
  { name: 'petDob', kind: 'date', required: false },
  { name: 'petMicrochip', kind: 'text', required: false, maxLength: 50 },
  { name: 'plan1Name', kind: 'text', required: true, maxLength: 200 },
  { name: 'plan1Provider', kind: 'text', required: false, maxLength: 200 },
  { name: 'plan1Price', kind: 'amount', required: true },
  { name: 'plan2Name', kind: 'text', required: false, maxLength: 200 },
  { name: 'plan2Provider', kind: 'text', required: false, maxLength: 200 },
  { name: 'plan2Price', kind: 'amount', required: false },
  { name: 'marketingHook', kind: 'text', required: false, maxLength: 150 },
  { name: 'notes', kind: 'textarea', required: false }
];

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function validateField(
  definition: QuoteFieldDefinition,
  value: unknown,
  limits: QuoteEngineLimits
): FieldValidationResult<string | number> {
  const { name, kind, required } = definition;

  if (kind !== 'text' && kind !== 'textarea' && isBlank(value)) {
    return required ? fail(name, 'This field is required') : pass(name, '');
  }

  switch (kind) {
    case 'email':
      return validateEmail(value, name, limits.maxEmailLength);
    case 'phone':
      return validatePhone(value, name);
    case 'text':
      return validateTextInput(value, name, {
        maxLength: Math.min(definition.maxLength ?? limits.maxTextInputLength, limits.maxTextInputLength),
        required
      });
    case 'textarea':
      return validateTextArea(value, name, {
        maxLength: Math.min(definition.maxLength ?? limits.maxTextAreaLength, limits.maxTextAreaLength),
        required
      });
    case 'amount':
      return validateAmount(value, name);
    case 'count':
      return validateCount(value, name);
    case 'date':
      return validateDate(value, name);
  }
}

/**
 * Validates every field of the quote form and aggregates a verdict
 */
export function validateQuoteForm(
  input: FormInput,
  limits: QuoteEngineLimits = DEFAULT_LIMITS,
  fields: readonly QuoteFieldDefinition[] = QUOTE_FORM_FIELDS
): FormVerdict {
  const results = fields.map(definition => validateField(definition, input[definition.name], limits));
  const errors: Record<string, string> = {};
  const values: Record<string, string | number> = {};

  results.forEach(result => {
    if (!result.isValid) {
      errors[result.field] = result.reason ?? 'Invalid value';
    } else if (result.normalizedValue !== undefined) {
      values[result.field] = result.normalizedValue;
    }
  });

  return {
    isValid: Object.keys(errors).length === 0,
    results,
    errors,
    values
  };
}
