// Default quote email in English or Greek: subject, plain-text body and HTML body
import type { QuoteDetails, QuoteLanguage } from '../models';
import templates from '../templates/quote-email.json';
import { DEFAULT_LIMITS } from './environment';
import { ValidationError } from './error-handling';
import { escapeHtml, sanitize } from './sanitize';

export const MAX_SUBJECT_LENGTH = 200;

const DEFAULT_CLIENT_NAME = 'Valued Customer';
const DEFAULT_PREMIUM = '€0.00';

interface QuoteEmailTemplate {
  subject: string;
  greeting: string;
  intro: string;
  attachedNote: string;
  quoteTitle: string;
  premiumLabel: string;
  includesTitle: string;
  items: string[];
  questions: string;
  regards: string;
  team: string;
  tagline: string;
}

const TEMPLATES: Record<QuoteLanguage, QuoteEmailTemplate> = templates;

export interface ComposeOptions {
  brandName: string;
  maxFieldLength?: number;
}

export interface ComposedQuoteEmail {
  subject: string;
  text: string;
  html: string;
}

export function isQuoteLanguage(value: unknown): value is QuoteLanguage {
  return value === 'en' || value === 'el';
}

function truncate(value: string, maxCodePoints: number): string {
  return Array.from(value).slice(0, maxCodePoints).join('');
}

function headerValue(value: string | undefined, field: string, fallback: string, maxLength: number): string {
  const cleaned = sanitize(value ?? '', 'emailHeader');
  if (!cleaned.ok) {
    throw new ValidationError(cleaned.reason, field);
  }
  if (Array.from(cleaned.value).length > maxLength) {
    throw new ValidationError(`Text too long (max ${maxLength} characters)`, field);
  }
  return cleaned.value || fallback;
}

function fill(template: string, client: string, brand: string): string {
  return template.replace(/\{(client|brand)\}/g, (_match, key: string) => (key === 'client' ? client : brand));
}

function renderText(template: QuoteEmailTemplate, client: string, brand: string, premium: string): string {
  return [
    fill(template.greeting, client, brand),
    '',
    fill(template.intro, client, brand),
    '',
    template.attachedNote,
    '',
    `${template.premiumLabel}: ${premium}`,
    '',
    template.includesTitle,
    ...template.items.map(item => `✓ ${item}`),
    '',
    template.questions,
    '',
    template.regards,
    fill(template.team, client, brand),
    '',
    template.tagline
  ].join('\n');
}

const PARAGRAPH = 'margin: 0 0 20px 0; color: #374151; font-size: 15px; line-height: 1.6;';

function renderHtml(
  template: QuoteEmailTemplate,
  language: QuoteLanguage,
  client: string,
  brand: string,
  premium: string
): string {
  // Every interpolated value is escaped, template copy included
  const line = (value: string) => escapeHtml(fill(value, client, brand));
  const items = template.items
    .map(item => `<li style="margin: 8px 0; color: #374151;">✓ ${escapeHtml(item)}</li>`)
    .join('\n');

  return [
    '<!DOCTYPE html>',
    `<html lang="${language}">`,
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    '</head>',
    '<body style="margin: 0; padding: 0; font-family: Arial, sans-serif; background-color: #F3F4F6;">',
    '<table width="100%" cellpadding="0" cellspacing="0" style="background-color: #F3F4F6; padding: 40px 20px;"><tr><td align="center">',
    '<table width="600" cellpadding="0" cellspacing="0" style="background-color: #FFFFFF; border-radius: 12px; overflow: hidden;">',
    `<tr><td style="background-color: #1E4FA8; padding: 30px; text-align: center;"><h1 style="margin: 0; color: #FFFFFF; font-size: 28px;">${escapeHtml(brand)}</h1></td></tr>`,
    '<tr><td style="padding: 40px 30px;">',
    `<p style="${PARAGRAPH}">${line(template.greeting)}</p>`,
    `<p style="${PARAGRAPH}">${line(template.intro)}</p>`,
    `<p style="${PARAGRAPH}">${line(template.attachedNote)}</p>`,
    '<table width="100%" cellpadding="0" cellspacing="0" style="background-color: #F7FAFC; border: 2px solid #1E4FA8; border-radius: 8px; margin: 0 0 30px 0;"><tr><td style="padding: 20px;">',
    `<h2 style="margin: 0 0 12px 0; color: #1E4FA8; font-size: 18px;">${line(template.quoteTitle)}</h2>`,
    `<p style="margin: 0; color: #6B7280; font-size: 14px;">${line(template.premiumLabel)}</p>`,
    `<p style="margin: 8px 0 0 0; color: #111827; font-size: 28px; font-weight: 700;">${escapeHtml(premium)}</p>`,
    '</td></tr></table>',
    `<h3 style="margin: 0 0 16px 0; color: #111827; font-size: 16px;">${line(template.includesTitle)}</h3>`,
    `<ul style="margin: 0 0 30px 0; padding: 0 0 0 20px; list-style: none;">\n${items}\n</ul>`,
    `<p style="${PARAGRAPH}">${line(template.questions)}</p>`,
    `<p style="margin: 0 0 8px 0; color: #111827; font-size: 15px;">${line(template.regards)}</p>`,
    `<p style="margin: 0; color: #1E4FA8; font-size: 16px; font-weight: 600;">${line(template.team)}</p>`,
    '</td></tr>',
    `<tr><td style="background-color: #F9FAFB; padding: 30px; border-top: 1px solid #E5E7EB; text-align: center;"><p style="margin: 0; color: #9CA3AF; font-size: 12px; font-style: italic;">${line(template.tagline)}</p></td></tr>`,
    '</table>',
    '</td></tr></table>',
    '</body>',
    '</html>'
  ].join('\n');
}

/**
 * Builds the default quote email for a client. Client name and premium go through
 * header sanitization; the subject is cut to MAX_SUBJECT_LENGTH code points.
 */
export function composeQuoteEmail(details: QuoteDetails, options: ComposeOptions): ComposedQuoteEmail {
  const maxLength = options.maxFieldLength ?? DEFAULT_LIMITS.maxTextInputLength;
  const language = details.language ?? 'en';
  const template = TEMPLATES[language];

  const client = headerValue(details.clientName, 'clientName', DEFAULT_CLIENT_NAME, maxLength);
  const premium = headerValue(details.totalPremium, 'totalPremium', DEFAULT_PREMIUM, maxLength);
  const brand = headerValue(options.brandName, 'brandName', '', maxLength);

  return {
    subject: truncate(fill(template.subject, client, brand), MAX_SUBJECT_LENGTH),
    text: renderText(template, client, brand, premium),
    html: renderHtml(template, language, client, brand, premium)
  };
}
