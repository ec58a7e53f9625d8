// Unit tests for the default quote email
import { describe, it, expect } from 'vitest';
import { MAX_SUBJECT_LENGTH, composeQuoteEmail, isQuoteLanguage } from '../src/shared/utils/quote-email';
import { ValidationError } from '../src/shared/utils/error-handling';

const OPTIONS = { brandName: 'Quote Desk' };

describe('Quote Email Composition', () => {
  it('builds the English subject and plain-text body', () => {
    const email = composeQuoteEmail({ clientName: 'Maria', totalPremium: '€450.00', language: 'en' }, OPTIONS);

    expect(email.subject).toBe('Pet Insurance Quote - Maria');
    expect(email.text).toBe(
      [
        'Dear Maria,',
        '',
        'Thank you for your interest in Quote Desk pet insurance!',
        '',
        'Please find attached your personalized quote with coverage details and pricing information.',
        '',
        'Annual Premium: €450.00',
        '',
        'The attached PDF includes:',
        '✓ Complete coverage breakdown',
        '✓ Terms & conditions summary',
        '✓ Waiting periods',
        '✓ Contact information',
        '',
        "If you have any questions or need clarification on any aspect of the coverage, please don't hesitate to contact us.",
        '',
        'Best regards,',
        'Quote Desk Team',
        '',
        'Because we care for your pets as much as you do.'
      ].join('\n')
    );
  });

  it('builds the Greek subject and body', () => {
    const email = composeQuoteEmail({ clientName: 'Μαρία', totalPremium: '€450.00', language: 'el' }, OPTIONS);

    expect(email.subject).toBe('Προσφορά Ασφάλισης Κατοικιδίου - Μαρία');
    expect(email.text.split('\n')[0]).toBe('Αγαπητέ/ή Μαρία,');
    expect(email.text).toContain('\nΕτήσιο Ασφάλιστρο: €450.00\n');
    expect(email.html).toContain('<html lang="el">');
    expect(email.html).toContain('<li style="margin: 8px 0; color: #374151;">✓ Όρους &amp; προϋποθέσεις</li>');
  });

  it('defaults to English, a generic greeting and a zero premium', () => {
    const email = composeQuoteEmail({}, OPTIONS);

    expect(email.subject).toBe('Pet Insurance Quote - Valued Customer');
    expect(email.text.split('\n')[0]).toBe('Dear Valued Customer,');
    expect(email.text).toContain('\nAnnual Premium: €0.00\n');
    expect(email.html).toContain('<html lang="en">');
  });

  it('escapes every value placed in the HTML body', () => {
    const email = composeQuoteEmail({ clientName: 'Maria <b>P', totalPremium: '"450"' }, { brandName: 'Pets & Co' });

    expect(email.html).toContain('>Dear Maria &lt;b&gt;P,</p>');
    expect(email.html).toContain('font-weight: 700;">&quot;450&quot;</p>');
    expect(email.html).toContain('font-size: 28px;">Pets &amp; Co</h1>');
    expect(email.html).toContain('please don&#39;t hesitate');
    expect(email.html).not.toContain('<b>P');
    expect(email.text.split('\n')[0]).toBe('Dear Maria <b>P,');
  });

  it('cuts the subject to the maximum length', () => {
    const email = composeQuoteEmail({ clientName: 'A'.repeat(250) }, OPTIONS);

    expect(email.subject).toBe(`Pet Insurance Quote - ${'A'.repeat(MAX_SUBJECT_LENGTH - 22)}`);
    expect(email.subject.length).toBe(200);
  });

  it('rejects header injection through the client name', () => {
    expect(() => composeQuoteEmail({ clientName: 'Maria\r\nBcc: someone@example.org' }, OPTIONS)).toThrow(ValidationError);
    expect(() => composeQuoteEmail({ totalPremium: '€1\n' }, OPTIONS)).toThrow(
      'totalPremium: Header value contains line breaks or NUL characters'
    );
  });

  it('rejects values over the field limit', () => {
    expect(() => composeQuoteEmail({ clientName: 'A'.repeat(11) }, { ...OPTIONS, maxFieldLength: 10 })).toThrow(
      'clientName: Text too long (max 10 characters)'
    );
  });

  it('recognizes the supported languages', () => {
    expect(isQuoteLanguage('en')).toBe(true);
    expect(isQuoteLanguage('el')).toBe(true);
    expect(isQuoteLanguage('fr')).toBe(false);
    expect(isQuoteLanguage(undefined)).toBe(false);
  });
});
