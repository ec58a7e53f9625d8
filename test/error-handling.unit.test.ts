// Unit tests for the error taxonomy
import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  IntegrityError,
  RateLimitError,
  TransportError,
  ValidationError,
  categorizeTransportError,
  formatRateLimitMessage,
  isQuoteEngineError,
  toTransportError
} from '../src/shared/utils/error-handling';

function smtpError(message: string, properties: Record<string, unknown>): Error {
  return Object.assign(new Error(message), properties);
}

describe('Error Handling Unit Tests', () => {
  it('gives every error type a user-facing message', () => {
    expect(new ValidationError('Invalid email address', 'to').userMessage).toBe('Invalid email address');
    expect(new ValidationError('Invalid email address', 'to').message).toBe('to: Invalid email address');
    expect(new IntegrityError('photo.jpg', 'Empty file').userMessage).toBe('The file "photo.jpg" was rejected: Empty file');
    expect(new RateLimitError(5).userMessage).toBe('rate limit exceeded, try again in 5 minutes');
    expect(new ConfigurationError('SMTP_PASS missing').userMessage).toBe('The service is not configured correctly');
  });

  it('names errors after their class', () => {
    expect(new RateLimitError(1).name).toBe('RateLimitError');
    expect(isQuoteEngineError(new RateLimitError(1))).toBe(true);
    expect(isQuoteEngineError(new Error('plain'))).toBe(false);
  });

  it('uses the singular for one minute', () => {
    expect(formatRateLimitMessage(1)).toBe('rate limit exceeded, try again in 1 minute');
  });

  describe('categorizeTransportError', () => {
    it('recognizes authentication failures', () => {
      expect(categorizeTransportError(smtpError('Invalid login', { code: 'EAUTH', responseCode: 535 }))).toEqual({
        kind: 'authentication',
        code: 'EAUTH',
        userMessage: 'Email authentication failed. Please check the SMTP credentials.'
      });
    });

    it('recognizes connection failures', () => {
      expect(categorizeTransportError(smtpError('connect ECONNREFUSED 127.0.0.1:587', { code: 'ECONNECTION' })).kind).toBe(
        'connection'
      );
    });

    it('treats certificate problems as TLS failures', () => {
      expect(categorizeTransportError(smtpError('self signed certificate in certificate chain', { code: 'ESOCKET' })).kind).toBe(
        'tls'
      );
    });

    it('recognizes refused recipients and oversized messages', () => {
      expect(categorizeTransportError(smtpError('Recipient refused', { code: 'EENVELOPE', command: 'RCPT TO' })).kind).toBe(
        'recipient'
      );
      expect(
        categorizeTransportError(smtpError('Message failed: 552 size exceeded', { responseCode: 552, command: 'DATA' })).kind
      ).toBe('data');
    });

    it('falls back to a generic sending failure', () => {
      expect(categorizeTransportError('boom')).toEqual({
        kind: 'sending',
        code: 'SEND_ERROR',
        userMessage: 'The email could not be sent. Please try again.'
      });
    });
  });

  it('keeps server details out of the user message', () => {
    const error = toTransportError(smtpError('Greeting never received from mail.internal.example.com', { code: 'ETIMEDOUT' }), {
      operation: 'sendMail'
    });

    expect(error).toBeInstanceOf(TransportError);
    expect(error.code).toBe('ETIMEDOUT');
    expect(error.userMessage).toBe('Connection to the email server timed out. Please try again.');
    expect(error.message).toBe('sendMail failed (timeout): Greeting never received from mail.internal.example.com');
  });
});
