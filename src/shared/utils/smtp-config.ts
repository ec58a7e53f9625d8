// SMTP configuration and TLS-verified transport for quote emails
import nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import { ConfigurationError } from './error-handling';
import { getSMTPCredentialsWithFallback, type SMTPCredentials } from './secrets-manager';
import { isValidEmailFormat } from './validation';

export interface SMTPConfig {
  host: string;
  port: number;
  secure: boolean; // true for implicit TLS (port 465), false for STARTTLS (port 587)
  auth: {
    user: string;
    pass: string;
  };
  from: {
    address: string;
    name: string;
  };
  timeouts: {
    connectionMs: number;
    greetingMs: number;
    socketMs: number;
  };
}

export interface SentMailInfo {
  messageId: string;
  rejected?: Array<string | Mail.Address>;
}

/**
 * The slice of a nodemailer transporter the dispatcher needs
 */
export interface MailTransport {
  sendMail(message: Mail.Options): Promise<SentMailInfo>;
  verify(): Promise<true>;
}

export const SMTP_DEFAULTS = {
  HOST: 'smtp.gmail.com',
  PORT_STARTTLS: 587,
  PORT_SSL: 465,
  FROM_NAME: 'Quote Desk',
  CONNECTION_TIMEOUT_MS: 30000,
  GREETING_TIMEOUT_MS: 15000,
  SOCKET_TIMEOUT_MS: 30000
} as const;

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return SMTP_DEFAULTS.PORT_STARTTLS;
  }

  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigurationError(`SMTP_PORT must be a valid port number, got "${raw}"`);
  }
  return port;
}

/**
 * Builds the SMTP configuration from the environment and resolved credentials
 */
export function buildSMTPConfig(credentials: SMTPCredentials, env: NodeJS.ProcessEnv = process.env): SMTPConfig {
  const port = parsePort(env.SMTP_PORT);

  return {
    host: env.SMTP_HOST?.trim() || SMTP_DEFAULTS.HOST,
    port,
    secure: port === SMTP_DEFAULTS.PORT_SSL,
    auth: {
      user: credentials.username,
      pass: credentials.password
    },
    from: {
      address: credentials.fromAddress || credentials.username,
      name: credentials.fromName || SMTP_DEFAULTS.FROM_NAME
    },
    timeouts: {
      connectionMs: SMTP_DEFAULTS.CONNECTION_TIMEOUT_MS,
      greetingMs: SMTP_DEFAULTS.GREETING_TIMEOUT_MS,
      socketMs: SMTP_DEFAULTS.SOCKET_TIMEOUT_MS
    }
  };
}

/**
 * Resolves credentials (Secrets Manager or environment) and builds a validated config
 */
export async function getSMTPConfig(env: NodeJS.ProcessEnv = process.env): Promise<SMTPConfig> {
  const credentials = await getSMTPCredentialsWithFallback(env);
  const config = buildSMTPConfig(credentials, env);

  if (!validateSMTPConfig(config)) {
    throw new ConfigurationError('Invalid SMTP configuration. Check SMTP_HOST, SMTP_USER and the sender address.');
  }

  return config;
}

/**
 * Validates SMTP configuration
 */
export function validateSMTPConfig(config: SMTPConfig): boolean {
  if (!config.host || !config.port) {
    return false;
  }

  if (!config.auth.user || !config.auth.pass) {
    return false;
  }

  if (!config.from.address || !isValidEmailFormat(config.from.address)) {
    return false;
  }

  if (/[\r\n]/.test(config.from.name)) {
    return false;
  }

  return true;
}

/**
 * Options for a STARTTLS (or implicit TLS) transport with certificate verification on
 */
export function buildTransportOptions(config: SMTPConfig) {
  return {
    host: config.host,
    port: config.port,
    secure: config.secure,
    requireTLS: !config.secure,
    auth: {
      user: config.auth.user,
      pass: config.auth.pass
    },
    tls: {
      rejectUnauthorized: true,
      minVersion: 'TLSv1.2' as const,
      servername: config.host
    },
    connectionTimeout: config.timeouts.connectionMs,
    greetingTimeout: config.timeouts.greetingMs,
    socketTimeout: config.timeouts.socketMs
  };
}

export function createSMTPTransport(config: SMTPConfig): MailTransport {
  return nodemailer.createTransport(buildTransportOptions(config));
}
