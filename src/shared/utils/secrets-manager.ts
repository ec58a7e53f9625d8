// AWS Secrets Manager integration for SMTP app-password storage
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from './error-handling';

export interface SMTPCredentials {
  username: string;
  password: string;
  fromAddress: string;
  fromName: string;
}

export const DEFAULT_SMTP_SECRET_NAME = 'quote-engine/smtp';

function readSecretField(secret: unknown, key: string): string {
  if (typeof secret === 'object' && secret !== null && key in secret) {
    const value: unknown = Reflect.get(secret, key);
    if (typeof value === 'string') {
      return value.trim();
    }
  }
  return '';
}

/**
 * Retrieves SMTP credentials from AWS Secrets Manager.
 * The secret is a JSON document with SMTP_USER, SMTP_PASS and optional FROM_EMAIL_ADDRESS / FROM_EMAIL_NAME.
 */
export async function getSMTPCredentialsFromSecretsManager(
  secretName: string = DEFAULT_SMTP_SECRET_NAME,
  region: string = process.env.AWS_REGION || 'eu-central-1'
): Promise<SMTPCredentials> {
  const client = new SecretsManagerClient({ region });

  const response = await client.send(new GetSecretValueCommand({ SecretId: secretName }));

  if (!response.SecretString) {
    throw new ConfigurationError(`Secret ${secretName} has no string value`);
  }

  let secret: unknown;
  try {
    secret = JSON.parse(response.SecretString);
  } catch {
    throw new ConfigurationError(`Secret ${secretName} is not valid JSON`);
  }

  const username = readSecretField(secret, 'SMTP_USER');
  const password = readSecretField(secret, 'SMTP_PASS');

  if (!username || !password) {
    throw new ConfigurationError(`Secret ${secretName} is missing SMTP_USER or SMTP_PASS`);
  }

  return {
    username,
    password,
    fromAddress: readSecretField(secret, 'FROM_EMAIL_ADDRESS') || username,
    fromName: readSecretField(secret, 'FROM_EMAIL_NAME')
  };
}

/**
 * Gets SMTP credentials with fallback to environment variables.
 * Tries Secrets Manager first when USE_SECRETS_MANAGER=true.
 */
export async function getSMTPCredentialsWithFallback(env: NodeJS.ProcessEnv = process.env): Promise<SMTPCredentials> {
  if (env.USE_SECRETS_MANAGER === 'true') {
    try {
      return await getSMTPCredentialsFromSecretsManager(
        env.SMTP_SECRET_NAME || DEFAULT_SMTP_SECRET_NAME,
        env.AWS_REGION || 'eu-central-1'
      );
    } catch (error) {
      console.warn('Failed to get SMTP credentials from Secrets Manager, falling back to environment variables', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  const username = env.SMTP_USER?.trim();
  const password = env.SMTP_PASS;

  if (!username || !password) {
    throw new ConfigurationError(
      'Missing SMTP credentials. Configure SMTP_USER and SMTP_PASS or store them in Secrets Manager.'
    );
  }

  return {
    username,
    password,
    fromAddress: env.FROM_EMAIL_ADDRESS?.trim() || username,
    fromName: env.FROM_EMAIL_NAME?.trim() || ''
  };
}
