// Byte fixtures and event builders shared by the tests
import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { Attachment } from '../src/shared/models';

export function jpegBytes(size: number = 64): Buffer {
  const bytes = Buffer.alloc(Math.max(size, 4), 0x20);
  bytes.set([0xff, 0xd8, 0xff, 0xe0], 0);
  return bytes;
}

export function pngBytes(size: number = 64): Buffer {
  const bytes = Buffer.alloc(Math.max(size, 8), 0x20);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], 0);
  return bytes;
}

export function webpBytes(): Buffer {
  return Buffer.concat([Buffer.from('RIFF'), Buffer.from([0x24, 0, 0, 0]), Buffer.from('WEBPVP8 '), Buffer.alloc(16)]);
}

export function pdfBytes(pages: number = 1, { withEof = true } = {}): Buffer {
  const kids = Array.from({ length: pages }, (_, index) => `${index + 3} 0 R`).join(' ');
  const pageObjects = Array.from(
    { length: pages },
    (_, index) => `${index + 3} 0 obj\n<< /Type /Page /Parent 2 0 R >>\nendobj\n`
  ).join('');

  const text = [
    '%PDF-1.4\n',
    '1 0 obj\n<< /Type /Catalog /Pages 2 0 R >>\nendobj\n',
    `2 0 obj\n<< /Type /Pages /Kids [${kids}] /Count ${pages} >>\nendobj\n`,
    pageObjects,
    'trailer\n<< /Root 1 0 R >>\n',
    withEof ? '%%EOF\n' : ''
  ].join('');

  return Buffer.from(text, 'latin1');
}

export function makeAttachment(filename: string, kind: Attachment['kind'], bytes: Buffer): Attachment {
  return { filename, kind, bytes, sizeBytes: bytes.length };
}

export function createEvent(overrides: Partial<APIGatewayProxyEvent> = {}): APIGatewayProxyEvent {
  return {
    httpMethod: 'GET',
    path: '/',
    headers: {},
    multiValueHeaders: {},
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    pathParameters: null,
    stageVariables: null,
    body: null,
    isBase64Encoded: false,
    resource: '/',
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod: overrides.httpMethod ?? 'GET',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: 'vitest',
        userArn: null
      },
      path: overrides.path ?? '/',
      stage: 'test',
      requestId: 'test-request-id',
      requestTimeEpoch: 0,
      resourceId: 'test-resource',
      resourcePath: overrides.path ?? '/'
    },
    ...overrides
  };
}

export function parseBody(body: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Expected a JSON object body');
  }
  return Object.fromEntries(Object.entries(parsed));
}
