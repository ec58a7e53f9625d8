// API Gateway integration Lambda for centralized routing
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { ConfigurationError } from '../../shared/utils/error-handling';
import { CORS_HEADERS, createErrorResponse, createSuccessResponse } from '../../shared/utils/responses';
import { createQuoteSenderHandler, getDefaultDispatcher, type QuoteDispatcher } from '../quote-sender';
import { createQuoteValidatorHandler } from '../quote-validator';

export const SERVICE_NAME = 'quote-dispatch-service';
export const SERVICE_VERSION = '1.0.0';

type LambdaHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

export interface RouterDependencies {
  getDispatcher: () => Promise<QuoteDispatcher>;
  validateQuote: LambdaHandler;
  sendQuote: LambdaHandler;
}

/**
 * Handle CORS preflight requests
 */
function handleCorsPreflightRequest(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: CORS_HEADERS,
    body: ''
  };
}

/**
 * Extract request metadata for logging
 */
function extractRequestMetadata(event: APIGatewayProxyEvent) {
  return {
    method: event.httpMethod,
    path: event.path,
    userAgent: event.headers?.['User-Agent'] || event.headers?.['user-agent'],
    sourceIp: event.requestContext?.identity?.sourceIp,
    requestId: event.requestContext?.requestId,
    stage: event.requestContext?.stage
  };
}

/**
 * Validate request content type for POST requests
 */
function validateContentType(event: APIGatewayProxyEvent): boolean {
  if (event.httpMethod === 'GET' || event.httpMethod === 'OPTIONS') {
    return true;
  }

  const contentType = event.headers?.['Content-Type'] || event.headers?.['content-type'];

  // Some clients don't set it
  if (!contentType) {
    return true;
  }

  return contentType.includes('application/json') || contentType.includes('text/plain');
}

const API_DOCS = {
  service: 'Quote Dispatch Service API',
  version: SERVICE_VERSION,
  endpoints: {
    'POST /quote/validate': 'Validate quote form fields and attachments',
    'POST /quote/send': 'Send a quote email with attachments (subject and bodyText, or clientName, totalPremium and language en/el)',
    'GET /quote/rate-limit': 'Current outbound email quota',
    'GET /health': 'Service health check (?smtp=true also verifies the SMTP connection)',
    'GET /api/docs': 'API documentation'
  },
  limits: {
    maxEmailsPerHour: 'MAX_EMAILS_PER_HOUR (default 20)',
    maxPdfSize: 'MAX_PDF_SIZE_MB (default 25)',
    maxImageSize: 'MAX_IMAGE_SIZE_MB (default 10)'
  }
};

/**
 * Builds the router. Dependencies are injectable so that tests never touch SMTP.
 */
export function createApiRouter(dependencies: RouterDependencies): LambdaHandler {
  const { getDispatcher, validateQuote, sendQuote } = dependencies;

  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    const requestMetadata = extractRequestMetadata(event);

    console.log('API Gateway request received', {
      ...requestMetadata,
      queryStringParameters: event.queryStringParameters
    });

    try {
      if (event.httpMethod === 'OPTIONS') {
        return handleCorsPreflightRequest();
      }

      if (!validateContentType(event)) {
        return createErrorResponse(
          400,
          'Invalid Content Type',
          'Unsupported content type',
          'Please use application/json content type for requests with body',
          requestMetadata.requestId
        );
      }

      const path = event.path;
      const method = event.httpMethod;

      if (path === '/health' && method === 'GET') {
        const health: Record<string, unknown> = {
          status: 'healthy',
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          region: process.env.AWS_REGION || 'unknown'
        };

        if (event.queryStringParameters?.smtp === 'true') {
          const dispatcher = await getDispatcher();
          const smtpOk = await dispatcher.verifyTransport();
          health.smtp = smtpOk ? 'connected' : 'unavailable';
          if (!smtpOk) {
            health.status = 'degraded';
          }
        }

        return createSuccessResponse(200, health, requestMetadata.requestId);
      }

      if (path === '/api/docs' && method === 'GET') {
        return createSuccessResponse(200, API_DOCS, requestMetadata.requestId);
      }

      if (path === '/quote/validate' && method === 'POST') {
        return await validateQuote(event);
      }

      if (path === '/quote/send' && method === 'POST') {
        return await sendQuote(event);
      }

      if (path === '/quote/rate-limit' && method === 'GET') {
        const dispatcher = await getDispatcher();
        return createSuccessResponse(200, dispatcher.getRateLimitStatus(), requestMetadata.requestId);
      }

      return createErrorResponse(
        404,
        'Not Found',
        `Endpoint not found: ${method} ${path}`,
        undefined,
        requestMetadata.requestId
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (error instanceof ConfigurationError) {
        console.error('Service misconfigured', { ...requestMetadata, error: message });
        return createErrorResponse(503, 'Service Unavailable', error.userMessage, undefined, requestMetadata.requestId);
      }

      console.error('API Gateway error', {
        ...requestMetadata,
        error: message,
        stack: error instanceof Error ? error.stack : undefined
      });

      return createErrorResponse(
        500,
        'Internal Server Error',
        'An unexpected error occurred while processing your request',
        undefined,
        requestMetadata.requestId
      );
    }
  };
}

/**
 * Adds standard headers to every response
 */
export function withApiGatewayMiddleware(handler: LambdaHandler): LambdaHandler {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    const result = await handler(event);

    return {
      ...result,
      headers: {
        ...CORS_HEADERS,
        ...result.headers
      }
    };
  };
}

export const handler = withApiGatewayMiddleware(
  createApiRouter({
    getDispatcher: getDefaultDispatcher,
    validateQuote: createQuoteValidatorHandler(),
    sendQuote: createQuoteSenderHandler()
  })
);
