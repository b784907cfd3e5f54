import type { APIGatewayProxyEvent } from 'aws-lambda';

export interface EventInput {
  pathParameters?: Record<string, string>;
  body?: unknown;
  httpMethod?: string;
}

/** A REST API proxy event with only the parts the handlers read filled in. */
export function apiEvent(input: EventInput = {}): APIGatewayProxyEvent {
  const httpMethod = input.httpMethod ?? (input.body === undefined ? 'GET' : 'POST');
  const body = input.body === undefined ? null : typeof input.body === 'string' ? input.body : JSON.stringify(input.body);
  return {
    body,
    headers: { 'Content-Type': 'application/json' },
    multiValueHeaders: {},
    httpMethod,
    isBase64Encoded: false,
    path: '/',
    pathParameters: input.pathParameters ?? null,
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    resource: '/',
    requestContext: {
      accountId: '000000000000',
      apiId: 'test-api',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod,
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
        userArn: null,
      },
      path: '/',
      stage: 'test',
      requestId: 'request-1',
      requestTimeEpoch: 0,
      resourceId: 'resource-1',
      resourcePath: '/',
    },
  };
}
