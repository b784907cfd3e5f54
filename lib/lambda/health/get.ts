import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig } from '../shared/config';
import { successResponse, errorResponse, ErrorCodes } from '../shared/response';

export async function handler(_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const config = loadConfig();
    return successResponse({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'dead-drop',
      model: config.BEDROCK_DEFAULT_MODEL_ID,
    });
  } catch (error) {
    console.error('Health check error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Internal server error',
      ErrorCodes.INTERNAL_ERROR.status
    );
  }
}
