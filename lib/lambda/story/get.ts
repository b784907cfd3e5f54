import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

/**
 * GET /players/{playerId}/story -- The current scene: session state, node
 * text and the priced choices on offer (generated on the first visit to a
 * node), plus the price of a custom action.
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const playerId = pathParam(event, 'playerId');
    if (!playerId) {
      return errorResponse(
        ErrorCodes.VALIDATION_ERROR.code,
        'playerId path parameter is required',
        ErrorCodes.VALIDATION_ERROR.status,
      );
    }

    return resultResponse(await getServices().choices.currentScene(playerId));
  } catch (error) {
    console.error('Get story error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to load story',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
