import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

/**
 * GET /players/{playerId}/choices/{choiceId}/affordable -- Whether the
 * player can pay for a choice, with the price and current balances.
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const playerId = pathParam(event, 'playerId');
    const choiceId = pathParam(event, 'choiceId');
    if (!playerId || !choiceId) {
      return errorResponse(
        ErrorCodes.VALIDATION_ERROR.code,
        'playerId and choiceId path parameters are required',
        ErrorCodes.VALIDATION_ERROR.status,
      );
    }

    return resultResponse(await getServices().progress.canAffordChoice(playerId, choiceId));
  } catch (error) {
    console.error('Currency check error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to check currency',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
