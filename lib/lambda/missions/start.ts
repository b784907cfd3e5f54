import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

/**
 * POST /players/{playerId}/missions/{missionId}/start -- Accept a mission
 * and move the player to its opening scene.
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const playerId = pathParam(event, 'playerId');
    const missionId = pathParam(event, 'missionId');
    if (!playerId || !missionId) {
      return errorResponse(
        ErrorCodes.VALIDATION_ERROR.code,
        'playerId and missionId path parameters are required',
        ErrorCodes.VALIDATION_ERROR.status,
      );
    }

    return resultResponse(await getServices().missions.startStory(playerId, missionId));
  } catch (error) {
    console.error('Start mission error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to start mission',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
