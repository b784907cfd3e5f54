import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { parseBody, pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

const OutcomeBodySchema = z.object({
  outcome: z.enum(['completed', 'failed']),
});

/**
 * POST /players/{playerId}/missions/{missionId}/outcome -- Close an active
 * mission. Completion pays the mission reward.
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

    const body = parseBody(event, OutcomeBodySchema);
    if (!body.ok) {
      return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
    }

    return resultResponse(
      await getServices().progress.recordMissionOutcome(playerId, missionId, body.value.outcome),
    );
  } catch (error) {
    console.error('Record mission outcome error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to record mission outcome',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
