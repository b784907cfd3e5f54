import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { parseBody, pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

const MergeBodySchema = z.object({
  identityId: z.string().trim().min(1),
});

/**
 * POST /players/{playerId}/merge -- Fold a guest's progress into the
 * authenticated identity's record. The guest record is deleted.
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

    const body = parseBody(event, MergeBodySchema);
    if (!body.ok) {
      return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
    }

    return resultResponse(await getServices().progress.mergeGuestProgress(playerId, body.value.identityId));
  } catch (error) {
    console.error('Merge player error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to merge player progress',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
