import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { describeSession } from '../../game/choices';
import { pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, gameErrorResponse, successResponse } from '../shared/response';
import { getServices } from '../shared/services';

/**
 * GET /players/{playerId} -- Load a player's progress, creating a fresh
 * record with starting balances on first visit. Includes the session state.
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

    const { progress, graph } = getServices();
    const result = await progress.getOrCreateProgress(playerId);
    if (!result.success) return gameErrorResponse(result.error);

    const record = result.data;
    const node = record.currentNodeId ? await graph.getNode(record.currentNodeId) : null;

    return successResponse({
      progress: record,
      session: describeSession(record, node && node.success ? node.data : null),
    });
  } catch (error) {
    console.error('Get player error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to load player',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
