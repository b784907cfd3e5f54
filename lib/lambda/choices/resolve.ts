import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { MAX_CUSTOM_TEXT_LENGTH } from '../../game/choices';
import { parseBody, pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';

const ResolveBodySchema = z.union([
  z.object({ choiceId: z.string().min(1) }),
  z.object({ customText: z.string().trim().min(1).max(MAX_CUSTOM_TEXT_LENGTH) }),
]);

/**
 * POST /players/{playerId}/choices -- Spend currency on a choice.
 *
 * Body is either `{ choiceId }` for one of the offered choices or
 * `{ customText }` for a free-text action.
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

    const body = parseBody(event, ResolveBodySchema);
    if (!body.ok) {
      return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
    }

    const { choices } = getServices();
    const input = body.value;
    const result = 'choiceId' in input
      ? await choices.resolveChoice(playerId, input.choiceId)
      : await choices.resolveCustomChoice(playerId, input.customText);

    return resultResponse(result);
  } catch (error) {
    console.error('Resolve choice error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to resolve choice',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
