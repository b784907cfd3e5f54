import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { parseBody, pathParam } from '../shared/request';
import { errorResponse, ErrorCodes, resultResponse } from '../shared/response';
import { getServices } from '../shared/services';
import type { MissionPackage } from '../../game/missions';
import type { Mission } from '../../types/mission';

const FullMissionBodySchema = z.object({
  giverId: z.string().min(1),
  targetId: z.string().min(1),
  partnerId: z.string().min(1),
  extraCharacterId: z.string().min(1),
  playerName: z.string().trim().min(1).max(100),
  playerGender: z.string().trim().min(1).max(20),
  narrativeStyle: z.string().max(100).optional(),
  mood: z.string().max(100).optional(),
});

const BriefingBodySchema = z
  .object({
    giverId: z.string().min(1),
  })
  .strict();

const CreateMissionBodySchema = z.union([FullMissionBodySchema, BriefingBodySchema]);

/**
 * POST /players/{playerId}/missions -- Assign a new mission.
 *
 * With the full cast (target, partner, extra character, player profile) the
 * mission is generated together with its opening scene and first choices.
 * With only a giver, a briefing is generated and the story waits for /start.
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

    const body = parseBody(event, CreateMissionBodySchema);
    if (!body.ok) {
      return errorResponse(ErrorCodes.VALIDATION_ERROR.code, body.message, ErrorCodes.VALIDATION_ERROR.status);
    }

    const { missions } = getServices();
    const input = body.value;
    const result = 'targetId' in input
      ? await missions.createMissionWithOpening({ playerId, ...input })
      : await missions.createMission({ playerId, giverId: input.giverId });

    return resultResponse<MissionPackage | Mission>(result, 201);
  } catch (error) {
    console.error('Create mission error:', error);
    return errorResponse(
      ErrorCodes.INTERNAL_ERROR.code,
      'Failed to create mission',
      ErrorCodes.INTERNAL_ERROR.status,
    );
  }
}
