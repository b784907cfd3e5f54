/**
 * Mission -- one assignment given to the player by a character.
 *
 * The deadline is narrative only; nothing enforces it. Status changes are
 * driven from outside the engine (see recordMissionOutcome).
 */

import type { CurrencyKind } from './currency';
import type { Tier, Timestamp } from './common';

export type MissionStatus = 'active' | 'completed' | 'failed';

export interface Mission {
  missionId: string;

  /** Owning player */
  playerId: string;

  title: string;
  description: string;

  /** characterId of the handler who briefs the player */
  giverId: string;

  /** characterId of the target, if any */
  targetId?: string;

  objective: string;
  difficulty: Tier;

  rewardCurrency: CurrencyKind;
  rewardAmount: number;

  /** Free text, e.g. "48 hours" */
  deadline: string;

  status: MissionStatus;

  /** Root story graph, once the story has started */
  storyId?: string;

  createdAt: Timestamp;
  completedAt?: Timestamp;
}
