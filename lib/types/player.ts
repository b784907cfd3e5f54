/**
 * Player progress -- the persistent per-player game record.
 *
 * One record exists per player, guest or authenticated. It is mutated on
 * every resolved choice and merged when a guest session is attached to an
 * authenticated identity.
 */

import type { CurrencyAmounts } from './currency';
import type { Timestamp } from './common';

export interface ChoiceHistoryEntry {
  /** The catalog choice taken; absent for custom actions */
  choiceId?: string;

  /** Choice text, or the player's free text for custom actions */
  choiceText: string;

  /** The node the choice was made from */
  nodeId: string;

  timestamp: Timestamp;

  custom: boolean;
}

export interface PlayerProgress {
  /** Guest UUID or `user_<identityId>` for authenticated players */
  playerId: string;

  /** Link to the authenticated identity, if any */
  authenticatedUserId?: string;

  currentNodeId?: string;
  currentStoryId?: string;

  level: number;
  experiencePoints: number;

  /** Append-only, oldest first */
  choiceHistory: ChoiceHistoryEntry[];

  /** characterIds, each at most once */
  encounteredCharacters: string[];

  activeMissions: string[];
  completedMissions: string[];
  failedMissions: string[];

  /** Never negative */
  currencyBalances: CurrencyAmounts;

  /**
   * Free-form state passed to the content generator as context.
   * The core never interprets it.
   */
  gameState: Record<string, unknown>;

  /** Optimistic-lock counter; incremented on every committed write */
  version: number;

  createdAt: Timestamp;
  updatedAt: Timestamp;
}

/**
 * Where a player is in the game, derived from their progress record.
 */
export type SessionState =
  | { state: 'NO_MISSION' }
  | { state: 'MISSION_OFFERED'; missionIds: string[] }
  | { state: 'IN_STORY'; nodeId: string; storyId?: string }
  | { state: 'TERMINAL'; nodeId: string; storyId?: string };
