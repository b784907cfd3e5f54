import type { Character, PlayerProgress, StoryChoice, StoryNode } from '../../lib/types';
import { loadConfig } from '../../lib/lambda/shared/config';
import { createServices, type Services } from '../../lib/lambda/shared/services';
import type { Runtime } from '../../lib/game/runtime';
import { MemoryGameStore } from './memory-store';
import { ScriptedModel } from './scripted-model';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

/**
 * Fixed clock, ids `id-1`, `id-2`, ... and a random source that cycles
 * through `randomValues`.
 */
export function testRuntime(randomValues: number[] = [0]): Runtime {
  let nextId = 0;
  let nextRandom = 0;
  return {
    now: () => new Date(NOW),
    random: () => {
      const value = randomValues[nextRandom % randomValues.length];
      nextRandom += 1;
      return value;
    },
    newId: () => {
      nextId += 1;
      return `id-${nextId}`;
    },
  };
}

export interface Harness {
  store: MemoryGameStore;
  model: ScriptedModel;
  services: Services;
}

export function createHarness(randomValues?: number[]): Harness {
  const store = new MemoryGameStore().seed({ characters: CHARACTERS });
  const model = new ScriptedModel();
  const services = createServices({
    store,
    model,
    config: loadConfig({}),
    runtime: testRuntime(randomValues),
  });
  return { store, model, services };
}

// ============================================
// Records
// ============================================

export const CHARACTERS: Character[] = [
  {
    characterId: 'char_handler',
    characterName: 'Agent Marlow',
    characterRole: 'mission-giver',
    characterTraits: ['dry', 'precise'],
    description: 'Grey suit, greyer mood',
  },
  {
    characterId: 'char_villain',
    characterName: 'Dr. Vance',
    characterRole: 'villain',
    characterTraits: { smug: '', patient: 'waits years for revenge' },
    backstory: 'Former cryptographer turned arms broker',
  },
  { characterId: 'char_partner', characterName: 'Kit Reyes', characterRole: 'partner' },
  { characterId: 'char_contact', characterName: 'The Florist', characterRole: 'contact', imageUrl: 'https://example.test/florist.png' },
];

export function makeProgress(overrides: Partial<PlayerProgress> = {}): PlayerProgress {
  return {
    playerId: 'player-1',
    level: 1,
    experiencePoints: 0,
    choiceHistory: [],
    encounteredCharacters: [],
    activeMissions: [],
    completedMissions: [],
    failedMissions: [],
    currencyBalances: { '💎': 50, '💵': 50 },
    gameState: {},
    version: 1,
    createdAt: '2026-02-01T00:00:00.000Z',
    updatedAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeNode(overrides: Partial<StoryNode> = {}): StoryNode {
  return {
    nodeId: 'node-1',
    storyId: 'story-1',
    narrativeText: 'Rain on the embassy roof. Marlow slides a folder across the table.',
    characterId: 'char_handler',
    isTerminal: false,
    branchMetadata: {
      missionId: 'mission-1',
      nodeType: 'opening',
      charactersPresent: ['char_handler'],
      ancestry: [],
    },
    createdAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeChoice(overrides: Partial<StoryChoice> = {}): StoryChoice {
  return {
    choiceId: 'choice-1',
    nodeId: 'node-1',
    choiceText: 'Tail the courier through the flower market',
    currencyRequirements: { '💵': 15 },
    choiceMetadata: {
      tier: 'medium',
      riskLevel: 'medium',
      characterUsed: 'Kit Reyes',
      aiGenerated: true,
    },
    createdAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  };
}

// ============================================
// Generator payloads
// ============================================

export function fullMissionPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    mission_title: 'Operation Nightjar',
    mission_description: 'A stolen cipher key is changing hands in Lisbon.',
    objective: 'Recover the cipher key before the auction',
    difficulty: 'high',
    deadline: '36 hours',
    setting: 'Lisbon, the old docks',
    narrative_style: 'Modern Espionage Thriller',
    mood: 'Action-packed and Suspenseful',
    opening_narrative: 'Marlow meets you under the bridge with a folder and a warning.',
    choices: [
      { text: 'Let Kit work the docks', character_used: 'Kit Reyes', risk_level: 'low', next_node_summary: 'Quiet surveillance' },
      { text: 'Ask the Florist for rumours', character_used: 'The Florist', risk_level: 'medium', next_node_summary: 'A tip' },
      { text: 'Break into the warehouse alone', character_used: 'You', risk_level: 'high', next_node_summary: 'Alarms' },
    ],
    ...overrides,
  };
}

export function choicesPayload(riskLevels: string[] = ['low', 'medium', 'high']): Record<string, unknown> {
  return {
    choices: riskLevels.map((risk, i) => ({
      text: `Option ${i + 1}`,
      consequence: `Outcome ${i + 1}`,
      character_used: 'Kit Reyes',
      risk_level: risk,
    })),
  };
}
