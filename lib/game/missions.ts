import type { Character } from '../types/character';
import type { Tier } from '../types/common';
import { PREMIUM_CURRENCY } from '../types/currency';
import type { Mission } from '../types/mission';
import type { PlayerProgress } from '../types/player';
import type { StoryChoice, StoryGeneration, StoryNode } from '../types/story';
import { fail, ok, type GameResult } from '../types/result';
import { createUnitOfWork, storedVersion, type GameStore, type ProgressWrite } from '../lambda/shared/store';
import { generationFailure, type ContentGateway } from './gateway';
import type { NarrativeGraph } from './narrative-graph';
import { commitUnit, guarded } from './persistence';
import type { PlayerLocks } from './player-lock';
import { newProgress, union } from './progress';
import { randomInt, type Runtime } from './runtime';

export const DEFAULT_NARRATIVE_STYLE = 'Modern Espionage Thriller';
export const DEFAULT_MOOD = 'Action-packed and Suspenseful';
export const DEFAULT_SETTING = 'Various espionage locations';

/** Diamonds awarded for a completed mission, drawn uniformly. */
export const MISSION_REWARD_RANGE = { min: 2, max: 5 } as const;

export interface CreateMissionWithOpeningInput {
  playerId: string;
  giverId: string;
  targetId: string;
  partnerId: string;
  extraCharacterId: string;
  playerName: string;
  playerGender: string;
  narrativeStyle?: string;
  mood?: string;
}

export interface CreateMissionInput {
  playerId: string;
  giverId: string;
}

export interface MissionPackage {
  mission: Mission;
  story: StoryGeneration;
  node: StoryNode;
  choices: StoryChoice[];
}

export interface StartedStory {
  mission: Mission;
  node: StoryNode;
  progress: PlayerProgress;
}

/**
 * Maps a generated difficulty onto the tier scale. Briefings speak
 * easy/medium/hard, full packages low/medium/high; anything else is medium.
 */
export function normalizeDifficulty(raw: string): Tier {
  switch (raw.trim().toLowerCase()) {
    case 'easy':
    case 'low':
      return 'low';
    case 'hard':
    case 'high':
      return 'high';
    default:
      return 'medium';
  }
}

/**
 * Mission Lifecycle Manager
 *
 * Creates missions and the story roots they open onto. Each operation is
 * one commit: the gateway is called before anything is staged for real, and
 * a failed generation or commit leaves no mission, story, node or choice
 * behind.
 */
export class MissionService {
  constructor(
    private readonly store: GameStore,
    private readonly gateway: ContentGateway,
    private readonly graph: NarrativeGraph,
    private readonly locks: PlayerLocks,
    private readonly runtime: Runtime,
  ) {}

  /**
   * Generates a whole mission in one request (briefing, opening scene and
   * three priced choices) and stores it as an active mission with its story
   * root. The player's position does not move until startStory.
   */
  createMissionWithOpening(input: CreateMissionWithOpeningInput): Promise<GameResult<MissionPackage>> {
    return this.locks.withLock(input.playerId, () =>
      guarded<MissionPackage>('createMissionWithOpening', async () => {
        const narrativeStyle = input.narrativeStyle?.trim() || DEFAULT_NARRATIVE_STYLE;
        const mood = input.mood?.trim() || DEFAULT_MOOD;

        const cast = await this.loadCharacters([input.giverId, input.targetId, input.partnerId, input.extraCharacterId]);
        if (!cast.success) return cast;
        const [giver, target, partner, extra] = cast.data;

        const generated = await this.gateway.generateFullMission({
          kind: 'fullMission',
          giver,
          target,
          partner,
          extra,
          player: { name: input.playerName, gender: input.playerGender },
          narrativeStyle,
          mood,
        });
        if (!generated.ok) return generationFailure(generated.error);
        const response = generated.data;

        const now = this.runtime.now();
        const createdAt = now.toISOString();
        const unit = createUnitOfWork();
        const storyId = this.runtime.newId();
        const missionId = this.runtime.newId();

        const node = this.graph.createNode(unit, {
          storyId,
          narrativeText: response.opening_narrative,
          characterId: giver.characterId,
          branchMetadata: {
            missionId,
            nodeType: 'opening',
            charactersPresent: [giver.characterId, partner.characterId],
            ancestry: [],
            generation: {
              narrativeStyle: response.narrative_style ?? narrativeStyle,
              mood: response.mood ?? mood,
              generatedAt: createdAt,
            },
          },
        });

        const choices = this.graph.attachChoices(
          unit,
          node.nodeId,
          response.choices.map((c) => ({
            text: c.text,
            riskLevel: c.risk_level,
            characterUsed: c.character_used,
            nextNodeSummary: c.next_node_summary,
          })),
        );

        const story: StoryGeneration = {
          storyId,
          primaryConflict: response.objective,
          setting: response.setting,
          narrativeStyle: response.narrative_style ?? narrativeStyle,
          mood: response.mood ?? mood,
          generatedStory: {
            characters: {
              giverId: giver.characterId,
              targetId: target.characterId,
              partnerId: partner.characterId,
              extraCharacterId: extra.characterId,
            },
            player: { name: input.playerName, gender: input.playerGender },
            response,
          },
          rootNodeId: node.nodeId,
          createdAt,
        };
        unit.stories.push(story);

        const mission = this.newMission({
          missionId,
          playerId: input.playerId,
          title: response.mission_title,
          description: response.mission_description,
          giverId: giver.characterId,
          targetId: target.characterId,
          objective: response.objective,
          difficulty: normalizeDifficulty(response.difficulty),
          deadline: response.deadline,
          storyId,
          createdAt,
        });
        unit.missions.push(mission);

        const progressWrite = await this.offerMission(input.playerId, missionId, cast.data, now);
        unit.progress.push(progressWrite);

        const committed = await commitUnit(this.store, unit, 'createMissionWithOpening', input.playerId);
        if (!committed.success) return committed;

        logMissionCreated(mission, choices.length);
        return ok({ mission, story, node, choices });
      }),
    );
  }

  /** Briefing-only mission: no story until the player starts it. */
  createMission(input: CreateMissionInput): Promise<GameResult<Mission>> {
    return this.locks.withLock(input.playerId, () =>
      guarded<Mission>('createMission', async () => {
        const cast = await this.loadCharacters([input.giverId]);
        if (!cast.success) return cast;
        const [giver] = cast.data;

        const generated = await this.gateway.generateMissionBriefing({ kind: 'missionBriefing', giver });
        if (!generated.ok) return generationFailure(generated.error);
        const briefing = generated.data;

        const now = this.runtime.now();
        const missionId = this.runtime.newId();
        const mission = this.newMission({
          missionId,
          playerId: input.playerId,
          title: briefing.title,
          description: briefing.description,
          giverId: giver.characterId,
          objective: briefing.objective,
          difficulty: normalizeDifficulty(briefing.difficulty),
          deadline: briefing.deadline,
          createdAt: now.toISOString(),
        });

        const unit = createUnitOfWork();
        unit.missions.push(mission);
        unit.progress.push(await this.offerMission(input.playerId, missionId, [giver], now));

        const committed = await commitUnit(this.store, unit, 'createMission', input.playerId);
        if (!committed.success) return committed;

        logMissionCreated(mission, 0);
        return ok(mission);
      }),
    );
  }

  /**
   * Puts the player at the start of a mission's story. A mission created
   * with its opening reuses that root; otherwise an opening scene is
   * generated and a new story is rooted on it.
   */
  startStory(playerId: string, missionId: string): Promise<GameResult<StartedStory>> {
    return this.locks.withLock(playerId, () =>
      guarded<StartedStory>('startStory', async () => {
        const progress = await this.store.getProgress(playerId);
        if (!progress) return fail('NotFound', `Player ${playerId} not found`);

        const mission = await this.store.getMission(missionId);
        if (!mission || mission.playerId !== playerId) {
          return fail('NotFound', `Mission ${missionId} not found`);
        }
        if (mission.status !== 'active') {
          return fail('InvalidRequest', `Mission ${missionId} is already ${mission.status}`);
        }

        const now = this.runtime.now();
        const createdAt = now.toISOString();
        const unit = createUnitOfWork();

        let node: StoryNode;
        let linkedMission = mission;
        const existing = mission.storyId ? await this.existingRoot(mission.storyId) : null;

        if (existing) {
          node = existing;
        } else {
          const giver = await this.store.getCharacter(mission.giverId);
          const generated = await this.gateway.generateOpening({
            kind: 'opening',
            missionTitle: mission.title,
            missionDescription: mission.description,
            giver: giver ?? undefined,
          });
          if (!generated.ok) return generationFailure(generated.error);

          const storyId = this.runtime.newId();
          node = this.graph.createNode(unit, {
            storyId,
            narrativeText: generated.data.opening_narrative,
            characterId: mission.giverId,
            branchMetadata: {
              missionId,
              nodeType: 'opening',
              charactersPresent: giver ? [giver.characterId] : [],
              ancestry: [],
              generation: {
                narrativeStyle: DEFAULT_NARRATIVE_STYLE,
                mood: DEFAULT_MOOD,
                generatedAt: createdAt,
              },
            },
          });
          unit.stories.push({
            storyId,
            primaryConflict: mission.objective,
            setting: DEFAULT_SETTING,
            narrativeStyle: DEFAULT_NARRATIVE_STYLE,
            mood: DEFAULT_MOOD,
            generatedStory: { missionId, response: generated.data },
            rootNodeId: node.nodeId,
            createdAt,
          });
          linkedMission = { ...mission, storyId };
          unit.missions.push(linkedMission);
        }

        const updated: PlayerProgress = {
          ...progress,
          currentNodeId: node.nodeId,
          currentStoryId: node.storyId,
          encounteredCharacters: union(progress.encounteredCharacters, [mission.giverId]),
          activeMissions: union(progress.activeMissions, [missionId]),
          updatedAt: createdAt,
        };
        const write = { record: updated, isNew: false };
        unit.progress.push(write);

        const committed = await commitUnit(this.store, unit, 'startStory', playerId);
        if (!committed.success) return committed;

        return ok({ mission: linkedMission, node, progress: { ...updated, version: storedVersion(write) } });
      }),
    );
  }

  // ============================================
  // Helpers
  // ============================================

  private async loadCharacters(ids: string[]): Promise<GameResult<Character[]>> {
    const characters: Character[] = [];
    for (const id of ids) {
      const character = await this.store.getCharacter(id);
      if (!character) return fail('NotFound', `Character ${id} not found`);
      characters.push(character);
    }
    return ok(characters);
  }

  private async existingRoot(storyId: string): Promise<StoryNode | null> {
    const story = await this.store.getStory(storyId);
    if (!story?.rootNodeId) return null;
    return this.store.getNode(story.rootNodeId);
  }

  /** Adds the mission to the player's active list, creating the record if needed. */
  private async offerMission(
    playerId: string,
    missionId: string,
    cast: Character[],
    now: Date,
  ): Promise<ProgressWrite> {
    const existing = await this.store.getProgress(playerId);
    const progress = existing ?? newProgress(playerId, now);
    return {
      record: {
        ...progress,
        activeMissions: union(progress.activeMissions, [missionId]),
        encounteredCharacters: union(
          progress.encounteredCharacters,
          cast.map((c) => c.characterId),
        ),
        updatedAt: now.toISOString(),
      },
      isNew: existing === null,
    };
  }

  private newMission(fields: Omit<Mission, 'rewardCurrency' | 'rewardAmount' | 'status'>): Mission {
    return {
      ...fields,
      rewardCurrency: PREMIUM_CURRENCY,
      rewardAmount: randomInt(this.runtime.random, MISSION_REWARD_RANGE.min, MISSION_REWARD_RANGE.max),
      status: 'active',
    };
  }
}

function logMissionCreated(mission: Mission, choiceCount: number): void {
  console.log(
    JSON.stringify({
      event: 'mission_created',
      missionId: mission.missionId,
      playerId: mission.playerId,
      storyId: mission.storyId ?? null,
      difficulty: mission.difficulty,
      rewardAmount: mission.rewardAmount,
      choiceCount,
    }),
  );
}
