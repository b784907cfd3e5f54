import type { Character } from '../types/character';
import type { CurrencyAmounts } from '../types/currency';
import type { ChoiceHistoryEntry, PlayerProgress, SessionState } from '../types/player';
import type { StoryChoice, StoryNode } from '../types/story';
import { fail, ok, type GameResult } from '../types/result';
import { createUnitOfWork, storedVersion, type GameStore, type UnitOfWork } from '../lambda/shared/store';
import { generationFailure, type ContentGateway } from './gateway';
import { canAfford, debit, describeChoice, ledgerEntries } from './ledger';
import { childBranchMetadata, type NarrativeGraph } from './narrative-graph';
import { commitUnit, guarded } from './persistence';
import type { PlayerLocks } from './player-lock';
import { sample, type Runtime } from './runtime';
import { CUSTOM_CHOICE_COST } from './tiers';

/** Characters offered to the generator as flavor for new choices. */
export const CHOICE_CHARACTER_SAMPLE = 6;

/** Longest custom action accepted. */
export const MAX_CUSTOM_TEXT_LENGTH = 500;

export interface ChoiceResolution {
  node: StoryNode;
  progress: PlayerProgress;
  /** What this call debited; empty for a replay */
  charged: CurrencyAmounts;
  /** True when the request repeated the last resolved choice */
  replayed: boolean;
  /** True when the next node already existed */
  fromCache: boolean;
}

export interface Scene {
  session: SessionState;
  progress: PlayerProgress;
  node: StoryNode | null;
  choices: StoryChoice[];
  customChoiceCost: CurrencyAmounts;
}

/** Where a player stands, from their record and the node it points at. */
export function describeSession(progress: PlayerProgress, currentNode: StoryNode | null): SessionState {
  if (progress.currentNodeId) {
    const position = { nodeId: progress.currentNodeId, storyId: progress.currentStoryId };
    return currentNode?.isTerminal ? { state: 'TERMINAL', ...position } : { state: 'IN_STORY', ...position };
  }
  if (progress.activeMissions.length > 0) {
    return { state: 'MISSION_OFFERED', missionIds: progress.activeMissions };
  }
  return { state: 'NO_MISSION' };
}

/**
 * Choice Resolution Engine
 *
 * Spends currency to move a player along a story. Charge, history, position
 * and any newly generated node land in one commit; when generation or the
 * commit fails, the player's record and ledger are exactly as they were.
 *
 * A catalog choice's next node is generated on first use and shared by
 * everyone who picks it afterwards. Custom actions always generate a fresh
 * node and are never cached.
 */
export class ChoiceEngine {
  constructor(
    private readonly store: GameStore,
    private readonly gateway: ContentGateway,
    private readonly graph: NarrativeGraph,
    private readonly locks: PlayerLocks,
    private readonly runtime: Runtime,
  ) {}

  resolveChoice(playerId: string, choiceId: string): Promise<GameResult<ChoiceResolution>> {
    return this.locks.withLock(playerId, () =>
      guarded<ChoiceResolution>('resolveChoice', async () => {
        const progress = await this.store.getProgress(playerId);
        if (!progress) return fail('NotFound', `Player ${playerId} not found`);

        const found = await this.graph.getChoice(choiceId);
        if (!found.success) return found;
        const choice = found.data;

        // A repeat of the choice that produced the current position
        const last = progress.choiceHistory.at(-1);
        if (choice.nextNodeId && choice.nextNodeId === progress.currentNodeId && last?.choiceId === choiceId) {
          const node = await this.graph.getNode(choice.nextNodeId);
          if (!node.success) return node;
          return ok({ node: node.data, progress, charged: {}, replayed: true, fromCache: true });
        }

        const current = await this.currentNode(progress);
        if (!current.success) return current;
        const node = current.data;

        if (choice.nodeId !== node.nodeId) {
          return fail('InvalidRequest', `Choice ${choiceId} is not available from the current node`);
        }

        const cost = choice.currencyRequirements;
        if (!canAfford(progress.currencyBalances, cost)) {
          return declined(playerId, cost, choiceId);
        }

        const unit = createUnitOfWork();
        const now = this.runtime.now();
        let next: StoryNode;
        let fromCache: boolean;

        const resolution = this.graph.resolveNextNode(choice);
        if (resolution.status === 'cached') {
          const cached = await this.graph.getNode(resolution.nodeId);
          if (!cached.success) return cached;
          next = cached.data;
          fromCache = true;
        } else {
          const generated = await this.gateway.generateContinuation({
            kind: 'continuation',
            previousNarrative: node.narrativeText,
            action: choice.choiceText,
            character: await this.characterOf(node),
            gameState: progress.gameState,
          });
          if (!generated.ok) return generationFailure(generated.error);

          next = this.graph.createNode(unit, {
            storyId: node.storyId,
            narrativeText: generated.data.narrative_text,
            characterId: node.characterId,
            parentNodeId: node.nodeId,
            branchMetadata: childBranchMetadata(node, 'continuation', now.toISOString()),
          });
          this.graph.memoizeNextNode(unit, choice, next.nodeId);
          fromCache = false;
        }

        const entry: ChoiceHistoryEntry = {
          choiceId,
          choiceText: choice.choiceText,
          nodeId: node.nodeId,
          timestamp: now.toISOString(),
          custom: false,
        };
        unit.transactions.push(
          ...ledgerEntries({
            playerId,
            transactionType: 'choice',
            amounts: cost,
            description: describeChoice('Choice', choice.choiceText),
            storyNodeId: node.nodeId,
            now,
            newId: this.runtime.newId,
          }),
        );

        return this.advance(unit, progress, next, cost, entry, fromCache, 'resolveChoice');
      }),
    );
  }

  /** A free-text action priced at CUSTOM_CHOICE_COST. */
  resolveCustomChoice(playerId: string, customText: string): Promise<GameResult<ChoiceResolution>> {
    const text = customText.trim();
    if (!text) {
      return Promise.resolve(fail('InvalidRequest', 'Custom action text is required'));
    }
    if (text.length > MAX_CUSTOM_TEXT_LENGTH) {
      return Promise.resolve(
        fail('InvalidRequest', `Custom action text must be at most ${MAX_CUSTOM_TEXT_LENGTH} characters`),
      );
    }

    return this.locks.withLock(playerId, () =>
      guarded<ChoiceResolution>('resolveCustomChoice', async () => {
        const progress = await this.store.getProgress(playerId);
        if (!progress) return fail('NotFound', `Player ${playerId} not found`);

        const current = await this.currentNode(progress);
        if (!current.success) return current;
        const node = current.data;

        const cost = CUSTOM_CHOICE_COST;
        if (!canAfford(progress.currencyBalances, cost)) {
          return declined(playerId, cost);
        }

        const generated = await this.gateway.generateCustomResponse({
          kind: 'customResponse',
          currentNarrative: node.narrativeText,
          customAction: text,
          character: await this.characterOf(node),
          gameState: progress.gameState,
        });
        if (!generated.ok) return generationFailure(generated.error);

        const now = this.runtime.now();
        const unit = createUnitOfWork();
        const next = this.graph.createNode(unit, {
          storyId: node.storyId,
          narrativeText: generated.data.narrative_text,
          characterId: node.characterId,
          parentNodeId: node.nodeId,
          branchMetadata: childBranchMetadata(node, 'custom_response', now.toISOString()),
        });

        unit.transactions.push(
          ...ledgerEntries({
            playerId,
            transactionType: 'custom_choice',
            amounts: cost,
            description: describeChoice('Custom action', text),
            storyNodeId: node.nodeId,
            now,
            newId: this.runtime.newId,
          }),
        );

        const entry: ChoiceHistoryEntry = {
          choiceText: text,
          nodeId: node.nodeId,
          timestamp: now.toISOString(),
          custom: true,
        };
        return this.advance(unit, progress, next, cost, entry, false, 'resolveCustomChoice');
      }),
    );
  }

  /**
   * The choices offered at a node, generating and pricing three on the first
   * visit. Terminal nodes offer none.
   */
  generateChoicesForNode(playerId: string, nodeId: string): Promise<GameResult<StoryChoice[]>> {
    // Keyed on the node: two players arriving together must not both generate
    return this.locks.withLock(`node:${nodeId}`, () =>
      guarded<StoryChoice[]>('generateChoicesForNode', async () => {
        const found = await this.graph.getNode(nodeId);
        if (!found.success) return found;
        const node = found.data;

        const existing = await this.graph.listChoices(nodeId);
        if (existing.length > 0 || node.isTerminal) return ok(existing);

        const progress = await this.store.getProgress(playerId);
        const pool = sample(await this.store.listCharacters(), CHOICE_CHARACTER_SAMPLE, this.runtime.random);

        const generated = await this.gateway.generateChoices({
          kind: 'choices',
          narrative: node.narrativeText,
          character: await this.characterOf(node),
          gameState: progress?.gameState ?? {},
          availableCharacters: pool,
        });
        if (!generated.ok) return generationFailure(generated.error);

        const unit = createUnitOfWork();
        const choices = this.graph.attachChoices(
          unit,
          nodeId,
          generated.data.choices.map((c) => ({
            text: c.text,
            riskLevel: c.risk_level,
            characterUsed: c.character_used,
            consequence: c.consequence,
          })),
        );

        const committed = await commitUnit(this.store, unit, 'generateChoicesForNode', playerId);
        if (!committed.success) return committed;
        return ok(choices);
      }),
    );
  }

  /** The player's session state, current node and its choices. */
  currentScene(playerId: string): Promise<GameResult<Scene>> {
    return guarded<Scene>('currentScene', async () => {
      const progress = await this.store.getProgress(playerId);
      if (!progress) return fail('NotFound', `Player ${playerId} not found`);

      const node = progress.currentNodeId ? await this.store.getNode(progress.currentNodeId) : null;
      let choices: StoryChoice[] = [];
      if (node) {
        const offered = await this.generateChoicesForNode(playerId, node.nodeId);
        if (!offered.success) return offered;
        choices = offered.data;
      }

      return ok({
        session: describeSession(progress, node),
        progress,
        node,
        choices,
        customChoiceCost: CUSTOM_CHOICE_COST,
      });
    });
  }

  // ============================================
  // Helpers
  // ============================================

  /** The node the player stands on, if play is possible from it. */
  private async currentNode(progress: PlayerProgress): Promise<GameResult<StoryNode>> {
    if (!progress.currentNodeId) {
      return fail('InvalidRequest', 'No story in progress; start a mission first');
    }
    const node = await this.graph.getNode(progress.currentNodeId);
    if (!node.success) return node;
    if (node.data.isTerminal) {
      return fail('InvalidRequest', 'The story has ended; no further choices can be made');
    }
    return node;
  }

  private async characterOf(node: StoryNode): Promise<Character | undefined> {
    if (!node.characterId) return undefined;
    return (await this.store.getCharacter(node.characterId)) ?? undefined;
  }

  /** Stages the debited, advanced record and commits the whole unit. */
  private async advance(
    unit: UnitOfWork,
    progress: PlayerProgress,
    next: StoryNode,
    cost: CurrencyAmounts,
    entry: ChoiceHistoryEntry,
    fromCache: boolean,
    operation: string,
  ): Promise<GameResult<ChoiceResolution>> {
    const updated: PlayerProgress = {
      ...progress,
      currentNodeId: next.nodeId,
      currentStoryId: next.storyId,
      currencyBalances: debit(progress.currencyBalances, cost),
      choiceHistory: [...progress.choiceHistory, entry],
      updatedAt: entry.timestamp,
    };
    const write = { record: updated, isNew: false };
    unit.progress.push(write);

    const committed = await commitUnit(this.store, unit, operation, progress.playerId);
    if (!committed.success) return committed;

    console.log(
      JSON.stringify({
        event: 'choice_resolved',
        playerId: progress.playerId,
        choiceId: entry.choiceId ?? null,
        custom: entry.custom,
        fromNodeId: entry.nodeId,
        toNodeId: next.nodeId,
        fromCache,
        charged: cost,
      }),
    );
    return ok({
      node: next,
      progress: { ...updated, version: storedVersion(write) },
      charged: cost,
      replayed: false,
      fromCache,
    });
  }
}

function declined<T>(playerId: string, cost: CurrencyAmounts, choiceId?: string): GameResult<T> {
  console.log(
    JSON.stringify({ event: 'choice_declined', playerId, choiceId: choiceId ?? null, reason: 'insufficient_funds', cost }),
  );
  return fail('InsufficientFunds', 'Not enough currency for this choice');
}
