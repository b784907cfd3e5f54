import type { StoryNode, StoryChoice, BranchMetadata, NodeType } from '../types/story';
import { fail, ok, type GameResult } from '../types/result';
import type { GameStore, NodePatch, UnitOfWork } from '../lambda/shared/store';
import type { Runtime } from './runtime';
import { priceForTier, tierForChoice } from './tiers';

/** A node may offer at most this many stored choices. */
export const MAX_CHOICES_PER_NODE = 3;

export interface NewNode {
  storyId: string;
  narrativeText: string;
  characterId?: string;
  parentNodeId?: string;
  branchMetadata: BranchMetadata;
  isTerminal?: boolean;
}

/** A generated choice before pricing */
export interface ChoiceSpec {
  text: string;
  /** As declared by the generator; may be off-scale */
  riskLevel: string;
  characterUsed: string;
  consequence?: string;
  nextNodeSummary?: string;
}

export type NextNodeResolution =
  | { status: 'cached'; nodeId: string }
  | { status: 'miss' };

/**
 * Narrative Graph Store
 *
 * Nodes and choices of every story tree. New records are staged on a unit
 * of work and only exist once the caller commits it. A choice's next node is
 * assigned once; later resolutions reuse it.
 */
export class NarrativeGraph {
  constructor(
    private readonly store: GameStore,
    private readonly runtime: Runtime,
  ) {}

  createNode(unit: UnitOfWork, input: NewNode): StoryNode {
    const node: StoryNode = {
      nodeId: this.runtime.newId(),
      storyId: input.storyId,
      narrativeText: input.narrativeText,
      characterId: input.characterId,
      isTerminal: input.isTerminal ?? false,
      parentNodeId: input.parentNodeId,
      branchMetadata: input.branchMetadata,
      createdAt: this.runtime.now().toISOString(),
    };
    unit.nodes.push(node);
    return node;
  }

  async getNode(nodeId: string): Promise<GameResult<StoryNode>> {
    const node = await this.store.getNode(nodeId);
    return node ? ok(node) : fail('NotFound', `Story node ${nodeId} not found`);
  }

  async getChoice(choiceId: string): Promise<GameResult<StoryChoice>> {
    const choice = await this.store.getChoice(choiceId);
    return choice ? ok(choice) : fail('NotFound', `Choice ${choiceId} not found`);
  }

  listChoices(nodeId: string): Promise<StoryChoice[]> {
    return this.store.listChoices(nodeId);
  }

  /**
   * Prices and stages up to three choices on a node. The tier comes from the
   * declared risk level, or from position when that is off-scale; the cost
   * is one randomly picked currency of the tier. Specs past the third are
   * dropped.
   */
  attachChoices(unit: UnitOfWork, nodeId: string, specs: ChoiceSpec[]): StoryChoice[] {
    if (specs.length > MAX_CHOICES_PER_NODE) {
      console.warn(
        JSON.stringify({
          event: 'choices_dropped',
          nodeId,
          received: specs.length,
          kept: MAX_CHOICES_PER_NODE,
        }),
      );
    }

    const createdAt = this.runtime.now().toISOString();
    const choices = specs.slice(0, MAX_CHOICES_PER_NODE).map((spec, index): StoryChoice => {
      const tier = tierForChoice(spec.riskLevel, index);
      return {
        choiceId: this.runtime.newId(),
        nodeId,
        choiceText: spec.text,
        currencyRequirements: priceForTier(tier, this.runtime.random),
        choiceMetadata: {
          tier,
          riskLevel: spec.riskLevel,
          characterUsed: spec.characterUsed,
          consequence: spec.consequence,
          nextNodeSummary: spec.nextNodeSummary,
          aiGenerated: true,
        },
        createdAt,
      };
    });

    unit.choices.push(...choices);
    return choices;
  }

  resolveNextNode(choice: StoryChoice): NextNodeResolution {
    return choice.nextNodeId ? { status: 'cached', nodeId: choice.nextNodeId } : { status: 'miss' };
  }

  /**
   * Stages the single assignment of a choice's next node. Throws if the
   * choice already has one; the store rejects the commit if another writer
   * got there first.
   */
  memoizeNextNode(unit: UnitOfWork, choice: StoryChoice, nextNodeId: string): StoryChoice {
    if (choice.nextNodeId) {
      throw new Error(`Choice ${choice.choiceId} already leads to node ${choice.nextNodeId}`);
    }
    unit.memoizations.push({ choiceId: choice.choiceId, nextNodeId });
    return { ...choice, nextNodeId };
  }

  /** The only in-place node mutation: terminal flag and branch metadata. */
  async patchNode(nodeId: string, patch: NodePatch): Promise<GameResult<StoryNode>> {
    const node = await this.store.patchNode(nodeId, patch);
    return node ? ok(node) : fail('NotFound', `Story node ${nodeId} not found`);
  }

  markTerminal(nodeId: string): Promise<GameResult<StoryNode>> {
    return this.patchNode(nodeId, { isTerminal: true });
  }
}

/**
 * Branch metadata for a child of `parent`: mission and cast carry over,
 * ancestry gains the parent.
 */
export function childBranchMetadata(parent: StoryNode, nodeType: NodeType, generatedAt: string): BranchMetadata {
  return {
    missionId: parent.branchMetadata.missionId,
    nodeType,
    charactersPresent: parent.branchMetadata.charactersPresent,
    ancestry: [...parent.branchMetadata.ancestry, parent.nodeId],
    generation: {
      narrativeStyle: parent.branchMetadata.generation?.narrativeStyle,
      mood: parent.branchMetadata.generation?.mood,
      generatedAt,
    },
  };
}
