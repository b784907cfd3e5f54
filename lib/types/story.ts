/**
 * Story graph types.
 *
 * A StoryGeneration is the generation context (setting, style, mood,
 * conflict) that owns a tree of StoryNodes. Each node carries up to three
 * priced StoryChoices; a choice's next node is resolved lazily on first
 * selection and then fixed for good.
 */

import type { CurrencyAmounts } from './currency';
import type { Tier, Timestamp } from './common';

export interface StoryGeneration {
  storyId: string;
  primaryConflict: string;
  setting: string;
  narrativeStyle: string;
  mood: string;

  /** Characters used, player profile and the validated generator response */
  generatedStory: Record<string, unknown>;

  /** The opening node, once it exists */
  rootNodeId?: string;

  createdAt: Timestamp;
}

export type NodeType = 'opening' | 'continuation' | 'custom_response';

export interface BranchMetadata {
  missionId?: string;
  nodeType: NodeType;
  charactersPresent?: string[];

  /** nodeIds from the story root down to this node's parent */
  ancestry: string[];

  generation?: {
    narrativeStyle?: string;
    mood?: string;
    generatedAt: Timestamp;
  };
}

export interface StoryNode {
  nodeId: string;
  storyId: string;
  narrativeText: string;
  characterId?: string;

  /** Set by content, never computed */
  isTerminal: boolean;

  parentNodeId?: string;
  branchMetadata: BranchMetadata;
  createdAt: Timestamp;
}

export interface ChoiceMetadata {
  /** The tier the cost was drawn from */
  tier: Tier;

  /** Risk level exactly as the generator declared it (may be off-scale) */
  riskLevel: string;

  characterUsed: string;
  consequence?: string;
  nextNodeSummary?: string;
  aiGenerated: boolean;
}

export interface StoryChoice {
  choiceId: string;

  /** The node this choice branches from */
  nodeId: string;

  choiceText: string;

  /** Empty means free */
  currencyRequirements: CurrencyAmounts;

  /** Single-assignment: absent until first resolution, then immutable */
  nextNodeId?: string;

  choiceMetadata: ChoiceMetadata;
  createdAt: Timestamp;
}
