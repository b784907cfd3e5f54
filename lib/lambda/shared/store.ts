import type { Character } from '../../types/character';
import type { Mission } from '../../types/mission';
import type { PlayerProgress } from '../../types/player';
import type { StoryChoice, StoryGeneration, StoryNode, BranchMetadata } from '../../types/story';
import type { LedgerEntry } from '../../types/transaction';

// ============================================
// Unit of Work
//
// Services stage every write of one logical operation here and hand the
// whole unit to GameStore.commit, which applies it atomically or not at
// all. Nothing is written before commit, so abandoning a unit is the
// rollback.
// ============================================

export interface ProgressWrite {
  /**
   * The record to store. `record.version` is the version the caller read;
   * the store writes `version + 1` and rejects the commit if the stored
   * version has moved on.
   */
  record: PlayerProgress;
  /** True when the record must not exist yet */
  isNew: boolean;
}

/** The version a progress write leaves in the store once committed. */
export function storedVersion(write: ProgressWrite): number {
  return write.isNew ? 1 : write.record.version + 1;
}

export interface ProgressDelete {
  playerId: string;
  expectedVersion: number;
}

export interface Memoization {
  choiceId: string;
  nextNodeId: string;
}

export interface UnitOfWork {
  progress: ProgressWrite[];
  deletedProgress: ProgressDelete[];
  stories: StoryGeneration[];
  missions: Mission[];
  nodes: StoryNode[];
  choices: StoryChoice[];
  memoizations: Memoization[];
  transactions: LedgerEntry[];
}

export function createUnitOfWork(): UnitOfWork {
  return {
    progress: [],
    deletedProgress: [],
    stories: [],
    missions: [],
    nodes: [],
    choices: [],
    memoizations: [],
    transactions: [],
  };
}

export function unitSize(unit: UnitOfWork): number {
  return (
    unit.progress.length +
    unit.deletedProgress.length +
    unit.stories.length +
    unit.missions.length +
    unit.nodes.length +
    unit.choices.length +
    unit.memoizations.length +
    unit.transactions.length
  );
}

// ============================================
// Errors
// ============================================

/**
 * A commit lost a race: a progress record changed since it was read, a
 * record that must be new already exists, or a choice already has a next
 * node. The whole unit was discarded.
 */
export class ConcurrencyConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConcurrencyConflictError';
  }
}

// ============================================
// Store
// ============================================

export interface NodePatch {
  isTerminal?: boolean;
  branchMetadata?: Partial<BranchMetadata>;
}

/**
 * GameStore: persistence for everything the engine reads and writes.
 *
 * Reads return null for missing records. The only multi-record write is
 * commit; patchNode is the single in-place mutation nodes allow.
 */
export interface GameStore {
  getProgress(playerId: string): Promise<PlayerProgress | null>;
  getMission(missionId: string): Promise<Mission | null>;
  getStory(storyId: string): Promise<StoryGeneration | null>;
  getNode(nodeId: string): Promise<StoryNode | null>;
  getChoice(choiceId: string): Promise<StoryChoice | null>;
  /** Choices branching from a node, in creation order */
  listChoices(nodeId: string): Promise<StoryChoice[]>;
  getCharacter(characterId: string): Promise<Character | null>;
  listCharacters(): Promise<Character[]>;
  /** A player's ledger, oldest first */
  listTransactions(playerId: string): Promise<LedgerEntry[]>;
  patchNode(nodeId: string, patch: NodePatch): Promise<StoryNode | null>;
  commit(unit: UnitOfWork): Promise<void>;
}
