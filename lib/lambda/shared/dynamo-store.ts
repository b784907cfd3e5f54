import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  TransactWriteCommand,
  type DynamoDBDocumentClient,
  type QueryCommandInput,
  type TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import type { Character } from '../../types/character';
import type { Mission } from '../../types/mission';
import type { PlayerProgress } from '../../types/player';
import type { StoryChoice, StoryGeneration, StoryNode } from '../../types/story';
import type { LedgerEntry } from '../../types/transaction';
import { normalizeBalances } from '../../game/ledger';
import { CHOICES_BY_NODE_INDEX, type AppConfig } from './config';
import {
  ConcurrencyConflictError,
  storedVersion,
  unitSize,
  type GameStore,
  type NodePatch,
  type UnitOfWork,
} from './store';

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

/** DynamoDB caps a single TransactWriteItems call at 100 actions. */
const MAX_TRANSACT_ITEMS = 100;

export type TableNames = Pick<
  AppConfig,
  | 'PLAYERS_TABLE_NAME'
  | 'MISSIONS_TABLE_NAME'
  | 'STORIES_TABLE_NAME'
  | 'NODES_TABLE_NAME'
  | 'CHOICES_TABLE_NAME'
  | 'CHARACTERS_TABLE_NAME'
  | 'TRANSACTIONS_TABLE_NAME'
>;

/**
 * GameStore backed by one DynamoDB table per record type.
 *
 * commit() maps a unit of work onto a single TransactWriteItems call, so
 * either every staged record lands or none does. Progress writes carry a
 * version condition; memoizations carry attribute_not_exists(nextNodeId).
 */
export class DynamoGameStore implements GameStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tables: TableNames,
  ) {}

  async getProgress(playerId: string): Promise<PlayerProgress | null> {
    const item = await this.getItem(this.tables.PLAYERS_TABLE_NAME, { playerId }, true);
    if (!item) return null;
    const progress = fromItem<PlayerProgress>(item);
    return { ...progress, currencyBalances: normalizeBalances(item.currencyBalances) };
  }

  async getMission(missionId: string): Promise<Mission | null> {
    const item = await this.getItem(this.tables.MISSIONS_TABLE_NAME, { missionId });
    return item ? fromItem<Mission>(item) : null;
  }

  async getStory(storyId: string): Promise<StoryGeneration | null> {
    const item = await this.getItem(this.tables.STORIES_TABLE_NAME, { storyId });
    return item ? fromItem<StoryGeneration>(item) : null;
  }

  async getNode(nodeId: string): Promise<StoryNode | null> {
    const item = await this.getItem(this.tables.NODES_TABLE_NAME, { nodeId });
    return item ? fromItem<StoryNode>(item) : null;
  }

  async getChoice(choiceId: string): Promise<StoryChoice | null> {
    const item = await this.getItem(this.tables.CHOICES_TABLE_NAME, { choiceId }, true);
    return item ? fromItem<StoryChoice>(item) : null;
  }

  async listChoices(nodeId: string): Promise<StoryChoice[]> {
    const items = await this.queryAll({
      TableName: this.tables.CHOICES_TABLE_NAME,
      IndexName: CHOICES_BY_NODE_INDEX,
      KeyConditionExpression: 'nodeId = :nodeId',
      ExpressionAttributeValues: { ':nodeId': nodeId },
    });
    return items
      .map((item) => fromItem<StoryChoice>(item))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async getCharacter(characterId: string): Promise<Character | null> {
    const item = await this.getItem(this.tables.CHARACTERS_TABLE_NAME, { characterId });
    return item ? fromItem<Character>(item) : null;
  }

  async listCharacters(): Promise<Character[]> {
    const characters: Character[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.client.send(
        new ScanCommand({
          TableName: this.tables.CHARACTERS_TABLE_NAME,
          ExclusiveStartKey: startKey,
        }),
      );
      for (const item of page.Items ?? []) characters.push(fromItem<Character>(item));
      startKey = page.LastEvaluatedKey;
    } while (startKey);
    return characters;
  }

  async listTransactions(playerId: string): Promise<LedgerEntry[]> {
    const items = await this.queryAll({
      TableName: this.tables.TRANSACTIONS_TABLE_NAME,
      KeyConditionExpression: 'playerId = :playerId',
      ExpressionAttributeValues: { ':playerId': playerId },
      ScanIndexForward: true,
    });
    return items.map((item) => fromItem<LedgerEntry>(item));
  }

  async patchNode(nodeId: string, patch: NodePatch): Promise<StoryNode | null> {
    const node = await this.getNode(nodeId);
    if (!node) return null;

    const patched: StoryNode = {
      ...node,
      isTerminal: patch.isTerminal ?? node.isTerminal,
      branchMetadata: { ...node.branchMetadata, ...patch.branchMetadata },
    };

    await this.client.send(
      new PutCommand({
        TableName: this.tables.NODES_TABLE_NAME,
        Item: patched,
        ConditionExpression: 'attribute_exists(nodeId)',
      }),
    );
    return patched;
  }

  async commit(unit: UnitOfWork): Promise<void> {
    const size = unitSize(unit);
    if (size === 0) return;
    if (size > MAX_TRANSACT_ITEMS) {
      throw new Error(`Unit of work has ${size} writes; DynamoDB transactions allow ${MAX_TRANSACT_ITEMS}`);
    }

    try {
      await this.client.send(new TransactWriteCommand({ TransactItems: this.toTransactItems(unit) }));
    } catch (err) {
      if (err instanceof TransactionCanceledException) {
        const codes = (err.CancellationReasons ?? []).map((r) => r.Code ?? 'None');
        if (codes.includes('ConditionalCheckFailed')) {
          throw new ConcurrencyConflictError(`Commit rejected by a condition check (reasons: ${codes.join(', ')})`);
        }
      }
      throw err;
    }
  }

  // ============================================
  // Helpers
  // ============================================

  /** Progress and choice reads are strongly consistent so a retry right after a commit sees it. */
  private async getItem(
    tableName: string,
    key: Record<string, string>,
    consistentRead = false,
  ): Promise<Record<string, unknown> | undefined> {
    const result = await this.client.send(
      new GetCommand({ TableName: tableName, Key: key, ConsistentRead: consistentRead }),
    );
    return result.Item;
  }

  /** Every page of a query. */
  private async queryAll(input: QueryCommandInput): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.client.send(new QueryCommand({ ...input, ExclusiveStartKey: startKey }));
      items.push(...(page.Items ?? []));
      startKey = page.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  private toTransactItems(unit: UnitOfWork): TransactItem[] {
    const items: TransactItem[] = [];

    for (const write of unit.progress) {
      const { record, isNew } = write;
      const stored: PlayerProgress = { ...record, version: storedVersion(write) };
      items.push({
        Put: isNew
          ? {
              TableName: this.tables.PLAYERS_TABLE_NAME,
              Item: stored,
              ConditionExpression: 'attribute_not_exists(playerId)',
            }
          : {
              TableName: this.tables.PLAYERS_TABLE_NAME,
              Item: stored,
              ConditionExpression: '#version = :expected',
              ExpressionAttributeNames: { '#version': 'version' },
              ExpressionAttributeValues: { ':expected': record.version },
            },
      });
    }

    for (const { playerId, expectedVersion } of unit.deletedProgress) {
      items.push({
        Delete: {
          TableName: this.tables.PLAYERS_TABLE_NAME,
          Key: { playerId },
          ConditionExpression: '#version = :expected',
          ExpressionAttributeNames: { '#version': 'version' },
          ExpressionAttributeValues: { ':expected': expectedVersion },
        },
      });
    }

    for (const story of unit.stories) {
      items.push(this.putNew(this.tables.STORIES_TABLE_NAME, story, 'storyId'));
    }
    for (const mission of unit.missions) {
      // Missions are rewritten on status changes, so no existence condition
      items.push({ Put: { TableName: this.tables.MISSIONS_TABLE_NAME, Item: mission } });
    }
    for (const node of unit.nodes) {
      items.push(this.putNew(this.tables.NODES_TABLE_NAME, node, 'nodeId'));
    }
    for (const choice of unit.choices) {
      items.push(this.putNew(this.tables.CHOICES_TABLE_NAME, choice, 'choiceId'));
    }

    for (const { choiceId, nextNodeId } of unit.memoizations) {
      items.push({
        Update: {
          TableName: this.tables.CHOICES_TABLE_NAME,
          Key: { choiceId },
          UpdateExpression: 'SET nextNodeId = :nextNodeId',
          ConditionExpression: 'attribute_exists(choiceId) AND attribute_not_exists(nextNodeId)',
          ExpressionAttributeValues: { ':nextNodeId': nextNodeId },
        },
      });
    }

    for (const entry of unit.transactions) {
      items.push({ Put: { TableName: this.tables.TRANSACTIONS_TABLE_NAME, Item: entry } });
    }

    return items;
  }

  private putNew(tableName: string, item: object, keyName: string): TransactItem {
    return {
      Put: {
        TableName: tableName,
        Item: { ...item },
        ConditionExpression: 'attribute_not_exists(#key)',
        ExpressionAttributeNames: { '#key': keyName },
      },
    };
  }
}

/** Items come back untyped from the document client; the tables only hold what commit() wrote. */
function fromItem<T>(item: Record<string, unknown>): T {
  return item as unknown as T;
}
