import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { CHOICES_BY_NODE_INDEX } from './lambda/shared/config';

export interface GameTables {
  players: dynamodb.ITable;
  missions: dynamodb.ITable;
  stories: dynamodb.ITable;
  nodes: dynamodb.ITable;
  choices: dynamodb.ITable;
  characters: dynamodb.ITable;
  transactions: dynamodb.ITable;
}

/**
 * Infrastructure stack -- resources with persistent data that must survive
 * application redeployments.
 *
 * This stack should rarely change. Anything stateless (Lambdas, API Gateway)
 * belongs in the application stack, which can be freely torn down and
 * recreated.
 *
 * Resources here use custom names and RETAIN removal policies so they survive
 * even if the stack is accidentally deleted.
 */
export class InfrastructureStack extends cdk.Stack {
  public readonly tables: GameTables;

  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    // ============================================
    // DynamoDB Tables
    // ============================================

    const table = (name: string, partitionKey: string, sortKey?: string): dynamodb.Table =>
      new dynamodb.Table(this, `${name}Table`, {
        tableName: `DeadDrop-${name}`,
        partitionKey: { name: partitionKey, type: dynamodb.AttributeType.STRING },
        sortKey: sortKey ? { name: sortKey, type: dynamodb.AttributeType.STRING } : undefined,
        billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
        removalPolicy: cdk.RemovalPolicy.RETAIN,
      });

    const choices = table('StoryChoices', 'choiceId');
    choices.addGlobalSecondaryIndex({
      indexName: CHOICES_BY_NODE_INDEX,
      partitionKey: { name: 'nodeId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'createdAt', type: dynamodb.AttributeType.STRING },
      projectionType: dynamodb.ProjectionType.ALL,
    });

    this.tables = {
      players: table('Players', 'playerId'),
      missions: table('Missions', 'missionId'),
      stories: table('Stories', 'storyId'),
      nodes: table('StoryNodes', 'nodeId'),
      choices,
      characters: table('Characters', 'characterId'),
      // Sort key is `<ISO timestamp>#<id>`, so a query returns a player's ledger in order
      transactions: table('Transactions', 'playerId', 'transactionId'),
    };

    // ============================================
    // Outputs
    // ============================================

    for (const [key, t] of Object.entries(this.tables)) {
      new cdk.CfnOutput(this, `${key}TableName`, {
        value: t.tableName,
        description: `DynamoDB ${key} table name`,
        exportName: `DeadDrop-${key}TableName`,
      });
    }
  }
}
