import * as cdk from 'aws-cdk-lib';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as apigateway from 'aws-cdk-lib/aws-apigateway';
import * as nodejs from 'aws-cdk-lib/aws-lambda-nodejs';
import * as iam from 'aws-cdk-lib/aws-iam';
import { join } from 'path';
import type { GameTables } from './infrastructure-stack';
import type { GenerationModelConfig } from './lambda/shared/generation-schemas';

export interface DeadDropStackProps extends cdk.StackProps {
  tables: GameTables;
  /** Bedrock model id or shortcut used for every generation */
  modelId?: string;
  /** Per-request-kind model ids or shortcuts */
  modelOverrides?: GenerationModelConfig['kinds'];
}

export class DeadDropStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: DeadDropStackProps) {
    super(scope, id, props);

    const { tables } = props;

    // ============================================
    // Lambda Environment Variables
    // ============================================

    const lambdaEnvironment = {
      PLAYERS_TABLE_NAME: tables.players.tableName,
      MISSIONS_TABLE_NAME: tables.missions.tableName,
      STORIES_TABLE_NAME: tables.stories.tableName,
      NODES_TABLE_NAME: tables.nodes.tableName,
      CHOICES_TABLE_NAME: tables.choices.tableName,
      CHARACTERS_TABLE_NAME: tables.characters.tableName,
      TRANSACTIONS_TABLE_NAME: tables.transactions.tableName,
      BEDROCK_DEFAULT_MODEL_ID: props.modelId ?? 'us.anthropic.claude-haiku-4-5-20251001-v1:0',
      BEDROCK_MODEL_OVERRIDES: JSON.stringify(props.modelOverrides ?? {}),
      GENERATION_TIMEOUT_MS: '60000',
    };

    // ============================================
    // Lambda Functions
    // ============================================

    // Common bundling configuration - use esbuild locally (no Docker required)
    const bundlingConfig = {
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'index.handler',
      bundling: {
        minify: false,
        sourceMap: true,
        externalModules: ['@aws-sdk'],
        forceDockerBundling: false,
        format: nodejs.OutputFormat.CJS,
      },
    };

    // Handlers that may call the model get room for one full generation
    const generationLambdaConfig = {
      ...bundlingConfig,
      timeout: cdk.Duration.seconds(90),
      memorySize: 512,
    };

    const fn = (name: string, entry: string, config: nodejs.NodejsFunctionProps = bundlingConfig) =>
      new nodejs.NodejsFunction(this, name, {
        entry: join(__dirname, 'lambda', entry),
        environment: lambdaEnvironment,
        ...config,
      });

    const healthHandler = fn('HealthHandler', 'health/get.ts');
    const getPlayerHandler = fn('GetPlayerHandler', 'players/get.ts');
    const mergePlayerHandler = fn('MergePlayerHandler', 'players/merge.ts');
    const createMissionHandler = fn('CreateMissionHandler', 'missions/create.ts', generationLambdaConfig);
    const startMissionHandler = fn('StartMissionHandler', 'missions/start.ts', generationLambdaConfig);
    const missionOutcomeHandler = fn('MissionOutcomeHandler', 'missions/outcome.ts');
    const getStoryHandler = fn('GetStoryHandler', 'story/get.ts', generationLambdaConfig);
    const resolveChoiceHandler = fn('ResolveChoiceHandler', 'choices/resolve.ts', generationLambdaConfig);
    const affordableHandler = fn('AffordableHandler', 'choices/affordable.ts');

    // ============================================
    // IAM Permissions
    // ============================================

    // Bedrock InvokeModel for all LLM-calling lambdas (includes inference profiles)
    const bedrockPolicy = new iam.PolicyStatement({
      actions: ['bedrock:InvokeModel', 'bedrock:InvokeModelWithResponseStream'],
      resources: [
        'arn:aws:bedrock:*::foundation-model/*',
        `arn:aws:bedrock:*:${this.account}:inference-profile/*`,
        'arn:aws:bedrock:*:*:inference-profile/*',
      ],
    });

    // Marketplace permissions required for auto-enabling model access on first invocation
    const marketplacePolicy = new iam.PolicyStatement({
      actions: ['aws-marketplace:ViewSubscriptions', 'aws-marketplace:Subscribe'],
      resources: ['*'],
    });

    const llmHandlers = [createMissionHandler, startMissionHandler, getStoryHandler, resolveChoiceHandler];
    for (const handler of llmHandlers) {
      handler.addToRolePolicy(bedrockPolicy);
      handler.addToRolePolicy(marketplacePolicy);
    }

    // Game handlers read and commit across every table
    const gameHandlers = [
      getPlayerHandler,
      mergePlayerHandler,
      createMissionHandler,
      startMissionHandler,
      missionOutcomeHandler,
      getStoryHandler,
      resolveChoiceHandler,
      affordableHandler,
    ];
    for (const handler of gameHandlers) {
      for (const table of Object.values(tables)) {
        table.grantReadWriteData(handler);
      }
    }

    // ============================================
    // API Gateway
    // ============================================

    const api = new apigateway.RestApi(this, 'DeadDropApi', {
      restApiName: 'Dead Drop API',
      description: 'API for the Dead Drop espionage story game',
      defaultCorsPreflightOptions: {
        allowOrigins: apigateway.Cors.ALL_ORIGINS,
        allowMethods: apigateway.Cors.ALL_METHODS,
        allowHeaders: ['Content-Type'],
      },
    });

    const health = api.root.addResource('health');
    health.addMethod('GET', new apigateway.LambdaIntegration(healthHandler));

    // /players/{playerId}
    const player = api.root.addResource('players').addResource('{playerId}');
    player.addMethod('GET', new apigateway.LambdaIntegration(getPlayerHandler));
    player.addResource('merge').addMethod('POST', new apigateway.LambdaIntegration(mergePlayerHandler));
    player.addResource('story').addMethod('GET', new apigateway.LambdaIntegration(getStoryHandler));

    // /players/{playerId}/missions
    const missions = player.addResource('missions');
    missions.addMethod('POST', new apigateway.LambdaIntegration(createMissionHandler));
    const mission = missions.addResource('{missionId}');
    mission.addResource('start').addMethod('POST', new apigateway.LambdaIntegration(startMissionHandler));
    mission.addResource('outcome').addMethod('POST', new apigateway.LambdaIntegration(missionOutcomeHandler));

    // /players/{playerId}/choices
    const choices = player.addResource('choices');
    choices.addMethod('POST', new apigateway.LambdaIntegration(resolveChoiceHandler));
    choices
      .addResource('{choiceId}')
      .addResource('affordable')
      .addMethod('GET', new apigateway.LambdaIntegration(affordableHandler));

    // ============================================
    // Outputs
    // ============================================

    new cdk.CfnOutput(this, 'ApiUrl', {
      value: api.url,
      description: 'API Gateway URL',
    });
  }
}
