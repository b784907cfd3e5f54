#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { InfrastructureStack } from '../lib/infrastructure-stack';
import { DeadDropStack } from '../lib/dead-drop-stack';

const app = new cdk.App();

const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION ?? 'us-east-1',
};

// Infrastructure stack: persistent data resources (DynamoDB).
// Rarely changes. Safe to deploy independently.
const infra = new InfrastructureStack(app, 'DeadDropInfraStack', { env });

// Application stack: stateless resources (Lambdas, API Gateway).
// Can be freely torn down and recreated.
new DeadDropStack(app, 'DeadDropStack', {
  env,
  tables: infra.tables,
  modelId: app.node.tryGetContext('modelId'),
  modelOverrides: app.node.tryGetContext('modelOverrides'),
});
