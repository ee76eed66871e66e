#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib';
import { DynamoDbStack } from '../lib/dynamodb-stack';
import { CloudWatchStack } from '../lib/cloudwatch-stack';

/**
 * Feedback Analyzer Infrastructure
 *
 * - DynamoDB tables for forms, responses and analyses
 * - CloudWatch alarms and dashboard over the service metrics
 *
 * Usage (after `npm run build`):
 *   cdk deploy --all
 *
 * Environment Variables:
 *   ENVIRONMENT_NAME: Environment name (dev, staging, prod)
 *   AWS_REGION: AWS region to deploy to
 *   DYNAMODB_TABLE_PREFIX: Table name prefix (default: <environment>-feedback-)
 *   CLOUDWATCH_NAMESPACE: Metrics namespace used by the service
 *   ALARM_EMAIL: Email address for CloudWatch alarms (optional)
 */

const app = new cdk.App();

function contextOrEnv(contextKey: string, envKey: string): string | undefined {
  const fromContext: unknown = app.node.tryGetContext(contextKey);
  if (typeof fromContext === 'string' && fromContext.length > 0) {
    return fromContext;
  }
  return process.env[envKey] || undefined;
}

const environmentName = contextOrEnv('environmentName', 'ENVIRONMENT_NAME') ?? 'dev';
const awsRegion = contextOrEnv('region', 'AWS_REGION') ?? 'us-east-1';
const tablePrefix = contextOrEnv('tablePrefix', 'DYNAMODB_TABLE_PREFIX');
const metricsNamespace = contextOrEnv('metricsNamespace', 'CLOUDWATCH_NAMESPACE');
const alarmEmail = contextOrEnv('alarmEmail', 'ALARM_EMAIL');

const stackProps: cdk.StackProps = {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: awsRegion,
  },
  description: `Feedback Analyzer Infrastructure - ${environmentName}`,
};

new DynamoDbStack(app, `${environmentName}-FeedbackDynamoDbStack`, {
  ...stackProps,
  environmentName,
  ...(tablePrefix ? { tablePrefix } : {}),
});

new CloudWatchStack(app, `${environmentName}-FeedbackCloudWatchStack`, {
  ...stackProps,
  environmentName,
  ...(metricsNamespace ? { metricsNamespace } : {}),
  ...(alarmEmail ? { alarmEmail } : {}),
});

cdk.Tags.of(app).add('Environment', environmentName);
cdk.Tags.of(app).add('Project', 'FeedbackAnalyzer');
cdk.Tags.of(app).add('ManagedBy', 'CDK');

app.synth();
