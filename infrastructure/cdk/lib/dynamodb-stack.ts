import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import { Construct } from 'constructs';

export interface DynamoDbStackProps extends cdk.StackProps {
  readonly environmentName: string;
  /** Prefix shared with the service's DYNAMODB_TABLE_PREFIX */
  readonly tablePrefix?: string;
}

/**
 * DynamoDB Tables Stack
 *
 * Creates:
 * - forms table keyed by formId
 * - responses table keyed by formId + submissionKey (submission order)
 * - analyses table keyed by formId, one analysis per form
 * - On-demand billing mode for cost optimization
 * - Point-in-time recovery enabled for data protection
 */
export class DynamoDbStack extends cdk.Stack {
  public readonly formsTable: dynamodb.Table;
  public readonly responsesTable: dynamodb.Table;
  public readonly analysesTable: dynamodb.Table;

  constructor(scope: Construct, id: string, props: DynamoDbStackProps) {
    super(scope, id, props);

    const prefix = props.tablePrefix ?? `${props.environmentName}-feedback-`;

    const tableDefaults = {
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST, // On-demand billing
      pointInTimeRecovery: true, // Enable PITR for data protection
      removalPolicy: cdk.RemovalPolicy.RETAIN, // Retain table on stack deletion
      encryption: dynamodb.TableEncryption.DEFAULT,
    };

    this.formsTable = new dynamodb.Table(this, 'FormsTable', {
      tableName: `${prefix}forms`,
      partitionKey: {
        name: 'formId',
        type: dynamodb.AttributeType.STRING,
      },
      ...tableDefaults,
    });

    // Sort key is `<submittedAt>#<responseId>`
    this.responsesTable = new dynamodb.Table(this, 'ResponsesTable', {
      tableName: `${prefix}responses`,
      partitionKey: {
        name: 'formId',
        type: dynamodb.AttributeType.STRING,
      },
      sortKey: {
        name: 'submissionKey',
        type: dynamodb.AttributeType.STRING,
      },
      ...tableDefaults,
    });

    // formId as the only key: a form can hold at most one analysis
    this.analysesTable = new dynamodb.Table(this, 'AnalysesTable', {
      tableName: `${prefix}analyses`,
      partitionKey: {
        name: 'formId',
        type: dynamodb.AttributeType.STRING,
      },
      ...tableDefaults,
    });

    const outputs: Array<[string, dynamodb.Table]> = [
      ['Forms', this.formsTable],
      ['Responses', this.responsesTable],
      ['Analyses', this.analysesTable],
    ];

    for (const [label, table] of outputs) {
      new cdk.CfnOutput(this, `${label}TableName`, {
        value: table.tableName,
        description: `${label} Table Name`,
        exportName: `${props.environmentName}-${label}TableName`,
      });

      new cdk.CfnOutput(this, `${label}TableArn`, {
        value: table.tableArn,
        description: `${label} Table ARN`,
        exportName: `${props.environmentName}-${label}TableArn`,
      });
    }

    // Tag all resources
    cdk.Tags.of(this).add('Environment', props.environmentName);
    cdk.Tags.of(this).add('Project', 'FeedbackAnalyzer');
    cdk.Tags.of(this).add('ManagedBy', 'CDK');
  }
}
