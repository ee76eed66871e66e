import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as cloudwatch_actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import { Construct } from 'constructs';
import {
  AlarmConfiguration,
  DEFAULT_METRICS_NAMESPACE,
  getAllAlarms,
} from '../../../src/monitoring/alarms';

export interface CloudWatchStackProps extends cdk.StackProps {
  readonly environmentName: string;
  /** Namespace shared with the service's CLOUDWATCH_NAMESPACE */
  readonly metricsNamespace?: string;
  readonly alarmEmail?: string;
}

const COMPARISON_OPERATORS: Record<AlarmConfiguration['comparisonOperator'], cloudwatch.ComparisonOperator> = {
  GreaterThanThreshold: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
  GreaterThanOrEqualToThreshold: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
  LessThanThreshold: cloudwatch.ComparisonOperator.LESS_THAN_THRESHOLD,
  LessThanOrEqualToThreshold: cloudwatch.ComparisonOperator.LESS_THAN_OR_EQUAL_TO_THRESHOLD,
};

const MISSING_DATA: Record<NonNullable<AlarmConfiguration['treatMissingData']>, cloudwatch.TreatMissingData> = {
  breaching: cloudwatch.TreatMissingData.BREACHING,
  notBreaching: cloudwatch.TreatMissingData.NOT_BREACHING,
  ignore: cloudwatch.TreatMissingData.IGNORE,
  missing: cloudwatch.TreatMissingData.MISSING,
};

/**
 * CloudWatch Monitoring Stack
 *
 * Creates:
 * - CloudWatch alarms for error count, Bedrock latency and database latency
 * - SNS topic for alarm notifications
 * - CloudWatch dashboard for the service metrics
 */
export class CloudWatchStack extends cdk.Stack {
  public readonly alarmTopic: sns.Topic;
  public readonly dashboard: cloudwatch.Dashboard;
  public readonly alarms: cloudwatch.Alarm[];

  constructor(scope: Construct, id: string, props: CloudWatchStackProps) {
    super(scope, id, props);

    const namespace = props.metricsNamespace ?? DEFAULT_METRICS_NAMESPACE;

    // Create SNS Topic for alarm notifications
    this.alarmTopic = new sns.Topic(this, 'AlarmTopic', {
      topicName: `${props.environmentName}-feedback-analyzer-alarms`,
      displayName: 'Feedback Analyzer Alarms',
    });

    // Subscribe email to alarm topic if provided
    if (props.alarmEmail) {
      this.alarmTopic.addSubscription(
        new cdk.aws_sns_subscriptions.EmailSubscription(props.alarmEmail)
      );
    }

    this.alarms = getAllAlarms(namespace).map((config) =>
      this.createAlarm(props.environmentName, config)
    );

    this.dashboard = new cloudwatch.Dashboard(this, 'FeedbackDashboard', {
      dashboardName: `${props.environmentName}-feedback-analyzer`,
    });
    this.createDashboardWidgets(namespace);

    new cdk.CfnOutput(this, 'AlarmTopicArn', {
      value: this.alarmTopic.topicArn,
      description: 'SNS Alarm Topic ARN',
      exportName: `${props.environmentName}-AlarmTopicArn`,
    });

    new cdk.CfnOutput(this, 'DashboardUrl', {
      value: `https://console.aws.amazon.com/cloudwatch/home?region=${cdk.Stack.of(this).region}#dashboards:name=${this.dashboard.dashboardName}`,
      description: 'CloudWatch Dashboard URL',
    });

    // Tag all resources
    cdk.Tags.of(this).add('Environment', props.environmentName);
    cdk.Tags.of(this).add('Project', 'FeedbackAnalyzer');
    cdk.Tags.of(this).add('ManagedBy', 'CDK');
  }

  private createAlarm(environmentName: string, config: AlarmConfiguration): cloudwatch.Alarm {
    const alarm = new cloudwatch.Alarm(this, `${config.metricName}Alarm`, {
      alarmName: `${environmentName}-${config.alarmName}`,
      alarmDescription: config.alarmDescription,
      metric: new cloudwatch.Metric({
        namespace: config.namespace,
        metricName: config.metricName,
        statistic: config.statistic,
        period: cdk.Duration.seconds(config.period),
        ...(config.dimensions ? { dimensionsMap: config.dimensions } : {}),
      }),
      threshold: config.threshold,
      evaluationPeriods: config.evaluationPeriods,
      comparisonOperator: COMPARISON_OPERATORS[config.comparisonOperator],
      treatMissingData: MISSING_DATA[config.treatMissingData ?? 'missing'],
    });
    alarm.addAlarmAction(new cloudwatch_actions.SnsAction(this.alarmTopic));
    return alarm;
  }

  private createDashboardWidgets(namespace: string): void {
    const metric = (metricName: string, statistic: string): cloudwatch.Metric =>
      new cloudwatch.Metric({ namespace, metricName, statistic });

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Analysis Requests',
        left: [metric('AnalysisRequested', 'Sum')],
        width: 12,
      }),
      new cloudwatch.GraphWidget({
        title: 'Errors',
        left: [metric('ErrorRate', 'Sum')],
        width: 12,
      })
    );

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: 'Latency Metrics',
        left: [metric('BedrockLatency', 'p95'), metric('DatabaseLatency', 'p95')],
        width: 24,
      })
    );
  }
}
