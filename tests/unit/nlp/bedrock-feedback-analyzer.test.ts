/**
 * Tests for the Bedrock feedback analyzer
 */

import { BedrockRuntimeClient, ConverseCommand } from '@aws-sdk/client-bedrock-runtime';
import {
  BedrockAnalyzerConfig,
  BedrockFeedbackAnalyzer,
} from '../../../src/nlp/bedrock-feedback-analyzer';
import { buildAnalysisPrompt } from '../../../src/nlp/prompt-builder';
import { AIServiceError, ValidationError } from '../../../src/errors/types';
import { ERROR_CODES } from '../../../src/errors/codes';

const CONFIG: BedrockAnalyzerConfig = {
  region: 'us-east-1',
  modelId: 'amazon.nova-lite-v1:0',
  temperature: 0.7,
  maxTokens: 1000,
  requestTimeoutMs: 0,
  credentials: {
    accessKeyId: 'test-access-key',
    secretAccessKey: 'test-secret',
  },
};

const REPLY = `OVERALL_SENTIMENT: Positive
POSITIVE_HIGHLIGHTS: Great keynote
COMMON_COMPLAINTS: Cold coffee
EXECUTIVE_SUMMARY: A strong launch.`;

function converseReply(text?: string) {
  return {
    $metadata: {},
    output: {
      message: {
        role: 'assistant',
        content: text === undefined ? [] : [{ text }],
      },
    },
    stopReason: 'end_turn',
  };
}

describe('BedrockFeedbackAnalyzer', () => {
  let client: BedrockRuntimeClient;
  let send: jest.SpyInstance;
  let sentCommands: unknown[];

  beforeEach(() => {
    client = new BedrockRuntimeClient(BedrockFeedbackAnalyzer.clientConfig(CONFIG));
    sentCommands = [];
    send = jest.spyOn(client, 'send').mockImplementation(async (command: unknown) => {
      sentCommands.push(command);
      return converseReply(REPLY);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    client.destroy();
  });

  it('parses the model reply into a sentiment result', async () => {
    const analyzer = new BedrockFeedbackAnalyzer(CONFIG, client);

    const result = await analyzer.analyzeFeedback([{ rating: 5, comment: 'Loved it' }]);

    expect(result).toEqual({
      overallSentiment: 'Positive',
      positiveHighlights: 'Great keynote',
      commonComplaints: 'Cold coffee',
      executiveSummary: 'A strong launch.',
    });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('sends the prompt with the configured model and inference settings', async () => {
    const analyzer = new BedrockFeedbackAnalyzer(CONFIG, client);
    const records = [{ rating: 5, comment: 'Great' }, { rating: 3 }];

    await analyzer.analyzeFeedback(records);

    const command = sentCommands[0];
    if (!(command instanceof ConverseCommand)) {
      throw new Error('Expected a ConverseCommand');
    }
    expect(command.input.modelId).toBe('amazon.nova-lite-v1:0');
    expect(command.input.inferenceConfig).toEqual({ maxTokens: 1000, temperature: 0.7 });
    expect(command.input.messages?.[0]?.role).toBe('user');
    expect(command.input.messages?.[0]?.content?.[0]?.text).toBe(buildAnalysisPrompt(records));
  });

  it('rejects an empty batch without calling the model', async () => {
    const analyzer = new BedrockFeedbackAnalyzer(CONFIG, client);

    await expect(analyzer.analyzeFeedback([])).rejects.toBeInstanceOf(ValidationError);
    expect(send).not.toHaveBeenCalled();
  });

  it('reports a failed call as AI service unavailable', async () => {
    send.mockImplementation(async () => {
      throw new Error('Rate exceeded');
    });
    const analyzer = new BedrockFeedbackAnalyzer(CONFIG, client);

    const failure = analyzer.analyzeFeedback([{ rating: 4 }]);

    await expect(failure).rejects.toBeInstanceOf(AIServiceError);
    await expect(failure).rejects.toMatchObject({
      code: ERROR_CODES.AI_SERVICE_UNAVAILABLE,
      message: 'Bedrock API error: Rate exceeded',
      recoverable: true,
    });
  });

  it('treats an empty reply as a reply with every section missing', async () => {
    send.mockImplementation(async () => converseReply());
    const analyzer = new BedrockFeedbackAnalyzer(CONFIG, client);

    const result = await analyzer.analyzeFeedback([{ rating: 2 }]);

    expect(result).toEqual({
      overallSentiment: 'Neutral',
      positiveHighlights: 'No specific highlights mentioned',
      commonComplaints: 'No specific complaints mentioned',
      executiveSummary: 'Analysis completed successfully',
    });
  });

  it('refuses to start without credentials', () => {
    expect(
      () =>
        new BedrockFeedbackAnalyzer(
          { ...CONFIG, credentials: { accessKeyId: '', secretAccessKey: '' } },
          client
        )
    ).toThrow(AIServiceError);
  });

  describe('clientConfig', () => {
    it('disables SDK retries and passes explicit credentials', () => {
      const config = BedrockFeedbackAnalyzer.clientConfig(CONFIG);

      expect(config.maxAttempts).toBe(1);
      expect(config.region).toBe('us-east-1');
      expect(config.credentials).toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
      });
      expect(config.requestHandler).toBeUndefined();
    });

    it('installs a request handler only when a timeout is set', () => {
      const config = BedrockFeedbackAnalyzer.clientConfig({ ...CONFIG, requestTimeoutMs: 5000 });

      expect(config.requestHandler).toBeDefined();
    });

    it('includes the session token when one is configured', () => {
      const config = BedrockFeedbackAnalyzer.clientConfig({
        ...CONFIG,
        credentials: { ...CONFIG.credentials, sessionToken: 'test-token' },
      });

      expect(config.credentials).toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-token',
      });
    });
  });
});
