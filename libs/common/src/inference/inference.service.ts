import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  ConverseCommand,
  Message,
} from '@aws-sdk/client-bedrock-runtime';

export type ChatRole = 'user' | 'assistant';

export type ChatTurn = {
  role: ChatRole;
  content: Array<{ text: string }>;
};

export type InferenceOptions = {
  maxTokens: number;
  temperature: number;
  topP: number;
};

export type ConverseRequest = {
  modelId: string;
  system: string;
  messages: ChatTurn[];
  inferenceConfig: InferenceOptions;
};

/**
 * Raised for a Bedrock service failure. `clientCorrectable` marks rejections
 * caused by the caller's input (unknown model id, bad inference options).
 */
export class InferenceError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly clientCorrectable: boolean,
  ) {
    super(message);
    this.name = 'InferenceError';
  }
}

const CLIENT_CORRECTABLE = new Set(['ValidationException', 'ResourceNotFoundException']);

@Injectable()
export class InferenceService {
  private readonly logger = new Logger(InferenceService.name);
  private readonly client: BedrockRuntimeClient;
  readonly defaultModelId: string;

  constructor(private readonly configService: ConfigService) {
    const accessKeyId = this.configService.get<string>('aws.accessKeyId', '');
    const secretAccessKey = this.configService.get<string>('aws.secretAccessKey', '');
    const requestTimeout = this.configService.get<number>('bedrock.requestTimeoutMs', 60000);

    this.defaultModelId = this.configService.get<string>(
      'bedrock.modelId',
      'anthropic.claude-3-5-haiku-20241022-v1:0',
    );
    this.client = new BedrockRuntimeClient({
      region: this.configService.get<string>('aws.region', 'us-east-1'),
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      maxAttempts: 1,
      requestHandler: { connectionTimeout: requestTimeout, requestTimeout },
    });
  }

  /**
   * Sends one Converse call and returns the first text block of the reply,
   * or null when the model produced none.
   */
  async converse(request: ConverseRequest, signal?: AbortSignal): Promise<string | null> {
    const messages: Message[] = request.messages.map((turn) => ({
      role: turn.role,
      content: turn.content.map((block) => ({ text: block.text })),
    }));

    this.logger.log(`Calling Bedrock model ${request.modelId} with ${messages.length} messages`);

    try {
      const response = await this.client.send(
        new ConverseCommand({
          modelId: request.modelId,
          messages,
          system: [{ text: request.system }],
          inferenceConfig: request.inferenceConfig,
        }),
        { abortSignal: signal },
      );

      const text = response.output?.message?.content?.find((block) => typeof block.text === 'string')?.text;
      return text ?? null;
    } catch (error) {
      if (error instanceof BedrockRuntimeServiceException) {
        throw new InferenceError(error.name, error.message, CLIENT_CORRECTABLE.has(error.name));
      }
      throw error;
    }
  }
}
