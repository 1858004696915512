import {
  BadRequestException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import {
  ChatTurn,
  DatabaseService,
  errorMessage,
  formatDateTime,
  InferenceError,
  InferenceOptions,
  InferenceService,
  TranscriptStorageService,
} from '../../libs/common';
import { CHUNK_COLUMNS } from '../chunks/chunks.service';
import type { ChunkRow } from '../chunks/chunks.types';
import { buildSystemPrompt } from './chat.prompt';
import { ChatRequestDto, DEFAULT_INFERENCE } from './dto/chat-request.dto';
import { buildVideoContext, mergeTranscriptFragments, parseTranscriptLocation } from './transcript';

const CHUNK_BY_ID_QUERY = `
  SELECT ${CHUNK_COLUMNS}
  FROM public.wh_chunks
  WHERE warehouse_id = $1 AND cam_id = $2 AND chunk_id = $3`;

export type ChunkRef = {
  warehouseId: string;
  camId: string;
  chunkId: string;
};

export type ChatResponse = {
  conversation: ChatTurn[];
  chatLastTime: string;
  chatTransactionId: string;
  modelId: string;
  inferenceConfig: InferenceOptions;
};

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly transcripts: TranscriptStorageService,
    private readonly inference: InferenceService,
  ) {}

  /**
   * Answers a question about one video chunk from its merged transcript and
   * returns the conversation with the assistant's reply appended.
   */
  async chat(ref: ChunkRef, request: ChatRequestDto, signal?: AbortSignal): Promise<ChatResponse> {
    const { warehouseId, camId, chunkId } = ref;
    this.logger.log(`Chat request for warehouse=${warehouseId}, camera=${camId}, chunk=${chunkId}`);

    try {
      const transcriptUrl = await this.findTranscriptUrl(ref);
      const location = parseTranscriptLocation(transcriptUrl);
      if (!location) {
        throw new BadRequestException(`Unsupported blob URL format: ${transcriptUrl}`);
      }
      if (!this.transcripts.isAccountHost(location.host)) {
        throw new BadRequestException(`Transcript URL is outside the configured storage account: ${location.host}`);
      }

      this.logger.log(`Looking for transcripts in container: ${location.container}, prefix: ${location.prefix}`);
      const blobNames = await this.transcripts.listTranscriptBlobs(location.container, location.prefix, signal);
      if (blobNames.length === 0) {
        throw new NotFoundException(`No transcript files found for chunk_id=${chunkId}`);
      }

      const transcript = await mergeTranscriptFragments(
        blobNames,
        (name) => this.transcripts.readText(location.container, name, signal),
        this.logger,
        signal,
      );
      this.logger.log(`Merged ${transcript.merged.length} of ${blobNames.length} transcript files`);

      const videoContext = buildVideoContext(transcript.results);
      if (!videoContext) {
        throw new InternalServerErrorException('Failed to build video context from transcripts');
      }

      const modelId = request.modelId ?? this.inference.defaultModelId;
      const inferenceConfig: InferenceOptions = {
        maxTokens: request.inferenceConfig?.maxTokens ?? DEFAULT_INFERENCE.maxTokens,
        temperature: request.inferenceConfig?.temperature ?? DEFAULT_INFERENCE.temperature,
        topP: request.inferenceConfig?.topP ?? DEFAULT_INFERENCE.topP,
      };
      const conversation: ChatTurn[] = (request.conversation ?? []).map((message) => ({
        role: message.role,
        content: message.content.map((block) => ({ text: block.text })),
      }));
      conversation.push({ role: 'user', content: [{ text: request.UserQuery }] });

      const reply = await this.inference.converse(
        { modelId, system: buildSystemPrompt(videoContext), messages: conversation, inferenceConfig },
        signal,
      );
      if (!reply) {
        throw new InternalServerErrorException('No response from AI model');
      }
      this.logger.log(`Assistant response received: ${reply.length} characters`);

      return {
        conversation: [...conversation, { role: 'assistant', content: [{ text: reply }] }],
        chatLastTime: formatDateTime(new Date()) ?? '',
        chatTransactionId: request.chatTransactionId || randomUUID().replace(/-/g, ''),
        modelId,
        inferenceConfig,
      };
    } catch (error) {
      if (error instanceof HttpException) throw error;
      if (error instanceof InferenceError && error.clientCorrectable) {
        throw new BadRequestException(`Bedrock rejected the request: ${error.code} - ${error.message}`);
      }
      this.logger.error(`Error in chat endpoint: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
      throw new InternalServerErrorException(`Internal server error: ${errorMessage(error)}`);
    }
  }

  private async findTranscriptUrl({ warehouseId, camId, chunkId }: ChunkRef): Promise<string> {
    const [chunk] = await this.database.withConnection((session) =>
      session.rows<ChunkRow>(CHUNK_BY_ID_QUERY, [warehouseId, camId, chunkId]),
    );
    if (!chunk) {
      throw new NotFoundException(
        `Chunk not found: warehouse_id=${warehouseId}, cam_id=${camId}, chunk_id=${chunkId}`,
      );
    }
    if (!chunk.transcripts_url) {
      throw new BadRequestException(`No transcript URL configured for chunk ${chunkId}`);
    }
    return chunk.transcripts_url;
  }
}
