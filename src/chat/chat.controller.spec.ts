import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { ConverseRequest, InferenceError, InferenceService, TranscriptStorageService } from '../../libs/common';
import { FakeDatabase } from '../../libs/common/src/testing';
import { createTestApp } from '../testing/test-app';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

const ROUTE = '/api/v1/warehouses/WH001/cameras/CAM1/chunks/chunk-1/chat';
const TRANSCRIPTS_URL =
  'https://acct.blob.core.windows.net/cache-1/2025-08-26/loopcam1/abc/chunks/ts_abc_chunk_start-0-end-30_file.json';
const PREFIX = '2025-08-26/loopcam1/abc/chunks/';

const FRAGMENTS: Record<string, string> = {
  [`${PREFIX}ts_abc_chunk_start-30-end-60_file.json`]: '[{"30-60":"bags loaded"}]',
  [`${PREFIX}ts_abc_chunk_start-0-end-30_file.json`]: '[{"0-30":"forklift enters"}]',
};

const chunkRow = (transcripts_url: string | null) => ({
  chunk_id: 'chunk-1',
  warehouse_id: 'WH001',
  cam_id: 'CAM1',
  chunk_blob_url: null,
  transcripts_url,
  date: '2025-08-26',
  time: '2025-08-26 10:00:00',
});

describe('ChatController', () => {
  let app: INestApplication;
  let database: FakeDatabase;
  let chunk: ReturnType<typeof chunkRow> | null;
  const listTranscriptBlobs = jest.fn<Promise<string[]>, [string, string, AbortSignal?]>();
  const readText = jest.fn<Promise<string>, [string, string, AbortSignal?]>();
  const isAccountHost = jest.fn((host: string) => host === 'acct.blob.core.windows.net');
  const converse = jest.fn<Promise<string | null>, [ConverseRequest, AbortSignal?]>();

  beforeEach(async () => {
    listTranscriptBlobs.mockReset().mockResolvedValue(Object.keys(FRAGMENTS));
    readText.mockReset().mockImplementation(async (_container, name) => FRAGMENTS[name]);
    converse.mockReset().mockResolvedValue('Two trucks were loaded.');

    chunk = chunkRow(TRANSCRIPTS_URL);
    database = new FakeDatabase().onRows(/FROM public\.wh_chunks/, () => (chunk ? [chunk] : []));
    app = await createTestApp({
      controllers: [ChatController],
      providers: [
        ChatService,
        { provide: TranscriptStorageService, useValue: { listTranscriptBlobs, readText, isAccountHost } },
        { provide: InferenceService, useValue: { defaultModelId: 'test-model', converse } },
      ],
      database,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers from the merged transcript and appends the reply', async () => {
    const response = await request(app.getHttpServer())
      .post(ROUTE)
      .send({
        UserQuery: 'How many trucks?',
        conversation: [
          { role: 'user', content: [{ text: 'Hi' }] },
          { role: 'assistant', content: [{ text: 'Hello' }] },
        ],
        chatTransactionId: 'txn-1',
      });

    expect(response.status).toBe(200);
    expect(database.statements[0].values).toEqual(['WH001', 'CAM1', 'chunk-1']);
    expect(listTranscriptBlobs).toHaveBeenCalledWith('cache-1', PREFIX, expect.any(AbortSignal));
    expect(readText.mock.calls.map(([, name]) => name)).toEqual([
      `${PREFIX}ts_abc_chunk_start-0-end-30_file.json`,
      `${PREFIX}ts_abc_chunk_start-30-end-60_file.json`,
    ]);

    const [sent] = converse.mock.calls[0];
    expect(sent.modelId).toBe('test-model');
    expect(sent.inferenceConfig).toEqual({ maxTokens: 1000, temperature: 0.7, topP: 0.9 });
    expect(sent.messages).toEqual([
      { role: 'user', content: [{ text: 'Hi' }] },
      { role: 'assistant', content: [{ text: 'Hello' }] },
      { role: 'user', content: [{ text: 'How many trucks?' }] },
    ]);
    expect(sent.system).toContain(
      '<video_context>\n' +
        '**************0-30**************\nforklift enters\n\n' +
        '**************30-60**************\nbags loaded\n\n' +
        '\n</video_context>',
    );

    expect(response.body.conversation).toHaveLength(4);
    expect(response.body.conversation[3]).toEqual({ role: 'assistant', content: [{ text: 'Two trucks were loaded.' }] });
    expect(response.body.chatTransactionId).toBe('txn-1');
    expect(response.body.modelId).toBe('test-model');
    expect(response.body.inferenceConfig).toEqual({ maxTokens: 1000, temperature: 0.7, topP: 0.9 });
    expect(response.body.chatLastTime).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('fills in caller overrides and a fresh transaction id', async () => {
    const response = await request(app.getHttpServer())
      .post(ROUTE)
      .send({ UserQuery: 'Any forklifts?', modelId: 'custom-model', inferenceConfig: { temperature: 0.2 } });

    expect(response.status).toBe(200);
    expect(converse.mock.calls[0][0].modelId).toBe('custom-model');
    expect(response.body.inferenceConfig).toEqual({ maxTokens: 1000, temperature: 0.2, topP: 0.9 });
    expect(response.body.chatTransactionId).toMatch(/^[0-9a-f]{32}$/);
    expect(response.body.conversation).toHaveLength(2);
  });

  describe('request validation', () => {
    it('requires a question', async () => {
      const response = await request(app.getHttpServer()).post(ROUTE).send({ conversation: [] });

      expect(response.status).toBe(400);
      expect(response.body.message).toContain('UserQuery should not be empty');
      expect(database.connections).toBe(0);
    });

    it('rejects an unknown conversation role', async () => {
      const response = await request(app.getHttpServer())
        .post(ROUTE)
        .send({ UserQuery: 'Hi', conversation: [{ role: 'system', content: [{ text: 'x' }] }] });

      expect(response.status).toBe(400);
      expect(converse).not.toHaveBeenCalled();
    });

    it('rejects unknown fields', async () => {
      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi', stream: true });

      expect(response.status).toBe(400);
      expect(response.body.message).toContain('property stream should not exist');
    });
  });

  describe('failures', () => {
    it('returns 404 for an unknown chunk', async () => {
      chunk = null;

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Chunk not found: warehouse_id=WH001, cam_id=CAM1, chunk_id=chunk-1');
    });

    it('returns 400 when the chunk has no transcript URL', async () => {
      chunk = chunkRow(null);

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('No transcript URL configured for chunk chunk-1');
      expect(listTranscriptBlobs).not.toHaveBeenCalled();
    });

    it('returns 400 for a transcript URL outside blob storage', async () => {
      chunk = chunkRow('wasbs://cache-1@acct/chunks/a.json');

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Unsupported blob URL format: wasbs://cache-1@acct/chunks/a.json');
    });

    it('returns 400 for a transcript URL in another storage account', async () => {
      chunk = chunkRow('https://other.blob.core.windows.net/cache-1/chunks/ts_abc_chunk_start-0-end-30_file.json');

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe(
        'Transcript URL is outside the configured storage account: other.blob.core.windows.net',
      );
      expect(listTranscriptBlobs).not.toHaveBeenCalled();
    });

    it('returns 404 when no transcript fragments are listed', async () => {
      listTranscriptBlobs.mockResolvedValue([]);

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('No transcript files found for chunk_id=chunk-1');
    });

    it('returns 500 when no fragment yields context', async () => {
      readText.mockResolvedValue('{not json');

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Failed to build video context from transcripts');
      expect(converse).not.toHaveBeenCalled();
    });

    it('returns 500 when the model says nothing', async () => {
      converse.mockResolvedValue(null);

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('No response from AI model');
    });

    it('returns 400 when Bedrock rejects the request itself', async () => {
      converse.mockRejectedValue(
        new InferenceError('ValidationException', 'The provided model identifier is invalid.', true),
      );

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi', modelId: 'nope' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe(
        'Bedrock rejected the request: ValidationException - The provided model identifier is invalid.',
      );
    });

    it('returns 500 for other Bedrock failures', async () => {
      converse.mockRejectedValue(new InferenceError('ThrottlingException', 'Too many requests', false));

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Internal server error: Too many requests');
    });

    it('returns 500 when the transcript listing fails', async () => {
      listTranscriptBlobs.mockRejectedValue(new Error('AuthorizationFailure'));

      const response = await request(app.getHttpServer()).post(ROUTE).send({ UserQuery: 'Hi' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Internal server error: AuthorizationFailure');
    });
  });
});
