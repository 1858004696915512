import { HttpException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { DatabaseService, errorMessage, formatDate, formatDateTime } from '../../libs/common';
import type { LogScope } from '../logs/logs.types';
import type { Chunk, ChunkRow } from './chunks.types';

export const CHUNK_COLUMNS = `
    chunk_id,
    warehouse_id,
    cam_id,
    chunk_blob_url,
    transcripts_url,
    date,
    time`;

const CHUNKS_BY_DAY_QUERY = `
  SELECT ${CHUNK_COLUMNS}
  FROM public.wh_chunks
  WHERE warehouse_id = $1 AND cam_id = $2 AND date = $3
  ORDER BY time`;

export type ChunkListResponse = {
  status: 'success';
  message?: string;
  total_chunks: number;
  chunks: Chunk[];
} & LogScope;

export function toChunk(row: ChunkRow): Chunk {
  return {
    chunk_id: row.chunk_id,
    warehouse_id: row.warehouse_id,
    cam_id: row.cam_id,
    chunk_blob_url: row.chunk_blob_url,
    transcripts_url: row.transcripts_url,
    date: formatDate(row.date),
    time: formatDateTime(row.time),
  };
}

@Injectable()
export class ChunksService {
  private readonly logger = new Logger(ChunksService.name);

  constructor(private readonly database: DatabaseService) {}

  async getChunks(scope: LogScope): Promise<ChunkListResponse> {
    const { warehouse_id, cam_id, date } = scope;
    try {
      const rows = await this.database.withConnection((session) =>
        session.rows<ChunkRow>(CHUNKS_BY_DAY_QUERY, [warehouse_id, cam_id, date]),
      );
      const chunks = rows.map(toChunk);

      return {
        status: 'success',
        ...(chunks.length === 0 ? { message: 'No chunks found for the given criteria' } : {}),
        ...scope,
        total_chunks: chunks.length,
        chunks,
      };
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(`Error fetching chunks: ${errorMessage(error)}`);
      throw new InternalServerErrorException(`Database error: ${errorMessage(error)}`);
    }
  }
}
