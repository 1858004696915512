import type { SqlTemporal } from '../../libs/common';

export type ChunkRow = {
  chunk_id: string;
  warehouse_id: string;
  cam_id: string;
  chunk_blob_url: string | null;
  transcripts_url: string | null;
  date: SqlTemporal;
  time: SqlTemporal;
};

export type Chunk = {
  chunk_id: string;
  warehouse_id: string;
  cam_id: string;
  chunk_blob_url: string | null;
  transcripts_url: string | null;
  date: string | null;
  time: string | null;
};
