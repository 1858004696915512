import {
  BadRequestException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DatabaseService, errorMessage, StreamSignerService, StreamSigningError } from '../../libs/common';

const CAMERA_QUERY = `
  SELECT cam_id, warehouse_id, stream_arn, hls_url, cam_direction, camera_status
  FROM public.cameras
  WHERE warehouse_id = $1 AND cam_id = $2`;

const ACTIVATE_CAMERA_QUERY = `
  UPDATE public.cameras
  SET camera_status = 'active', hls_url = $1
  WHERE warehouse_id = $2 AND cam_id = $3`;

type StreamCameraRow = {
  cam_id: string;
  warehouse_id: string;
  stream_arn: string | null;
  hls_url: string | null;
  cam_direction: string | null;
  camera_status: string | null;
};

export const CAMERA_UPDATED = "Camera status updated to 'active' and HLS URL saved";
export const CAMERA_UPDATE_FAILED = 'Camera update failed';

export type StreamUrlResponse = {
  status: 'success';
  stream_arn: string;
  stream_name: string;
  warehouse_id: string;
  cam_id: string;
  hls_streaming_url: string;
  expires_in_seconds: number;
  data_endpoint: string;
  database_update: string;
};

/** Stream name is the second segment of `arn:aws:kinesisvideo:<region>:<account>:stream/<name>/<id>`. */
export function streamNameOf(streamArn: string): string | null {
  const name = streamArn.split('/')[1];
  return name ? name : null;
}

@Injectable()
export class CamerasService {
  private readonly logger = new Logger(CamerasService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly streamSigner: StreamSignerService,
  ) {}

  /**
   * Signs a live HLS URL for the camera and, as a side effect, marks the
   * camera active with that URL. The write is best effort: a failed update
   * is reported in `database_update` and never fails the request. Once
   * `signal` aborts, no further call or write is made.
   */
  async getStreamUrl(warehouseId: string, camId: string, signal?: AbortSignal): Promise<StreamUrlResponse> {
    try {
      return await this.database.withConnection<StreamUrlResponse>(async (session) => {
        const [camera] = await session.rows<StreamCameraRow>(CAMERA_QUERY, [warehouseId, camId]);
        if (!camera) {
          throw new NotFoundException(`Camera not found: cam_id=${camId}, warehouse_id=${warehouseId}`);
        }
        if (!camera.stream_arn) {
          throw new BadRequestException(`Stream ARN not configured for camera: ${camId}`);
        }
        const streamName = streamNameOf(camera.stream_arn);
        if (!streamName) {
          throw new BadRequestException('Invalid stream ARN format in database');
        }

        const signed = await this.streamSigner.signLiveHls(camera.stream_arn, signal);
        signal?.throwIfAborted();

        let databaseUpdate = CAMERA_UPDATE_FAILED;
        try {
          const updated = await session.execute(ACTIVATE_CAMERA_QUERY, [signed.hlsUrl, warehouseId, camId]);
          if (updated > 0) databaseUpdate = CAMERA_UPDATED;
        } catch (error) {
          this.logger.warn(`Could not mark camera ${warehouseId}/${camId} active: ${errorMessage(error)}`);
        }

        return {
          status: 'success',
          stream_arn: camera.stream_arn,
          stream_name: streamName,
          warehouse_id: warehouseId,
          cam_id: camId,
          hls_streaming_url: signed.hlsUrl,
          expires_in_seconds: signed.expiresInSeconds,
          data_endpoint: signed.dataEndpoint,
          database_update: databaseUpdate,
        };
      });
    } catch (error) {
      if (error instanceof HttpException) throw error;
      if (signal?.aborted) {
        this.logger.warn(`Stream URL request for ${warehouseId}/${camId} cancelled: ${errorMessage(error)}`);
        throw new InternalServerErrorException(`Error: ${errorMessage(error)}`);
      }
      if (error instanceof StreamSigningError) {
        this.logger.error(`AWS Error: ${error.code} - ${error.message}`);
        throw new BadRequestException(`AWS Kinesis Error: ${error.code} - ${error.message}`);
      }
      this.logger.error(`Error getting HLS URL: ${errorMessage(error)}`);
      throw new InternalServerErrorException(`Error: ${errorMessage(error)}`);
    }
  }
}
