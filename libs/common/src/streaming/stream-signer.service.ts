import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  APIName,
  GetDataEndpointCommand,
  KinesisVideoClient,
  KinesisVideoClientConfig,
  KinesisVideoServiceException,
} from '@aws-sdk/client-kinesis-video';
import {
  GetHLSStreamingSessionURLCommand,
  HLSFragmentSelectorType,
  HLSPlaybackMode,
  KinesisVideoArchivedMediaClient,
  KinesisVideoArchivedMediaServiceException,
} from '@aws-sdk/client-kinesis-video-archived-media';

/** Raised when Kinesis Video rejects or cannot serve a signing request. */
export class StreamSigningError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'StreamSigningError';
  }
}

export type SignedStream = {
  dataEndpoint: string;
  hlsUrl: string;
  expiresInSeconds: number;
};

@Injectable()
export class StreamSignerService {
  private readonly logger = new Logger(StreamSignerService.name);
  private readonly clientConfig: KinesisVideoClientConfig;
  private readonly kinesisVideo: KinesisVideoClient;
  private readonly expiresInSeconds: number;

  constructor(private readonly configService: ConfigService) {
    const accessKeyId = this.configService.get<string>('aws.accessKeyId', '');
    const secretAccessKey = this.configService.get<string>('aws.secretAccessKey', '');
    const requestTimeout = this.configService.get<number>('kinesisVideo.requestTimeoutMs', 10000);

    this.expiresInSeconds = this.configService.get<number>('kinesisVideo.hlsExpiresSeconds', 3600);
    this.clientConfig = {
      region: this.configService.get<string>('aws.region', 'us-east-1'),
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      maxAttempts: 1,
      requestHandler: { connectionTimeout: requestTimeout, requestTimeout },
    };
    this.kinesisVideo = new KinesisVideoClient(this.clientConfig);
  }

  /**
   * Resolves the stream's HLS data endpoint and signs a LIVE playback session
   * URL on it. One attempt per call; `signal` cancels whichever call is in flight.
   */
  async signLiveHls(streamArn: string, signal?: AbortSignal): Promise<SignedStream> {
    try {
      const endpoint = await this.kinesisVideo.send(
        new GetDataEndpointCommand({
          StreamARN: streamArn,
          APIName: APIName.GET_HLS_STREAMING_SESSION_URL,
        }),
        { abortSignal: signal },
      );
      if (!endpoint.DataEndpoint) {
        throw new StreamSigningError('MissingDataEndpoint', `No data endpoint returned for ${streamArn}`);
      }

      const archivedMedia = new KinesisVideoArchivedMediaClient({
        ...this.clientConfig,
        endpoint: endpoint.DataEndpoint,
      });
      try {
        const session = await archivedMedia.send(
          new GetHLSStreamingSessionURLCommand({
            StreamARN: streamArn,
            PlaybackMode: HLSPlaybackMode.LIVE,
            HLSFragmentSelector: { FragmentSelectorType: HLSFragmentSelectorType.SERVER_TIMESTAMP },
            Expires: this.expiresInSeconds,
          }),
          { abortSignal: signal },
        );
        if (!session.HLSStreamingSessionURL) {
          throw new StreamSigningError('MissingSessionUrl', `No HLS session URL returned for ${streamArn}`);
        }

        this.logger.debug(`Signed HLS session for ${streamArn} on ${endpoint.DataEndpoint}`);
        return {
          dataEndpoint: endpoint.DataEndpoint,
          hlsUrl: session.HLSStreamingSessionURL,
          expiresInSeconds: this.expiresInSeconds,
        };
      } finally {
        archivedMedia.destroy();
      }
    } catch (error) {
      if (
        error instanceof KinesisVideoServiceException ||
        error instanceof KinesisVideoArchivedMediaServiceException
      ) {
        throw new StreamSigningError(error.name, error.message);
      }
      throw error;
    }
  }
}
