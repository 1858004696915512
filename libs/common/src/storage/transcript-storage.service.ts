import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ClientSecretCredential } from '@azure/identity';
import { BlobServiceClient } from '@azure/storage-blob';

/** Marker every transcript fragment carries in its blob name. */
export const TRANSCRIPT_MARKER = 'chunk_start';

@Injectable()
export class TranscriptStorageService {
  private readonly logger = new Logger(TranscriptStorageService.name);
  private serviceClient: BlobServiceClient | null = null;

  constructor(private readonly configService: ConfigService) {}

  /**
   * Names of the transcript fragments (`*.json` containing `chunk_start`)
   * under `prefix`, in listing order.
   */
  async listTranscriptBlobs(container: string, prefix: string, signal?: AbortSignal): Promise<string[]> {
    const containerClient = this.client().getContainerClient(container);
    const names: string[] = [];

    for await (const blob of containerClient.listBlobsFlat({ prefix, abortSignal: signal })) {
      if (blob.name.endsWith('.json') && blob.name.includes(TRANSCRIPT_MARKER)) {
        names.push(blob.name);
      }
    }

    this.logger.debug(`Found ${names.length} transcript blobs in ${container}/${prefix}`);
    return names;
  }

  async readText(container: string, blobName: string, signal?: AbortSignal): Promise<string> {
    const blobClient = this.client().getContainerClient(container).getBlobClient(blobName);
    const buffer = await blobClient.downloadToBuffer(undefined, undefined, { abortSignal: signal });
    return buffer.toString('utf-8');
  }

  /** Whether `host` names the configured storage account's blob endpoint. */
  isAccountHost(host: string): boolean {
    return host.toLowerCase() === this.accountUrl().slice('https://'.length);
  }

  private accountUrl(): string {
    const accountName = this.configService.get<string>('azure.storageAccountName', '');
    if (!accountName) {
      throw new Error('Azure Blob Storage credentials are not configured');
    }
    return `https://${accountName.toLowerCase()}.blob.core.windows.net`;
  }

  private client(): BlobServiceClient {
    if (this.serviceClient) return this.serviceClient;

    const accountUrl = this.accountUrl();
    const tenantId = this.configService.get<string>('azure.tenantId', '');
    const clientId = this.configService.get<string>('azure.clientId', '');
    const clientSecret = this.configService.get<string>('azure.clientSecret', '');
    if (!tenantId || !clientId || !clientSecret) {
      throw new Error('Azure Blob Storage credentials are not configured');
    }

    const credential = new ClientSecretCredential(tenantId, clientId, clientSecret);
    this.serviceClient = new BlobServiceClient(accountUrl, credential, {
      retryOptions: {
        maxTries: 1,
        tryTimeoutInMs: this.configService.get<number>('azure.blobTimeoutMs', 15000),
      },
    });
    return this.serviceClient;
  }
}
