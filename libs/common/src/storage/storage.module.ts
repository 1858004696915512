import { Module } from '@nestjs/common';
import { TranscriptStorageService } from './transcript-storage.service';

@Module({
  providers: [TranscriptStorageService],
  exports: [TranscriptStorageService],
})
export class StorageModule {}
