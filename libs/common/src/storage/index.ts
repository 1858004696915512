export { StorageModule } from './storage.module';
export { TranscriptStorageService, TRANSCRIPT_MARKER } from './transcript-storage.service';
