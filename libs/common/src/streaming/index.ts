export { StreamingModule } from './streaming.module';
export { StreamSignerService, StreamSigningError } from './stream-signer.service';
export type { SignedStream } from './stream-signer.service';
