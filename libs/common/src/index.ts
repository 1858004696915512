/**
 * Shared library public API.
 * Use this barrel for consistent imports from the app and its tests.
 */

export { ConfigModule, appConfig } from './config';
export {
  DatabaseModule,
  DatabaseService,
  formatDate,
  formatDateTime,
  formatTime,
  hourOf,
  toCount,
  toNullableNumber,
} from './database';
export type { SqlSession, SqlNumeric, SqlTemporal } from './database';
export { errorMessage } from './errors';
export { AllExceptionsFilter } from './filters';
export type { ErrorEnvelope } from './filters';
export { disconnectSignal } from './http';
export { InferenceModule, InferenceService, InferenceError } from './inference';
export type { ChatRole, ChatTurn, ConverseRequest, InferenceOptions } from './inference';
export { LoggingInterceptor } from './interceptors';
export { ParseDatePipe, RequiredParamPipe, isCalendarDate } from './pipes';
export { StorageModule, TranscriptStorageService, TRANSCRIPT_MARKER } from './storage';
export { StreamingModule, StreamSignerService, StreamSigningError } from './streaming';
export type { SignedStream } from './streaming';
