export { InferenceModule } from './inference.module';
export { InferenceService, InferenceError } from './inference.service';
export type { ChatRole, ChatTurn, ConverseRequest, InferenceOptions } from './inference.service';
