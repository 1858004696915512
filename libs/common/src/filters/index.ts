export { AllExceptionsFilter } from './all-exceptions.filter';
export type { ErrorEnvelope } from './all-exceptions.filter';
