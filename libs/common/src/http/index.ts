export { disconnectSignal } from './disconnect-signal';
