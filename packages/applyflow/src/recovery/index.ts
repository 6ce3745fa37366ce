export { RetryStrategy, type Disposition, type RetryState } from './RetryStrategy.js';
export {
  ErrorRecoveryManager,
  type CaptchaEvent,
  type ErrorRecoveryManagerOptions,
  type RecoveryAction,
  type RecoveryEvents,
  type RecoveryResult,
} from './ErrorRecoveryManager.js';
