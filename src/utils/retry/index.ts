// Retry utilities

export { type RetryOptions, withRetry } from './network';
