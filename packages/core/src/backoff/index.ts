export { BackoffPolicy, linearBackoff, type BackoffConfig } from './backoff-policy.js';
