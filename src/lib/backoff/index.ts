export { type BackoffConfig, DEFAULT_BACKOFF_CONFIG, calculateBackoffMs } from "./backoff";
