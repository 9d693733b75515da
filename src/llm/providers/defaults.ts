export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;
export const DEFAULT_HEALTH_TIMEOUT_MS = 5000;
