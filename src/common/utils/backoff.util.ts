/**
 * Sleep for a given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay
 * Formula: baseDelay * 2^attempt with jitter
 */
export function calculateBackoff(baseDelay: number, attempt: number): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  // Jitter of 0-50% keeps competing retries from lining up
  const jitter = Math.random() * exponentialDelay * 0.5;
  return Math.floor(exponentialDelay + jitter);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
