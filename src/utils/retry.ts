/**
 * Retry with exponential backoff for calls to external tools
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  timeoutMs: 60000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void
): Promise<T> {
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      // Reject if the attempt outlives the timeout
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timeout after ${config.timeoutMs}ms`)), config.timeoutMs);
      });

      const result = await Promise.race([fn(), timeoutPromise]);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: lastError.message,
        nextRetryInMs: attempt < config.maxAttempts ? lastDelay : undefined,
      });

      if (attempt === config.maxAttempts) {
        break;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(`Failed after ${config.maxAttempts} attempts. Last error: ${lastError?.message}`);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
