import { logger } from "../utils/logger";
import { errorMessage } from "../utils/monitor-error";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  label?: string;
  sleep?: Sleep;
  /** Called after every attempt with its 1-based number and outcome */
  onAttempt?: (attempt: number, delivered: boolean) => void;
}

/**
 * Run `operation` until it resolves to true or the attempt budget is spent.
 * A rejection and a `false` result both count as a failed attempt. Between
 * attempts the helper waits `baseDelayMs * 2^n` (n = 0, 1, ...); there is no
 * wait after the last one.
 */
export async function retryWithBackoff(
  operation: () => Promise<boolean>,
  options: RetryOptions
): Promise<boolean> {
  const attempts = Math.max(1, Math.floor(options.maxRetries));
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? "operation";

  for (let attempt = 0; attempt < attempts; attempt++) {
    let delivered = false;
    try {
      delivered = await operation();
      if (!delivered) {
        logger.warn(`${label}: attempt ${attempt + 1}/${attempts} returned failure`);
      }
    } catch (error) {
      logger.warn(
        `${label}: attempt ${attempt + 1}/${attempts} failed: ${errorMessage(error)}`
      );
    }

    options.onAttempt?.(attempt + 1, delivered);
    if (delivered) {
      return true;
    }

    if (attempt < attempts - 1) {
      const delay = options.baseDelayMs * Math.pow(2, attempt);
      logger.debug(`${label}: retrying in ${delay / 1000}s`);
      await sleep(delay);
    }
  }

  return false;
}
