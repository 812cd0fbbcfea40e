export const ERROR_CODES = {
  E_RESOLUTION_FAILED: "No public address could be resolved",
  E_STATE_WRITE: "Failed to persist monitor state",
  E_CONFIG_INVALID: "Configuration is invalid",
  E_UPDATE_FEED: "Release feed could not be read",
  E_DUPLICATE_CHANNEL: "A channel with this name is already registered",
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

export class MonitorError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode,
    message: string = ERROR_CODES[code],
    isOperational = true,
    details?: unknown
  ) {
    super(message);
    this.name = "MonitorError";
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
