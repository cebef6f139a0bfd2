/**
 * Error types for the YouTube subtitles MCP server
 */

export const ErrorCodes = {
  YT_DLP_NOT_FOUND: 'YT_DLP_NOT_FOUND',
  YT_DLP_FAILED: 'YT_DLP_FAILED',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class SubtitleServerError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'SubtitleServerError';
  }
}

/**
 * yt-dlp ran but exited with a non-zero status. `stderr` is kept verbatim.
 */
export class ExternalToolError extends SubtitleServerError {
  constructor(
    public stderr: string,
    originalError?: unknown
  ) {
    super(`yt-dlp error: ${stderr}`, ErrorCodes.YT_DLP_FAILED, originalError);
    this.name = 'ExternalToolError';
  }
}

export class ExternalToolMissingError extends SubtitleServerError {
  constructor(originalError?: unknown) {
    super(
      "yt-dlp not found. Please make sure it's installed and in your PATH.",
      ErrorCodes.YT_DLP_NOT_FOUND,
      originalError
    );
    this.name = 'ExternalToolMissingError';
  }
}

export class InvalidArgumentsError extends SubtitleServerError {
  constructor(message: string, originalError?: unknown) {
    super(message, ErrorCodes.INVALID_ARGUMENTS, originalError);
    this.name = 'InvalidArgumentsError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function field(error: unknown, name: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, name);
  return value;
}

/**
 * Maps a rejection from spawning yt-dlp onto the two failures callers care
 * about: the binary is missing, or it ran and failed.
 */
export function handleSpawnError(error: unknown): SubtitleServerError {
  if (error instanceof SubtitleServerError) {
    return error;
  }

  const code = field(error, 'code');
  const message = describeError(error);
  if (code === 'ENOENT' || message.includes('ENOENT')) {
    return new ExternalToolMissingError(error);
  }

  const stderr = field(error, 'stderr');
  return new ExternalToolError(
    typeof stderr === 'string' && stderr.length > 0 ? stderr : message,
    error
  );
}
