export type AppErrorCode =
  | 'InvalidInput'
  | 'EmptyAudio'
  | 'UploadTooLarge'
  | 'ToolUnavailable'
  | 'AnalysisFailure'
  | 'RenderFailure';

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  readonly code = 'InvalidInput' as const;
}

export class EmptyAudioError extends AppError {
  readonly code = 'EmptyAudio' as const;
}

const MEGABYTE = 1024 * 1024;

function formatBytes(bytes: number): string {
  return bytes >= MEGABYTE ? `${Math.round(bytes / MEGABYTE)} MB` : `${bytes} byte`;
}

export class UploadTooLargeError extends AppError {
  readonly code = 'UploadTooLarge' as const;

  constructor(readonly limitBytes: number) {
    super(`Upload exceeds the ${formatBytes(limitBytes)} limit`);
  }
}

export class ToolUnavailableError extends AppError {
  readonly code = 'ToolUnavailable' as const;
}

export class AnalysisFailureError extends AppError {
  readonly code = 'AnalysisFailure' as const;
}

/** Non-zero exit of an external media command. */
export class RenderFailureError extends AppError {
  readonly code = 'RenderFailure' as const;

  constructor(
    message: string,
    readonly command: string[],
    readonly stderr: string,
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
