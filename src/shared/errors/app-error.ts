import { ToolError } from './base.error.js';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
}

export const AppErrorCode = {
  NotFound: 'video-build.not-found',
  AlreadyExists: 'video-build.already-exists',
  EncodingFailed: 'video-build.encoding-failed',
  InvalidContainer: 'video-container.invalid',
  Unexpected: 'UNEXPECTED_ERROR',
} as const;

export interface EncodingFailure {
  readonly sourcePath: string;
  readonly output: string;
  readonly exitCode: number | null;
  readonly signal?: string | null;
}

export class AppError extends ToolError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
    });
  }

  public static fromUnknown(error: unknown, code: string = AppErrorCode.Unexpected): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause });
  }

  public static fromError(error: Error, code: string = AppErrorCode.Unexpected): AppError {
    return new AppError({ code, message: error.message, cause: error });
  }

  public static validation(code: string, metadata: Record<string, unknown>, message?: string): AppError {
    return new AppError({
      code,
      message: message ?? 'Validation failed for the provided payload.',
      metadata,
    });
  }

  public static notFound(message: string, metadata?: Record<string, unknown>, cause?: unknown): AppError {
    return new AppError({
      code: AppErrorCode.NotFound,
      message,
      metadata,
      cause,
    });
  }

  public static alreadyExists(path: string): AppError {
    return new AppError({
      code: AppErrorCode.AlreadyExists,
      message: `Output exists: ${path}`,
      metadata: { path },
    });
  }

  public static encodingFailed(failure: EncodingFailure): AppError {
    return new AppError({
      code: AppErrorCode.EncodingFailed,
      message: `ffmpeg failed for ${failure.sourcePath}\n${failure.output}`,
      metadata: {
        sourcePath: failure.sourcePath,
        output: failure.output,
        exitCode: failure.exitCode,
        signal: failure.signal ?? null,
      },
    });
  }

  public static invalidContainer(message: string, metadata?: Record<string, unknown>): AppError {
    return new AppError({
      code: AppErrorCode.InvalidContainer,
      message,
      metadata,
    });
  }
}
