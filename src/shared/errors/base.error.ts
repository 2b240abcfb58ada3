export interface ToolErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Root of every error raised by the build tool. `code` is stable and meant for
 * programmatic checks.
 */
export class ToolError extends Error {
  public readonly code: string;

  public readonly metadata: Readonly<Record<string, unknown>>;

  public constructor(options: ToolErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata ?? {};
  }
}
