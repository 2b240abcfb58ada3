import type { EnvironmentVariables } from '../../../shared/config/env.js';

export interface EncoderInvocation {
  readonly binary: string;
  readonly args: readonly string[];
  readonly env: EnvironmentVariables;
}

export interface EncoderRunResult {
  readonly exitCode: number | null;
  readonly signal: string | null;
  /** stdout and stderr, interleaved in arrival order. */
  readonly output: string;
}

/**
 * Runs the external encoder to completion. Implementations must not resolve before
 * the process has exited; a non-zero exit is reported through `exitCode`, not thrown.
 */
export interface EncoderProcess {
  run(invocation: EncoderInvocation): Promise<EncoderRunResult>;
}
