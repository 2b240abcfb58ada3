import { z } from 'zod';

import { AppError } from '../errors/app-error.js';
import { formatIssues } from '../validation/format-issues.js';

const optionalPath = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional(),
);

const schema = z.object({
  // Explicit encoder binary; the --ffmpeg flag wins over it
  FFMPEG_PATH: optionalPath,
  // Directory searched for third_party/ffmpeg; defaults to the package root
  VIDEO_TOOL_ROOT: optionalPath,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type ToolEnvironment = z.infer<typeof schema>;

export type EnvironmentVariables = Readonly<Record<string, string | undefined>>;

export function loadEnvironment(source: EnvironmentVariables = process.env): ToolEnvironment {
  const parsed = schema.safeParse(source);

  if (!parsed.success) {
    throw AppError.validation(
      'config.invalid-environment',
      { issues: parsed.error.issues },
      `Invalid environment: ${formatIssues(parsed.error.issues)}`,
    );
  }

  return parsed.data;
}
