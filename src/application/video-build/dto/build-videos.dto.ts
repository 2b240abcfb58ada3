import { z } from 'zod';

export const encoderDeadlineSchema = z.enum(['realtime', 'good', 'best']);

export const encodingConfigurationSchema = z.object({
  crf: z.number().int().min(0).max(63).default(30),
  deadline: encoderDeadlineSchema.default('good'),
  cpuUsed: z.number().int().min(-8).max(8).default(4),
  audio: z.boolean().default(false),
  audioBitrateKbps: z.number().int().positive().max(512).default(128),
  force: z.boolean().default(false),
});

export const buildVideosCommandSchema = z.object({
  source: z.string().min(1),
  outputDir: z.string().min(1),
  recursive: z.boolean().default(false),
  keepIntermediate: z.boolean().default(false),
  keepGoing: z.boolean().default(false),
  encoding: encodingConfigurationSchema.default({}),
});

/** What callers may pass; omitted fields take their defaults. */
export type BuildVideosPayload = z.input<typeof buildVideosCommandSchema>;

export type BuildVideosOptions = z.output<typeof buildVideosCommandSchema>;
