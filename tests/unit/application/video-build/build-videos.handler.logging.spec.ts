import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BuildVideosCommand, BuildVideosHandler, type BuildVideosServices } from '@/application/video-build/index.js';
import type { ConversionJob } from '@/domain/video-container/index.js';
import { AppError } from '@/shared/errors/app-error.js';

interface LogEntry {
  readonly level: string;
  readonly fields: Record<string, unknown>;
  readonly message: string;
}

const { entries } = vi.hoisted(() => ({ entries: new Array<LogEntry>() }));

vi.mock('@/shared/logger/pino.js', () => {
  const createLogger = (bindings: Record<string, unknown>) => {
    const record = (level: string) => (fields: Record<string, unknown>, message: string) => {
      entries.push({ level, fields: { ...bindings, ...fields }, message });
    };

    return {
      child: (more: Record<string, unknown>) => createLogger({ ...bindings, ...more }),
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    };
  };

  return { createChildLogger: createLogger };
});

let outputDir: string;

beforeEach(async () => {
  entries.length = 0;
  outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'build-videos-logging-'));
});

afterEach(async () => {
  await fs.rm(outputDir, { recursive: true, force: true });
});

const services = {
  enumerator: { enumerate: vi.fn(async () => ['/in/a.mp4', '/in/b.mov']) },
  invoker: {
    transcode: vi.fn(async (job: ConversionJob) => {
      if (job.name === 'b.mov') {
        throw AppError.encodingFailed({ sourcePath: job.sourcePath, output: 'corrupt input', exitCode: 1 });
      }
    }),
  },
  writer: {
    write: vi.fn(async (job: ConversionJob) => ({ path: job.finalPath, payloadSize: 100, totalSize: 116 })),
  },
  cleaner: { remove: vi.fn(async () => true) },
} satisfies BuildVideosServices;

describe('BuildVideosHandler logging', () => {
  it('tags each job entry with the source file name', async () => {
    const handler = new BuildVideosHandler(services);

    await handler.execute(new BuildVideosCommand({ source: '/in', outputDir, keepGoing: true }));

    expect(entries).toContainEqual({
      level: 'info',
      fields: {
        module: 'BuildVideosHandler',
        job: 'a.mp4',
        output: path.join(outputDir, 'a.video'),
        payloadSize: 100,
      },
      message: 'Container written',
    });
    expect(entries).toContainEqual({
      level: 'error',
      fields: {
        module: 'BuildVideosHandler',
        job: 'b.mov',
        source: '/in/b.mov',
        code: 'video-build.encoding-failed',
      },
      message: 'Video build failed',
    });
  });
});
