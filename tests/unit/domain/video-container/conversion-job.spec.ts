import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  ConversionJob,
  deriveOutputPaths,
  type EncodingConfiguration,
} from '@/domain/video-container/index.js';

const configuration: EncodingConfiguration = {
  crf: 30,
  deadline: 'good',
  cpuUsed: 4,
  audio: false,
  audioBitrateKbps: 128,
  force: false,
};

describe('ConversionJob', () => {
  it('flattens outputs into the output directory using the source stem', () => {
    const job = ConversionJob.create({
      sourcePath: '/media/raw/clips/intro.MP4',
      outputDir: '/build/videos',
      configuration,
    });

    expect(job.sourcePath).toBe('/media/raw/clips/intro.MP4');
    expect(job.intermediatePath).toBe('/build/videos/intro.webm');
    expect(job.finalPath).toBe('/build/videos/intro.video');
    expect(job.name).toBe('intro.MP4');
    expect(job.configuration).toBe(configuration);
  });

  it('keeps inner dots of the stem', () => {
    expect(deriveOutputPaths('/in/scene.01.take2.mov', '/out')).toEqual({
      intermediatePath: '/out/scene.01.take2.webm',
      finalPath: '/out/scene.01.take2.video',
    });
  });

  it('resolves relative paths against the working directory', () => {
    const job = ConversionJob.create({ sourcePath: 'in/a.mp4', outputDir: 'out', configuration });

    expect(job.sourcePath).toBe(path.resolve('in/a.mp4'));
    expect(job.finalPath).toBe(path.resolve('out/a.video'));
  });

  it('refuses a source that would be overwritten by its own intermediate file', () => {
    const create = () =>
      ConversionJob.create({ sourcePath: '/out/intro.webm', outputDir: '/out', configuration });

    expect(create).toThrowError(
      expect.objectContaining({ code: 'video-build.intermediate-collides-with-source' }),
    );
    expect(create).toThrowError('Intermediate file would overwrite its own source: /out/intro.webm');
  });
});
