import { describe, expect, it } from 'vitest';

import { ConversionJob, type EncodingConfiguration } from '@/domain/video-container/index.js';
import { buildVp9Arguments } from '@/infrastructure/video-build/index.js';

const defaults: EncodingConfiguration = {
  crf: 30,
  deadline: 'good',
  cpuUsed: 4,
  audio: false,
  audioBitrateKbps: 128,
  force: false,
};

describe('buildVp9Arguments', () => {
  it('strips audio and refuses to overwrite by default', () => {
    const job = ConversionJob.create({ sourcePath: '/in/a.mp4', outputDir: '/out', configuration: defaults });

    expect(buildVp9Arguments(job)).toEqual([
      '-n',
      '-i',
      '/in/a.mp4',
      '-c:v',
      'libvpx-vp9',
      '-b:v',
      '0',
      '-crf',
      '30',
      '-row-mt',
      '1',
      '-deadline',
      'good',
      '-cpu-used',
      '4',
      '-an',
      '/out/a.webm',
    ]);
  });

  it('re-encodes audio as Opus and overwrites when forced', () => {
    const job = ConversionJob.create({
      sourcePath: '/in/b.mov',
      outputDir: '/out',
      configuration: { ...defaults, crf: 18, deadline: 'best', cpuUsed: 1, audio: true, audioBitrateKbps: 96, force: true },
    });

    expect(buildVp9Arguments(job)).toEqual([
      '-y',
      '-i',
      '/in/b.mov',
      '-c:v',
      'libvpx-vp9',
      '-b:v',
      '0',
      '-crf',
      '18',
      '-row-mt',
      '1',
      '-deadline',
      'best',
      '-cpu-used',
      '1',
      '-c:a',
      'libopus',
      '-b:a',
      '96k',
      '/out/b.webm',
    ]);
  });
});
