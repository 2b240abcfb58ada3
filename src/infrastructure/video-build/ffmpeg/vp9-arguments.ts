import type { ConversionJob } from '../../../domain/video-container/index.js';

export const VIDEO_CODEC = 'libvpx-vp9';

export const AUDIO_CODEC = 'libopus';

export function buildVp9Arguments(job: ConversionJob): string[] {
  const { configuration } = job;
  // -n makes ffmpeg refuse to replace an existing intermediate file
  const args: string[] = [configuration.force ? '-y' : '-n', '-i', job.sourcePath];

  args.push(
    '-c:v',
    VIDEO_CODEC,
    '-b:v',
    '0',
    '-crf',
    `${configuration.crf}`,
    '-row-mt',
    '1',
    '-deadline',
    configuration.deadline,
    '-cpu-used',
    `${configuration.cpuUsed}`,
  );

  if (configuration.audio) {
    args.push('-c:a', AUDIO_CODEC, '-b:a', `${configuration.audioBitrateKbps}k`);
  } else {
    args.push('-an');
  }

  args.push(job.intermediatePath);
  return args;
}
