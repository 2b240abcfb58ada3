import { promises as fs } from 'node:fs';
import path from 'node:path';

import type {
  EncoderInvocation,
  EncoderProcess,
  EncoderRunResult,
} from '@/domain/video-container/index.js';

/** Bytes the fake "encoder" prepends to the source to produce the .webm. */
export const FAKE_WEBM_PREFIX = Buffer.from('WEBM');

/**
 * Stands in for ffmpeg: reads the `-i` input and writes `WEBM` + input bytes to the
 * last argument. Honours `-n` and fails for the basenames in `failFor`.
 */
export class FakeEncoderProcess implements EncoderProcess {
  public readonly invocations: EncoderInvocation[] = [];

  public constructor(private readonly failFor: ReadonlySet<string> = new Set()) {}

  public async run(invocation: EncoderInvocation): Promise<EncoderRunResult> {
    this.invocations.push(invocation);

    const { args } = invocation;
    const input = args[args.indexOf('-i') + 1];
    const output = args[args.length - 1];

    if (this.failFor.has(path.basename(input))) {
      return { exitCode: 1, signal: null, output: `${input}: Invalid data found when processing input` };
    }

    if (args[0] === '-n' && (await exists(output))) {
      return { exitCode: 1, signal: null, output: `File '${output}' already exists. Exiting.` };
    }

    const source = await fs.readFile(input);
    await fs.writeFile(output, Buffer.concat([FAKE_WEBM_PREFIX, source]));
    return { exitCode: 0, signal: null, output: 'frame=    1 fps=0.0 q=0.0 Lsize=       1kB' };
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
