import { spawn } from 'node:child_process';

import type {
  EncoderInvocation,
  EncoderProcess,
  EncoderRunResult,
} from '../../../domain/video-container/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { hasErrorCode } from '../../../shared/errors/errno.js';

export class SpawnEncoderProcess implements EncoderProcess {
  public async run(invocation: EncoderInvocation): Promise<EncoderRunResult> {
    return new Promise<EncoderRunResult>((resolve, reject) => {
      const proc = spawn(invocation.binary, [...invocation.args], {
        env: { ...invocation.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const chunks: Buffer[] = [];
      const collect = (chunk: Buffer): void => {
        chunks.push(chunk);
      };
      proc.stdout.on('data', collect);
      proc.stderr.on('data', collect);

      proc.on('error', (error) => {
        if (hasErrorCode(error, 'ENOENT')) {
          reject(
            AppError.notFound(
              `ffmpeg binary not found: ${invocation.binary}`,
              { binary: invocation.binary },
              error,
            ),
          );
          return;
        }
        reject(AppError.fromError(error, 'video-build.encoder-spawn-failed'));
      });

      proc.on('close', (code, signal) => {
        resolve({
          exitCode: code,
          signal,
          output: Buffer.concat(chunks).toString('utf8'),
        });
      });
    });
  }
}
