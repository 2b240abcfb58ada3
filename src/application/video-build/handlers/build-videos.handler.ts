import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  ConversionJob,
  type ContainerWriter,
  type InputEnumerator,
  type IntermediateCleaner,
  type TranscodingInvoker,
} from '../../../domain/video-container/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import { formatIssues } from '../../../shared/validation/format-issues.js';

import type { BuildVideosCommand } from '../commands/build-videos.command.js';
import {
  buildVideosCommandSchema,
  type BuildVideosOptions,
  type BuildVideosPayload,
} from '../dto/build-videos.dto.js';

export interface BuildVideosServices {
  readonly enumerator: InputEnumerator;
  readonly invoker: TranscodingInvoker;
  readonly writer: ContainerWriter;
  readonly cleaner: IntermediateCleaner;
}

export interface BuiltJobReport {
  readonly status: 'built';
  readonly sourcePath: string;
  readonly finalPath: string;
  readonly payloadSize: number;
  readonly intermediateRemoved: boolean;
}

export interface FailedJobReport {
  readonly status: 'failed';
  readonly sourcePath: string;
  readonly error: AppError;
}

export type JobReport = BuiltJobReport | FailedJobReport;

/**
 * `empty`: nothing matched the input. `failed`: at least one file failed while
 * running with `keepGoing`; without it the first failure is thrown instead.
 */
export type BuildStatus = 'empty' | 'completed' | 'failed';

export interface BuildVideosOutcome {
  readonly status: BuildStatus;
  readonly reports: readonly JobReport[];
}

export interface BuildProgressListener {
  onJobFinished?(report: JobReport): void;
}

export class BuildVideosHandler {
  private readonly logger = createChildLogger({ module: 'BuildVideosHandler' });

  public constructor(
    private readonly services: BuildVideosServices,
    private readonly listener: BuildProgressListener = {},
  ) {}

  public async execute(command: BuildVideosCommand): Promise<BuildVideosOutcome> {
    const options = this.validate(command.payload);
    const inputs = await this.services.enumerator.enumerate(options.source, options.recursive);

    if (inputs.length === 0) {
      this.logger.warn({ source: options.source, recursive: options.recursive }, 'No input videos found');
      return { status: 'empty', reports: [] };
    }

    await fs.mkdir(path.resolve(options.outputDir), { recursive: true });
    this.logger.info({ inputs: inputs.length, outputDir: options.outputDir }, 'Starting video build');

    const reports: JobReport[] = [];
    for (const sourcePath of inputs) {
      let report: JobReport;

      try {
        report = await this.buildOne(sourcePath, options);
      } catch (error) {
        const failure = AppError.fromUnknown(error, 'video-build.job-failed');
        this.logger.error(
          { job: path.basename(sourcePath), source: sourcePath, code: failure.code },
          'Video build failed',
        );

        if (!options.keepGoing) {
          throw failure;
        }
        report = { status: 'failed', sourcePath, error: failure };
      }

      reports.push(report);
      this.listener.onJobFinished?.(report);
    }

    const failed = reports.filter((report) => report.status === 'failed').length;
    this.logger.info({ built: reports.length - failed, failed }, 'Video build finished');

    return { status: failed > 0 ? 'failed' : 'completed', reports };
  }

  private async buildOne(sourcePath: string, options: BuildVideosOptions): Promise<BuiltJobReport> {
    const job = ConversionJob.create({
      sourcePath,
      outputDir: options.outputDir,
      configuration: options.encoding,
    });

    const logger = this.logger.child({ job: job.name });

    logger.debug({ source: job.sourcePath, intermediate: job.intermediatePath }, 'Transcoding');
    await this.services.invoker.transcode(job);

    const written = await this.services.writer.write(job);

    const intermediateRemoved = options.keepIntermediate
      ? false
      : await this.services.cleaner.remove(job.intermediatePath);

    logger.info({ output: written.path, payloadSize: written.payloadSize }, 'Container written');

    return {
      status: 'built',
      sourcePath: job.sourcePath,
      finalPath: written.path,
      payloadSize: written.payloadSize,
      intermediateRemoved,
    };
  }

  private validate(payload: BuildVideosPayload): BuildVideosOptions {
    const parsed = buildVideosCommandSchema.safeParse(payload);

    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid build options received');
      throw AppError.validation(
        'video-build.invalid-options',
        { issues: parsed.error.issues },
        `Invalid options: ${formatIssues(parsed.error.issues)}`,
      );
    }

    return parsed.data;
  }
}
