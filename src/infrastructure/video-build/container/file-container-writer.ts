import type {
  ContainerWriteResult,
  ContainerWriter,
  ConversionJob,
} from '../../../domain/video-container/index.js';

import { DEFAULT_TRANSFER_BUFFER_SIZE, writeContainer } from './container-file.js';

export class FileContainerWriter implements ContainerWriter {
  public constructor(private readonly bufferSize: number = DEFAULT_TRANSFER_BUFFER_SIZE) {}

  public async write(job: ConversionJob): Promise<ContainerWriteResult> {
    return writeContainer(job.intermediatePath, job.finalPath, {
      force: job.configuration.force,
      bufferSize: this.bufferSize,
    });
  }
}
