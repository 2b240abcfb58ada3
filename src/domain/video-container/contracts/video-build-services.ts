import type { ConversionJob } from '../entities/conversion-job.js';

export interface InputEnumerator {
  enumerate(root: string, recursive: boolean): Promise<string[]>;
}

export interface TranscodingInvoker {
  transcode(job: ConversionJob): Promise<void>;
}

export interface ContainerWriteResult {
  readonly path: string;
  readonly payloadSize: number;
  readonly totalSize: number;
}

export interface ContainerWriter {
  write(job: ConversionJob): Promise<ContainerWriteResult>;
}

export interface IntermediateCleaner {
  /** Resolves `true` when a file was deleted. Never rejects. */
  remove(filePath: string): Promise<boolean>;
}
