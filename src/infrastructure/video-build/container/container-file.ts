import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';

import {
  CONTAINER_HEADER_SIZE,
  type ContainerHeader,
  decodeContainerHeader,
  encodeContainerHeader,
} from '../../../domain/video-container/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { hasErrorCode } from '../../../shared/errors/errno.js';

export const DEFAULT_TRANSFER_BUFFER_SIZE = 1024 * 1024;

export interface WriteContainerOptions {
  readonly force?: boolean;
  /** Bytes copied per read; output does not depend on it. */
  readonly bufferSize?: number;
}

export interface WriteContainerResult {
  readonly path: string;
  readonly payloadSize: number;
  readonly totalSize: number;
}

/**
 * Writes `<header><payload>` to `destinationPath`, where the payload is the
 * verbatim content of `payloadPath`. Without `force` an existing destination
 * is left untouched and AlreadyExists is raised.
 */
export async function writeContainer(
  payloadPath: string,
  destinationPath: string,
  options: WriteContainerOptions = {},
): Promise<WriteContainerResult> {
  const bufferSize = options.bufferSize ?? DEFAULT_TRANSFER_BUFFER_SIZE;
  if (!Number.isSafeInteger(bufferSize) || bufferSize <= 0) {
    throw AppError.validation(
      'video-container.invalid-buffer-size',
      { bufferSize },
      `Transfer buffer size must be a positive integer, received ${bufferSize}`,
    );
  }

  const source = await openPayload(payloadPath);
  try {
    const { size } = await source.stat();
    const header = encodeContainerHeader(size);
    const destination = await openDestination(destinationPath, options.force === true);

    try {
      await writeFully(destination, header);
      await copyPayload(source, destination, size, bufferSize, payloadPath);
    } catch (error) {
      // a header must never outlive a payload that was not copied in full
      await destination.close();
      await fs.rm(destinationPath, { force: true });
      throw error;
    }
    await destination.close();

    return { path: destinationPath, payloadSize: size, totalSize: CONTAINER_HEADER_SIZE + size };
  } finally {
    await source.close();
  }
}

export async function readContainerHeader(containerPath: string): Promise<ContainerHeader> {
  const handle = await fs.open(containerPath, 'r');
  try {
    const buffer = Buffer.alloc(CONTAINER_HEADER_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, CONTAINER_HEADER_SIZE, 0);
    return decodeContainerHeader(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export async function readContainerPayload(containerPath: string): Promise<Buffer> {
  const bytes = await fs.readFile(containerPath);
  const header = decodeContainerHeader(bytes);
  const actual = BigInt(bytes.byteLength - CONTAINER_HEADER_SIZE);

  if (actual !== header.payloadSize) {
    throw AppError.invalidContainer('Container payload length does not match its header', {
      path: containerPath,
      declared: header.payloadSize.toString(),
      actual: actual.toString(),
    });
  }

  return bytes.subarray(CONTAINER_HEADER_SIZE);
}

async function openPayload(payloadPath: string): Promise<FileHandle> {
  try {
    return await fs.open(payloadPath, 'r');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw AppError.notFound(`Encoded file not found: ${payloadPath}`, { path: payloadPath }, error);
    }
    throw error;
  }
}

async function openDestination(destinationPath: string, force: boolean): Promise<FileHandle> {
  try {
    // 'wx' fails on an existing file before anything is written
    return await fs.open(destinationPath, force ? 'w' : 'wx');
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) {
      throw AppError.alreadyExists(destinationPath);
    }
    throw error;
  }
}

async function copyPayload(
  source: FileHandle,
  destination: FileHandle,
  size: number,
  bufferSize: number,
  payloadPath: string,
): Promise<void> {
  const buffer = Buffer.alloc(Math.min(bufferSize, Math.max(size, 1)));
  let position = 0;

  while (position < size) {
    const length = Math.min(buffer.length, size - position);
    const { bytesRead } = await source.read(buffer, 0, length, position);

    if (bytesRead === 0) {
      throw AppError.invalidContainer('Encoded file shrank while it was being copied', {
        path: payloadPath,
        expectedBytes: size,
        copiedBytes: position,
      });
    }

    await writeFully(destination, buffer.subarray(0, bytesRead));
    position += bytesRead;
  }
}

async function writeFully(handle: FileHandle, chunk: Buffer): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
}
