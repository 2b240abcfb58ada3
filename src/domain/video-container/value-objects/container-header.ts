import { AppError } from '../../../shared/errors/app-error.js';

export const CONTAINER_MAGIC = 'VID0';

export const CONTAINER_VERSION = 1;

/** magic (4) + version u32 (4) + payload size u64 (8) */
export const CONTAINER_HEADER_SIZE = 16;

const MAX_PAYLOAD_SIZE = 0xffff_ffff_ffff_ffffn;

export interface ContainerHeader {
  readonly magic: string;
  readonly version: number;
  readonly payloadSize: bigint;
}

export function encodeContainerHeader(payloadSize: number | bigint): Buffer {
  if (typeof payloadSize === 'number' && !Number.isSafeInteger(payloadSize)) {
    throw AppError.invalidContainer('Payload size must be a whole number of bytes', { payloadSize });
  }

  const size = BigInt(payloadSize);
  if (size < 0n || size > MAX_PAYLOAD_SIZE) {
    throw AppError.invalidContainer('Payload size does not fit in an unsigned 64-bit field', {
      payloadSize: size.toString(),
    });
  }

  const header = Buffer.alloc(CONTAINER_HEADER_SIZE);
  header.write(CONTAINER_MAGIC, 0, 'ascii');
  header.writeUInt32LE(CONTAINER_VERSION, 4);
  header.writeBigUInt64LE(size, 8);
  return header;
}

export function decodeContainerHeader(bytes: Uint8Array): ContainerHeader {
  if (bytes.byteLength < CONTAINER_HEADER_SIZE) {
    throw AppError.invalidContainer('Container header is truncated', {
      expectedBytes: CONTAINER_HEADER_SIZE,
      actualBytes: bytes.byteLength,
    });
  }

  const view = Buffer.from(bytes.subarray(0, CONTAINER_HEADER_SIZE));
  const magic = view.toString('latin1', 0, 4);
  if (magic !== CONTAINER_MAGIC) {
    throw AppError.invalidContainer(`Unknown container magic: ${JSON.stringify(magic)}`, { magic });
  }

  const version = view.readUInt32LE(4);
  if (version !== CONTAINER_VERSION) {
    throw AppError.invalidContainer(`Unsupported container version: ${version}`, { version });
  }

  return { magic, version, payloadSize: view.readBigUInt64LE(8) };
}
