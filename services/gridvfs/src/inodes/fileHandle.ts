import { VfsError } from '../errors';
import { MAX_HANDLE, type Handle } from './types';

const FILE_HANDLE_BYTES = 8;

/** Opaque protocol file handle: the inode number as 8 big-endian bytes. */
export function encodeFileHandle(handle: Handle): Buffer {
  if (handle <= 0n || handle > MAX_HANDLE) {
    throw new VfsError('Handle out of range', 'INVALID_ARGUMENT', { handle: handle.toString() });
  }
  const buffer = Buffer.alloc(FILE_HANDLE_BYTES);
  buffer.writeBigUInt64BE(handle);
  return buffer;
}

export function decodeFileHandle(bytes: Uint8Array): Handle {
  if (bytes.length !== FILE_HANDLE_BYTES) {
    throw new VfsError('File handle must be 8 bytes', 'INVALID_ARGUMENT', { length: bytes.length });
  }
  const handle = Buffer.from(bytes).readBigUInt64BE(0);
  if (handle === 0n) {
    throw new VfsError('File handle must not be zero', 'INVALID_ARGUMENT');
  }
  return handle;
}

export function parseHandle(value: string): Handle {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new VfsError('Handle must be a positive integer', 'INVALID_ARGUMENT', { handle: value });
  }
  const handle = BigInt(trimmed);
  if (handle === 0n || handle > MAX_HANDLE) {
    throw new VfsError('Handle out of range', 'INVALID_ARGUMENT', { handle: value });
  }
  return handle;
}
