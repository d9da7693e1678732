import type { ObjectKind } from '../backends/types';
import type { Handle } from '../inodes/types';

export type AttributeRecord = {
  ino: Handle;
  fileId: Handle;
  type: ObjectKind;
  mode: number;
  nlink: number;
  uid: number;
  gid: number;
  size: number;
  dev: number;
  rdev: number;
  atimeMs: number;
  mtimeMs: number;
  ctimeMs: number;
  generation: number;
};

export type DirectoryEntry = {
  name: string;
  handle: Handle;
  attributes: AttributeRecord;
};

export type FsStat = {
  totalBytes: number;
  freeBytes: number;
  usedBytes: number;
  totalFiles: number;
  usedFiles: number;
};

/** Caller on whose behalf an object is created. */
export type Principal = {
  uid: number;
  gid: number;
  name?: string;
};
