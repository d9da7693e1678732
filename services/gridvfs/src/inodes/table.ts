import { VfsError } from '../errors';
import { normalizePath } from '../utils/path';
import type { InodeAllocator } from './allocator';
import type { Handle } from './types';

export type InodeEntry = {
  handle: Handle;
  path: string;
};

/**
 * Bidirectional handle <-> path mapping.
 *
 * Both maps are private and every mutation happens inside one synchronous
 * call, so no caller can observe one direction without the other.
 */
export class InodeTable {
  private readonly pathsByHandle = new Map<Handle, string>();
  private readonly handlesByPath = new Map<string, Handle>();

  get size(): number {
    return this.pathsByHandle.size;
  }

  register(handle: Handle, rawPath: string): void {
    if (handle <= 0n) {
      throw new VfsError('Handle must be positive', 'INVALID_ARGUMENT', { handle: handle.toString() });
    }
    const path = normalizePath(rawPath);

    const existingPath = this.pathsByHandle.get(handle);
    if (existingPath !== undefined) {
      throw new VfsError('Handle is already mapped', 'ALREADY_MAPPED', {
        handle: handle.toString(),
        path: existingPath
      });
    }
    this.pathsByHandle.set(handle, path);

    const existingHandle = this.handlesByPath.get(path);
    if (existingHandle !== undefined) {
      this.rollback(handle, path);
      throw new VfsError('Path is already mapped', 'ALREADY_MAPPED', {
        handle: existingHandle.toString(),
        path
      });
    }
    this.handlesByPath.set(path, handle);
  }

  pathFor(handle: Handle): string {
    const path = this.pathsByHandle.get(handle);
    if (path === undefined) {
      throw new VfsError(`No object for inode #${handle}`, 'NOT_FOUND', { handle: handle.toString() });
    }
    return path;
  }

  handleFor(rawPath: string): Handle | undefined {
    return this.handlesByPath.get(normalizePath(rawPath));
  }

  /** Existing handle for the path, or a fresh one registered on first sighting. */
  resolveOrRegister(rawPath: string, allocator: InodeAllocator): Handle {
    const path = normalizePath(rawPath);
    const existing = this.handlesByPath.get(path);
    if (existing !== undefined) {
      return existing;
    }
    const handle = allocator.next();
    this.register(handle, path);
    return handle;
  }

  entries(): InodeEntry[] {
    return Array.from(this.pathsByHandle, ([handle, path]) => ({ handle, path }));
  }

  private rollback(handle: Handle, path: string): void {
    const written = this.pathsByHandle.get(handle);
    if (written !== path || !this.pathsByHandle.delete(handle)) {
      throw new VfsError('Inode table rollback failed', 'INTERNAL_INCONSISTENCY', {
        handle: handle.toString(),
        path
      });
    }
  }
}
