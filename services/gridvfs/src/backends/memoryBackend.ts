import { getParentPath, normalizePath } from '../utils/path';
import {
  BackendError,
  type BackendCapacity,
  type BackendErrorReason,
  type BackendSession,
  type ObjectKind,
  type ObjectMetadata,
  type StorageBackend
} from './types';

type MemoryNode = {
  kind: ObjectKind;
  sizeBytes: number;
  ownerName: string;
  ownerZone: string;
  createdAt: Date;
  modifiedAt: Date;
  children: string[];
};

export type MemoryPermissions = {
  read: boolean;
  write: boolean;
  execute: boolean;
};

export interface MemoryBackendOptions {
  ownerName: string;
  ownerZone: string;
  /** Directories that exist before the first session opens. */
  directories?: string[];
  capacityBytes?: number;
  now?: () => Date;
}

const FULL_ACCESS: MemoryPermissions = { read: true, write: true, execute: true };

/**
 * In-process stand-in for the grid. Keeps a tree of objects, per-path
 * permission overrides and a count of open sessions so callers can assert
 * that nothing leaks.
 */
export class MemoryBackend implements StorageBackend {
  public readonly kind = 'memory';

  private readonly nodes = new Map<string, MemoryNode>();
  private readonly permissions = new Map<string, MemoryPermissions>();
  private readonly failures = new Map<string, BackendErrorReason>();
  private readonly now: () => Date;
  private readonly capacityBytes: number;
  private openCount = 0;
  private releaseFailure = false;

  constructor(private readonly options: MemoryBackendOptions) {
    this.now = options.now ?? (() => new Date());
    this.capacityBytes = options.capacityBytes ?? 1024 * 1024 * 1024;
    this.insert('/', 'directory', 0);
    for (const directory of options.directories ?? []) {
      this.mkdirp(normalizePath(directory));
    }
  }

  get activeSessions(): number {
    return this.openCount;
  }

  async openSession(): Promise<BackendSession> {
    this.openCount += 1;
    let released = false;
    const ensureOpen = () => {
      if (released) {
        throw new BackendError('Session already released', 'IO');
      }
    };

    return {
      stat: async (path) => {
        ensureOpen();
        return this.statNode(path);
      },
      canRead: async (path) => {
        ensureOpen();
        return this.permissionsFor(path).read;
      },
      canWrite: async (path) => {
        ensureOpen();
        return this.permissionsFor(path).write;
      },
      canExecute: async (path) => {
        ensureOpen();
        return this.permissionsFor(path).execute;
      },
      create: async (path, kind) => {
        ensureOpen();
        this.createNode(path, kind);
      },
      list: async (path) => {
        ensureOpen();
        const node = this.requireNode(path);
        if (node.kind !== 'directory') {
          throw new BackendError('Not a collection', 'IO', path);
        }
        return [...node.children];
      },
      capacity: async (): Promise<BackendCapacity> => {
        ensureOpen();
        let used = 0;
        for (const node of this.nodes.values()) {
          used += node.sizeBytes;
        }
        return { totalBytes: this.capacityBytes, freeBytes: Math.max(0, this.capacityBytes - used) };
      },
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        this.openCount -= 1;
        if (this.releaseFailure) {
          throw new BackendError('Session close failed', 'IO');
        }
      }
    };
  }

  setPermissions(path: string, permissions: Partial<MemoryPermissions>): void {
    const key = normalizePath(path);
    this.permissions.set(key, { ...this.permissionsFor(key), ...permissions });
  }

  /** Every subsequent call touching `path` fails with `reason`. */
  failOn(path: string, reason: BackendErrorReason): void {
    this.failures.set(normalizePath(path), reason);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  failReleases(enabled: boolean): void {
    this.releaseFailure = enabled;
  }

  /** Places an object behind the adapter's back, like another grid client would. */
  seed(path: string, kind: ObjectKind, sizeBytes = 0, owner?: { name: string; zone: string }): void {
    const key = normalizePath(path);
    const parent = getParentPath(key);
    if (parent !== null) {
      this.mkdirp(parent);
    }
    this.insert(key, kind, kind === 'file' ? sizeBytes : 0, owner);
  }

  private mkdirp(path: string): void {
    if (this.nodes.has(path)) {
      return;
    }
    const parent = getParentPath(path);
    if (parent !== null) {
      this.mkdirp(parent);
    }
    this.insert(path, 'directory', 0);
  }

  private insert(path: string, kind: ObjectKind, sizeBytes: number, owner?: { name: string; zone: string }): void {
    const timestamp = this.now();
    this.nodes.set(path, {
      kind,
      sizeBytes,
      ownerName: owner?.name ?? this.options.ownerName,
      ownerZone: owner?.zone ?? this.options.ownerZone,
      createdAt: timestamp,
      modifiedAt: timestamp,
      children: []
    });
    const parent = getParentPath(path);
    if (parent !== null) {
      const parentNode = this.nodes.get(parent);
      if (parentNode && !parentNode.children.includes(path)) {
        parentNode.children.push(path);
        parentNode.modifiedAt = timestamp;
      }
    }
  }

  private createNode(rawPath: string, kind: ObjectKind): void {
    const path = normalizePath(rawPath);
    this.checkFailure(path);
    if (this.nodes.has(path)) {
      throw new BackendError('Object already exists', 'ALREADY_EXISTS', path);
    }
    const parent = getParentPath(path);
    if (parent === null) {
      throw new BackendError('Object already exists', 'ALREADY_EXISTS', path);
    }
    const parentNode = this.requireNode(parent);
    if (parentNode.kind !== 'directory') {
      throw new BackendError('Parent is not a collection', 'IO', parent);
    }
    if (!this.permissionsFor(parent).write) {
      throw new BackendError('No write permission on collection', 'PERMISSION_DENIED', parent);
    }
    this.insert(path, kind, 0);
  }

  private statNode(rawPath: string): ObjectMetadata {
    const path = normalizePath(rawPath);
    const node = this.requireNode(path);
    return {
      path,
      kind: node.kind,
      sizeBytes: node.sizeBytes,
      ownerName: node.ownerName,
      ownerZone: node.ownerZone,
      createdAt: node.createdAt,
      modifiedAt: node.modifiedAt
    };
  }

  private requireNode(rawPath: string): MemoryNode {
    const path = normalizePath(rawPath);
    this.checkFailure(path);
    const node = this.nodes.get(path);
    if (!node) {
      throw new BackendError('Object not found', 'NOT_FOUND', path);
    }
    return node;
  }

  private permissionsFor(rawPath: string): MemoryPermissions {
    const path = normalizePath(rawPath);
    this.checkFailure(path);
    return this.permissions.get(path) ?? FULL_ACCESS;
  }

  private checkFailure(path: string): void {
    const reason = this.failures.get(path);
    if (reason) {
      throw new BackendError(`Injected ${reason} failure`, reason, path);
    }
  }
}

export function createMemoryBackend(options: MemoryBackendOptions): MemoryBackend {
  return new MemoryBackend(options);
}
