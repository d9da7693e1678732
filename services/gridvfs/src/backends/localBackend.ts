import { constants as fsConstants, promises as fs, type Stats } from 'node:fs';
import path from 'node:path';
import { joinPath, normalizePath } from '../utils/path';
import {
  BackendError,
  type BackendErrorReason,
  type BackendSession,
  type ObjectKind,
  type ObjectMetadata,
  type StorageBackend
} from './types';

export interface LocalBackendOptions {
  rootDirectory: string;
  zone: string;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function reasonForErrno(code: string | undefined): BackendErrorReason {
  switch (code) {
    case 'ENOENT':
      return 'NOT_FOUND';
    case 'EEXIST':
      return 'ALREADY_EXISTS';
    case 'EACCES':
    case 'EPERM':
      return 'PERMISSION_DENIED';
    default:
      return 'IO';
  }
}

function toBackendError(err: unknown, backendPath: string): BackendError {
  if (err instanceof BackendError) {
    return err;
  }
  const code = errnoCode(err);
  const message = err instanceof Error ? err.message : String(err);
  return new BackendError(message, reasonForErrno(code), backendPath, { cause: err });
}

function creationTime(stats: Stats): Date {
  // Some filesystems report no birth time at all.
  return stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime;
}

/**
 * Serves a local directory as if it were the grid: backend path `/` is
 * `rootDirectory`, owners are reported by numeric uid within `zone`.
 */
export class LocalBackend implements StorageBackend {
  public readonly kind = 'local';
  private readonly resolvedRoot: string;
  private openCount = 0;

  constructor(private readonly options: LocalBackendOptions) {
    this.resolvedRoot = path.resolve(options.rootDirectory);
  }

  get activeSessions(): number {
    return this.openCount;
  }

  async openSession(): Promise<BackendSession> {
    this.openCount += 1;
    let released = false;

    const run = async <T>(backendPath: string, fn: (resolved: string) => Promise<T>): Promise<T> => {
      if (released) {
        throw new BackendError('Session already released', 'IO', backendPath);
      }
      const resolved = this.resolve(backendPath);
      try {
        return await fn(resolved);
      } catch (err) {
        throw toBackendError(err, backendPath);
      }
    };

    const probe = (backendPath: string, mode: number) =>
      run(backendPath, async (resolved) => {
        try {
          await fs.access(resolved, mode);
          return true;
        } catch (err) {
          const code = errnoCode(err);
          if (code === 'EACCES' || code === 'EPERM') {
            return false;
          }
          throw err;
        }
      });

    return {
      stat: (backendPath) =>
        run(backendPath, async (resolved): Promise<ObjectMetadata> => {
          const stats = await fs.stat(resolved);
          const kind: ObjectKind = stats.isDirectory() ? 'directory' : 'file';
          return {
            path: normalizePath(backendPath),
            kind,
            sizeBytes: kind === 'directory' ? 0 : stats.size,
            ownerName: String(stats.uid),
            ownerZone: this.options.zone,
            createdAt: creationTime(stats),
            modifiedAt: stats.mtime
          };
        }),
      canRead: (backendPath) => probe(backendPath, fsConstants.R_OK),
      canWrite: (backendPath) => probe(backendPath, fsConstants.W_OK),
      canExecute: (backendPath) => probe(backendPath, fsConstants.X_OK),
      create: (backendPath, kind) =>
        run(backendPath, async (resolved) => {
          if (kind === 'directory') {
            await fs.mkdir(resolved);
          } else {
            await fs.writeFile(resolved, '', { flag: 'wx' });
          }
        }),
      list: (backendPath) =>
        run(backendPath, async (resolved) => {
          const names = await fs.readdir(resolved);
          const parent = normalizePath(backendPath);
          return names.map((name) => joinPath(parent, name));
        }),
      capacity: () =>
        run('/', async (resolved) => {
          const stats = await fs.statfs(resolved);
          return {
            totalBytes: stats.blocks * stats.bsize,
            freeBytes: stats.bavail * stats.bsize
          };
        }),
      release: async () => {
        if (released) {
          return;
        }
        released = true;
        this.openCount -= 1;
      }
    };
  }

  private resolve(backendPath: string): string {
    const normalized = normalizePath(backendPath);
    const resolved = path.resolve(this.resolvedRoot, `.${normalized}`);
    if (resolved !== this.resolvedRoot && !resolved.startsWith(`${this.resolvedRoot}${path.sep}`)) {
      throw new BackendError('Resolved path escapes backend root', 'PERMISSION_DENIED', backendPath);
    }
    return resolved;
  }
}

export function createLocalBackend(options: LocalBackendOptions): LocalBackend {
  return new LocalBackend(options);
}
