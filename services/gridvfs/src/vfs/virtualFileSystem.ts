import type { FastifyBaseLogger } from 'fastify';
import { AttributeTranslator } from '../attributes/translator';
import { USER_MASK, fixedPermissionModel, type PermissionModel } from '../attributes/permissions';
import { withSession } from '../backends/session';
import { BackendError, type BackendSession, type ObjectKind, type StorageBackend } from '../backends/types';
import { VfsError, assertUnreachable, isVfsError, type VfsErrorCode } from '../errors';
import type { IdentityDirectory } from '../identity/directory';
import { InodeAllocator } from '../inodes/allocator';
import { InodeTable } from '../inodes/table';
import { ROOT_HANDLE, type Handle } from '../inodes/types';
import { assertValidName, getNodeName, getParentPath, isWithin, joinPath, normalizePath } from '../utils/path';
import { probeAccess } from './access';
import type { AttributeRecord, DirectoryEntry, FsStat, Principal } from './types';

export type VfsOperation =
  | 'getattr'
  | 'access'
  | 'create'
  | 'list'
  | 'lookup'
  | 'parentOf'
  | 'fsstat'
  | 'commit'
  | 'read'
  | 'write'
  | 'link'
  | 'symlink'
  | 'readlink'
  | 'remove'
  | 'move'
  | 'setattr';

export type VfsOperationOutcome = 'ok' | VfsErrorCode;

export interface GridVirtualFileSystemOptions {
  backend: StorageBackend;
  identities: IdentityDirectory;
  /** Backend path exported as handle 1. */
  rootPath: string;
  logger: FastifyBaseLogger;
  permissions?: PermissionModel;
  onOperation?: (operation: VfsOperation, outcome: VfsOperationOutcome) => void;
}

const OBJECT_KINDS: readonly ObjectKind[] = ['file', 'directory'];
const MAX_MODE = 0o7777;

function translateBackendError(err: unknown): VfsError {
  if (err instanceof VfsError) {
    return err;
  }
  if (err instanceof BackendError) {
    const details = err.path ? { path: err.path } : undefined;
    switch (err.reason) {
      case 'NOT_FOUND':
        return new VfsError(err.message, 'NOT_FOUND', details, { cause: err });
      case 'ALREADY_EXISTS':
        return new VfsError(err.message, 'ALREADY_EXISTS', details, { cause: err });
      case 'PERMISSION_DENIED':
        return new VfsError(err.message, 'PERMISSION_DENIED', details, { cause: err });
      case 'IO':
        return new VfsError(err.message, 'IO_FAILURE', details, { cause: err });
      default:
        return assertUnreachable(err.reason);
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return new VfsError(`Backend failure: ${message}`, 'IO_FAILURE', undefined, { cause: err });
}

function assertKind(kind: string): asserts kind is ObjectKind {
  if (!OBJECT_KINDS.some((candidate) => candidate === kind)) {
    throw new VfsError('Unsupported object kind', 'INVALID_ARGUMENT', { kind });
  }
}

function assertMask(mask: number, label: string): void {
  if (!Number.isInteger(mask) || mask < 0 || mask > MAX_MODE) {
    throw new VfsError(`${label} must be an integer between 0 and 0o7777`, 'INVALID_ARGUMENT', { [label]: mask });
  }
}

function assertPrincipal(owner: Principal): void {
  if (!Number.isInteger(owner.uid) || owner.uid < 0 || !Number.isInteger(owner.gid) || owner.gid < 0) {
    throw new VfsError('Owner uid and gid must be non-negative integers', 'INVALID_ARGUMENT', {
      uid: owner.uid,
      gid: owner.gid
    });
  }
}

function assertHandle(handle: Handle): void {
  if (handle <= 0n) {
    throw new VfsError('Handle must be positive', 'INVALID_ARGUMENT', { handle: handle.toString() });
  }
}

/**
 * Handle-addressed view of a path-addressed backend. Every operation
 * resolves its handles through the inode table before the backend is
 * touched, and every backend call runs inside a scoped session.
 */
export class GridVirtualFileSystem {
  private readonly table = new InodeTable();
  private readonly allocator = new InodeAllocator();
  private readonly translator: AttributeTranslator;
  private readonly logger: FastifyBaseLogger;
  private readonly backend: StorageBackend;
  readonly rootPath: string;

  private constructor(private readonly options: GridVirtualFileSystemOptions) {
    this.backend = options.backend;
    this.rootPath = normalizePath(options.rootPath);
    this.logger = options.logger.child({ component: 'vfs', backend: options.backend.kind });
    this.translator = new AttributeTranslator({
      identities: options.identities,
      permissions: options.permissions ?? fixedPermissionModel,
      logger: this.logger
    });
  }

  static async open(options: GridVirtualFileSystemOptions): Promise<GridVirtualFileSystem> {
    const vfs = new GridVirtualFileSystem(options);
    await vfs.establishRoot();
    return vfs;
  }

  get inodeCount(): number {
    return this.table.size;
  }

  getRootHandle(): Handle {
    return ROOT_HANDLE;
  }

  /** Path currently mapped to `handle`. */
  resolve(handle: Handle): string {
    assertHandle(handle);
    return this.table.pathFor(handle);
  }

  async getAttributes(handle: Handle): Promise<AttributeRecord> {
    return this.run('getattr', { handle: handle.toString() }, async () => {
      const path = this.resolve(handle);
      return withSession(this.backend, this.logger, (session) => this.statPath(session, path, handle));
    });
  }

  async checkAccess(handle: Handle, mask: number): Promise<number> {
    return this.run('access', { handle: handle.toString(), mask }, async () => {
      assertMask(mask, 'mask');
      const path = this.resolve(handle);
      try {
        return await withSession(this.backend, this.logger, (session) =>
          probeAccess(session, path, mask & USER_MASK, this.logger)
        );
      } catch (err) {
        throw new VfsError('Access check failed', 'IO_FAILURE', { path }, { cause: err });
      }
    });
  }

  async create(parent: Handle, name: string, kind: ObjectKind, owner: Principal, mode: number): Promise<Handle> {
    return this.run('create', { parent: parent.toString(), name, kind }, async () => {
      assertHandle(parent);
      assertValidName(name);
      assertKind(kind);
      assertPrincipal(owner);
      assertMask(mode, 'mode');

      const parentPath = this.table.pathFor(parent);
      const childPath = joinPath(parentPath, name);
      this.logger.debug({ path: childPath, kind }, 'creating object');

      await withSession(this.backend, this.logger, (session) => session.create(childPath, kind));

      const handle = this.registerSighted(childPath);
      this.applyOwnershipAndMode(childPath, owner, mode);
      this.logger.info({ path: childPath, handle: handle.toString(), kind }, 'created object');
      return handle;
    });
  }

  async list(handle: Handle): Promise<DirectoryEntry[]> {
    return this.run('list', { handle: handle.toString() }, async () => {
      const path = this.resolve(handle);
      return withSession(this.backend, this.logger, async (session) => {
        const children = await session.list(path);
        const entries: DirectoryEntry[] = [];
        for (const childPath of children) {
          const metadata = await this.statOptional(session, childPath);
          if (!metadata) {
            this.logger.debug({ path: childPath }, 'child vanished during listing');
            continue;
          }
          const childHandle = this.registerSighted(childPath);
          entries.push({
            name: getNodeName(childPath),
            handle: childHandle,
            attributes: await this.translator.toAttributes(childHandle, metadata)
          });
        }
        return entries;
      });
    });
  }

  async lookup(parent: Handle, name: string): Promise<Handle> {
    return this.run('lookup', { parent: parent.toString(), name }, async () => {
      const parentPath = this.resolve(parent);
      if (name === '.') {
        return parent;
      }
      if (name === '..') {
        return this.parentHandleOf(parentPath);
      }
      const childPath = joinPath(parentPath, name);
      await withSession(this.backend, this.logger, (session) => session.stat(childPath));
      return this.registerSighted(childPath);
    });
  }

  async parentOf(handle: Handle): Promise<Handle> {
    return this.run('parentOf', { handle: handle.toString() }, async () =>
      this.parentHandleOf(this.resolve(handle))
    );
  }

  async getFsStat(): Promise<FsStat> {
    return this.run('fsstat', {}, async () => {
      const capacity = await withSession(this.backend, this.logger, async (session) =>
        session.capacity ? session.capacity() : null
      );
      const totalBytes = capacity?.totalBytes ?? 0;
      const freeBytes = capacity?.freeBytes ?? 0;
      return {
        totalBytes,
        freeBytes,
        usedBytes: Math.max(0, totalBytes - freeBytes),
        totalFiles: Number.MAX_SAFE_INTEGER,
        usedFiles: this.table.size
      };
    });
  }

  /** Writes go straight to the grid, so there is nothing to flush. */
  async commit(handle: Handle): Promise<void> {
    return this.run('commit', { handle: handle.toString() }, async () => {
      this.resolve(handle);
    });
  }

  async read(handle: Handle): Promise<never> {
    return this.unsupported('read', [handle]);
  }

  async write(handle: Handle): Promise<never> {
    return this.unsupported('write', [handle]);
  }

  async link(parent: Handle, existing: Handle): Promise<never> {
    return this.unsupported('link', [parent, existing]);
  }

  async symlink(parent: Handle): Promise<never> {
    return this.unsupported('symlink', [parent]);
  }

  async readlink(handle: Handle): Promise<never> {
    return this.unsupported('readlink', [handle]);
  }

  async remove(parent: Handle): Promise<never> {
    return this.unsupported('remove', [parent]);
  }

  async move(source: Handle, target: Handle): Promise<never> {
    return this.unsupported('move', [source, target]);
  }

  async setAttributes(handle: Handle): Promise<never> {
    return this.unsupported('setattr', [handle]);
  }

  private async establishRoot(): Promise<void> {
    const rootPath = this.rootPath;
    this.logger.info({ rootPath }, 'establishing root');
    const readable = await withSession(this.backend, this.logger, async (session) => {
      try {
        await session.stat(rootPath);
        return await session.canRead(rootPath);
      } catch (err) {
        if (err instanceof BackendError && err.reason === 'NOT_FOUND') {
          return false;
        }
        throw translateBackendError(err);
      }
    });
    if (!readable) {
      throw new VfsError(`Cannot establish root at ${rootPath}`, 'NOT_FOUND', { rootPath });
    }
    this.table.register(this.allocator.reserveRoot(), rootPath);
  }

  private async statPath(session: BackendSession, path: string, handle: Handle): Promise<AttributeRecord> {
    const metadata = await session.stat(path);
    return this.translator.toAttributes(handle, metadata);
  }

  private async statOptional(session: BackendSession, path: string) {
    try {
      return await session.stat(path);
    } catch (err) {
      if (err instanceof BackendError && err.reason === 'NOT_FOUND') {
        return null;
      }
      throw err;
    }
  }

  /**
   * Existing handle for a path the backend just reported, or a fresh one.
   * A collision here means the allocator or the table is broken.
   */
  private registerSighted(path: string): Handle {
    try {
      return this.table.resolveOrRegister(path, this.allocator);
    } catch (err) {
      if (isVfsError(err, 'ALREADY_MAPPED')) {
        throw new VfsError('Inode table collision on a fresh handle', 'INTERNAL_INCONSISTENCY', err.details, {
          cause: err
        });
      }
      throw err;
    }
  }

  private parentHandleOf(path: string): Handle {
    const parentPath = getParentPath(path);
    if (path === this.rootPath || parentPath === null || !isWithin(this.rootPath, parentPath)) {
      return ROOT_HANDLE;
    }
    return this.registerSighted(parentPath);
  }

  private applyOwnershipAndMode(path: string, owner: Principal, mode: number): void {
    // TODO: map owner and mode onto grid ACLs once the backend exposes them.
    this.logger.debug({ path, uid: owner.uid, gid: owner.gid, mode }, 'ownership and mode not applied');
  }

  private async unsupported(operation: VfsOperation, handles: Handle[]): Promise<never> {
    return this.run(operation, { handles: handles.map((handle) => handle.toString()) }, async () => {
      for (const handle of handles) {
        this.resolve(handle);
      }
      throw new VfsError(`Operation ${operation} is not supported`, 'NOT_SUPPORTED', { operation });
    });
  }

  private async run<T>(
    operation: VfsOperation,
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      const result = await fn();
      this.options.onOperation?.(operation, 'ok');
      return result;
    } catch (err) {
      const error = translateBackendError(err);
      this.options.onOperation?.(operation, error.code);
      switch (error.code) {
        case 'INTERNAL_INCONSISTENCY':
          this.logger.fatal({ err: error, operation, ...context }, 'inode table consistency violated');
          break;
        case 'IO_FAILURE':
          this.logger.error({ err: error, operation, ...context }, 'backend operation failed');
          break;
        default:
          this.logger.debug({ code: error.code, operation, ...context }, error.message);
      }
      throw error;
    }
  }
}
