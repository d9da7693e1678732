import type { FastifyBaseLogger } from 'fastify';
import { VfsError } from '../errors';
import type { ObjectMetadata } from '../backends/types';
import { formatOwner, type IdentityDirectory } from '../identity/directory';
import type { Handle } from '../inodes/types';
import type { AttributeRecord } from '../vfs/types';
import type { PermissionModel } from './permissions';

/** The grid has no groups. */
export const GRID_GID = 0;
export const GRID_DEVICE = 17;

const DECIMAL_ID = /^\d+$/;

export interface AttributeTranslatorOptions {
  identities: IdentityDirectory;
  permissions: PermissionModel;
  logger: FastifyBaseLogger;
}

export function parseIdentity(owner: string, raw: string): number {
  const trimmed = raw.trim();
  const parsed = DECIMAL_ID.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new VfsError('Owner identity is not a decimal number', 'IO_FAILURE', { owner, identity: raw });
  }
  return parsed;
}

export class AttributeTranslator {
  constructor(private readonly options: AttributeTranslatorOptions) {}

  async resolveUid(metadata: ObjectMetadata): Promise<number> {
    const owner = formatOwner(metadata.ownerName, metadata.ownerZone);
    let identity: string | null;
    try {
      identity = await this.options.identities.resolve(owner);
    } catch (err) {
      throw new VfsError('Identity lookup failed', 'IO_FAILURE', { owner }, { cause: err });
    }
    if (identity === null) {
      throw new VfsError('Owner has no identity', 'IO_FAILURE', { owner });
    }
    return parseIdentity(owner, identity);
  }

  async toAttributes(handle: Handle, metadata: ObjectMetadata): Promise<AttributeRecord> {
    const uid = await this.resolveUid(metadata);
    const modifiedMs = metadata.modifiedAt.getTime();
    const attributes: AttributeRecord = {
      ino: handle,
      fileId: handle,
      type: metadata.kind,
      mode: this.options.permissions.modeFor(metadata),
      nlink: 0,
      uid,
      gid: GRID_GID,
      size: metadata.sizeBytes,
      dev: GRID_DEVICE,
      rdev: GRID_DEVICE,
      // The grid keeps no access time.
      atimeMs: modifiedMs,
      mtimeMs: modifiedMs,
      ctimeMs: metadata.createdAt.getTime(),
      generation: modifiedMs
    };
    this.options.logger.trace({ path: metadata.path, handle: handle.toString() }, 'translated attributes');
    return attributes;
  }
}
