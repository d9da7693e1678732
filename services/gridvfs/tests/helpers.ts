import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import { createMemoryBackend, type MemoryBackend } from '../src/backends/memoryBackend';
import type { BackendSession, StorageBackend } from '../src/backends/types';
import { createStaticIdentityDirectory } from '../src/identity/directory';
import {
  GridVirtualFileSystem,
  type GridVirtualFileSystemOptions
} from '../src/vfs/virtualFileSystem';

export const ROOT_PATH = '/tempZone/home/rods';
export const FIXED_TIME = new Date('2024-03-01T12:00:00.000Z');

export function createTestLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export interface LogEntry {
  level: number;
  msg: string;
}

/** Logger that keeps every emitted line for assertions. */
export function createCapturingLogger(): { logger: FastifyBaseLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        const parsed: LogEntry = JSON.parse(line);
        entries.push({ level: parsed.level, msg: parsed.msg });
      }
    }
  );
  return { logger, entries };
}

export function createTestBackend(): MemoryBackend {
  return createMemoryBackend({
    ownerName: 'rods',
    ownerZone: 'tempZone',
    directories: [ROOT_PATH],
    capacityBytes: 1_000_000,
    now: () => FIXED_TIME
  });
}

/** Counts sessions opened against the wrapped backend. */
export class CountingBackend implements StorageBackend {
  public readonly kind: string;
  public opened = 0;

  constructor(private readonly inner: StorageBackend) {
    this.kind = inner.kind;
  }

  async openSession(): Promise<BackendSession> {
    this.opened += 1;
    return this.inner.openSession();
  }
}

export async function openTestVfs(
  backend: StorageBackend,
  overrides: Partial<GridVirtualFileSystemOptions> = {}
): Promise<GridVirtualFileSystem> {
  return GridVirtualFileSystem.open({
    backend,
    identities: createStaticIdentityDirectory({ 'rods#tempZone': '1001' }),
    rootPath: ROOT_PATH,
    logger: createTestLogger(),
    ...overrides
  });
}

export const owner = { uid: 1001, gid: 0 };
