import type { FastifyBaseLogger } from 'fastify';
import type { BackendSession, StorageBackend } from './types';

/**
 * Runs `fn` against a fresh backend session and releases it on every exit
 * path. A failing release is logged and dropped so it never masks the
 * outcome of `fn`.
 */
export async function withSession<T>(
  backend: StorageBackend,
  logger: FastifyBaseLogger,
  fn: (session: BackendSession) => Promise<T>
): Promise<T> {
  const session = await backend.openSession();
  try {
    return await fn(session);
  } finally {
    try {
      await session.release();
    } catch (releaseErr) {
      logger.warn({ err: releaseErr, backend: backend.kind }, 'failed to release backend session');
    }
  }
}
