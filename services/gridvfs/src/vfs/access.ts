import type { FastifyBaseLogger } from 'fastify';
import type { BackendSession } from '../backends/types';
import {
  USER_EXECUTE,
  USER_READ,
  USER_WRITE,
  isUserExecuteSet,
  isUserReadSet,
  isUserWriteSet
} from '../attributes/permissions';

/**
 * Returns the subset of the requested user bits the backend grants. Write
 * access implies read access even when the backend's read probe says no.
 */
export async function probeAccess(
  session: BackendSession,
  path: string,
  mask: number,
  logger: FastifyBaseLogger
): Promise<number> {
  let granted = 0;

  if (isUserExecuteSet(mask) && (await session.canExecute(path))) {
    granted |= USER_EXECUTE;
  }

  let canWrite = false;
  if (isUserWriteSet(mask)) {
    canWrite = await session.canWrite(path);
    if (canWrite) {
      granted |= USER_WRITE;
    }
  }

  if (isUserReadSet(mask)) {
    if (canWrite) {
      granted |= USER_READ;
    } else if (await session.canRead(path)) {
      granted |= USER_READ;
    }
  }

  logger.debug({ path, requested: mask, granted }, 'access probed');
  return granted;
}
