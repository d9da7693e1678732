import { VfsError } from '../errors';
import { ROOT_HANDLE, type Handle } from './types';

/**
 * Issues inode numbers for the lifetime of the process. Handle 1 belongs to
 * the root and is handed out once through `reserveRoot`; everything else
 * starts at 2. Increments happen synchronously, so interleaved async callers
 * can never observe the same value.
 */
export class InodeAllocator {
  private last: Handle = ROOT_HANDLE;
  private rootReserved = false;

  reserveRoot(): Handle {
    if (this.rootReserved) {
      throw new VfsError('Root handle already reserved', 'INTERNAL_INCONSISTENCY');
    }
    this.rootReserved = true;
    return ROOT_HANDLE;
  }

  next(): Handle {
    this.last += 1n;
    return this.last;
  }

  peek(): Handle {
    return this.last;
  }
}
