import assert from 'node:assert/strict';
import test from 'node:test';
import { VfsError } from '../src/errors';
import { InodeAllocator } from '../src/inodes/allocator';

test('first allocated handle follows the reserved root', () => {
  const allocator = new InodeAllocator();
  assert.equal(allocator.next(), 2n);
  assert.equal(allocator.next(), 3n);
  assert.equal(allocator.peek(), 3n);
});

test('root handle can be reserved only once', () => {
  const allocator = new InodeAllocator();
  assert.equal(allocator.reserveRoot(), 1n);
  assert.throws(
    () => allocator.reserveRoot(),
    (err: unknown) => err instanceof VfsError && err.code === 'INTERNAL_INCONSISTENCY'
  );
  assert.equal(allocator.next(), 2n);
});

test('concurrent callers receive distinct handles above the root', async () => {
  const allocator = new InodeAllocator();
  const handles = await Promise.all(
    Array.from({ length: 500 }, async (_, index) => {
      await new Promise<void>((resolve) => setTimeout(resolve, index % 7));
      return allocator.next();
    })
  );

  assert.equal(new Set(handles).size, 500);
  assert.ok(handles.every((handle) => handle > 1n));
  assert.equal(allocator.peek(), 501n);
});
