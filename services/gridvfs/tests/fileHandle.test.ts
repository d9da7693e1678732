import assert from 'node:assert/strict';
import test from 'node:test';
import { VfsError } from '../src/errors';
import { decodeFileHandle, encodeFileHandle, parseHandle } from '../src/inodes/fileHandle';

function isInvalidArgument(err: unknown): boolean {
  return err instanceof VfsError && err.code === 'INVALID_ARGUMENT';
}

test('file handles are eight big-endian bytes', () => {
  assert.deepEqual([...encodeFileHandle(1n)], [0, 0, 0, 0, 0, 0, 0, 1]);
  assert.deepEqual([...encodeFileHandle(0x0102n)], [0, 0, 0, 0, 0, 0, 1, 2]);
  assert.equal(decodeFileHandle(Uint8Array.from([0, 0, 0, 1, 0, 0, 0, 0])), 4294967296n);
  assert.equal(decodeFileHandle(encodeFileHandle(0xffff_ffff_ffff_ffffn)), 0xffff_ffff_ffff_ffffn);
});

test('malformed file handles are rejected', () => {
  assert.throws(() => decodeFileHandle(Uint8Array.from([1, 2, 3])), isInvalidArgument);
  assert.throws(() => decodeFileHandle(new Uint8Array(8)), isInvalidArgument);
  assert.throws(() => encodeFileHandle(0n), isInvalidArgument);
  assert.throws(() => encodeFileHandle(0x1_0000_0000_0000_0000n), isInvalidArgument);
});

test('parseHandle accepts decimal strings only', () => {
  assert.equal(parseHandle('42'), 42n);
  assert.equal(parseHandle(' 7 '), 7n);
  assert.throws(() => parseHandle('0'), isInvalidArgument);
  assert.throws(() => parseHandle('-1'), isInvalidArgument);
  assert.throws(() => parseHandle('abc'), isInvalidArgument);
  assert.throws(() => parseHandle('18446744073709551616'), isInvalidArgument);
});
