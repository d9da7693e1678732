import assert from 'node:assert/strict';
import { afterEach, beforeEach, test } from 'node:test';
import { USER_EXECUTE, USER_READ, USER_WRITE } from '../src/attributes/permissions';
import type { MemoryBackend } from '../src/backends/memoryBackend';
import type { BackendSession } from '../src/backends/types';
import { probeAccess } from '../src/vfs/access';
import { ROOT_PATH, createTestBackend, createTestLogger } from './helpers';

const target = `${ROOT_PATH}/data.bin`;
let backend: MemoryBackend;
let session: BackendSession;

beforeEach(async () => {
  backend = createTestBackend();
  backend.seed(target, 'file', 4);
  session = await backend.openSession();
});

afterEach(async () => {
  await session.release();
});

test('write access implies read access', async () => {
  backend.setPermissions(target, { read: false, write: true });
  const granted = await probeAccess(session, target, USER_READ | USER_WRITE, createTestLogger());
  assert.equal(granted, USER_READ | USER_WRITE);
});

test('read is granted on its own when write is denied', async () => {
  backend.setPermissions(target, { read: true, write: false });
  const granted = await probeAccess(session, target, USER_READ | USER_WRITE, createTestLogger());
  assert.equal(granted, USER_READ);
});

test('only requested bits are returned', async () => {
  const granted = await probeAccess(session, target, USER_WRITE, createTestLogger());
  assert.equal(granted, USER_WRITE);
  assert.equal(await probeAccess(session, target, 0, createTestLogger()), 0);
});

test('execute is probed separately', async () => {
  assert.equal(await probeAccess(session, target, USER_EXECUTE, createTestLogger()), USER_EXECUTE);
  backend.setPermissions(target, { execute: false });
  assert.equal(await probeAccess(session, target, USER_EXECUTE | USER_READ, createTestLogger()), USER_READ);
});

test('nothing is granted when every probe fails', async () => {
  backend.setPermissions(target, { read: false, write: false, execute: false });
  const granted = await probeAccess(session, target, USER_READ | USER_WRITE | USER_EXECUTE, createTestLogger());
  assert.equal(granted, 0);
});
