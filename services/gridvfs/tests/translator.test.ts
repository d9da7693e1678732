import assert from 'node:assert/strict';
import test from 'node:test';
import { AttributeTranslator, parseIdentity } from '../src/attributes/translator';
import { fixedPermissionModel, type PermissionModel } from '../src/attributes/permissions';
import type { ObjectMetadata } from '../src/backends/types';
import { VfsError } from '../src/errors';
import {
  createPassthroughIdentityDirectory,
  createStaticIdentityDirectory,
  parseIdentityMap,
  type IdentityDirectory
} from '../src/identity/directory';
import { createTestLogger } from './helpers';

const metadata: ObjectMetadata = {
  path: '/tempZone/home/rods/report.csv',
  kind: 'file',
  sizeBytes: 12,
  ownerName: 'rods',
  ownerZone: 'tempZone',
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  modifiedAt: new Date('2024-02-01T00:00:00.000Z')
};

function isIoFailure(err: unknown): boolean {
  return err instanceof VfsError && err.code === 'IO_FAILURE';
}

function createTranslator(
  identities: IdentityDirectory,
  permissions: PermissionModel = fixedPermissionModel
): AttributeTranslator {
  return new AttributeTranslator({ identities, permissions, logger: createTestLogger() });
}

test('projects backend metadata onto an attribute record', async () => {
  const translator = createTranslator(createStaticIdentityDirectory({ 'rods#tempZone': '1001' }));
  const attributes = await translator.toAttributes(7n, metadata);

  assert.deepEqual(attributes, {
    ino: 7n,
    fileId: 7n,
    type: 'file',
    mode: 0o600,
    nlink: 0,
    uid: 1001,
    gid: 0,
    size: 12,
    dev: 17,
    rdev: 17,
    atimeMs: Date.parse('2024-02-01T00:00:00.000Z'),
    mtimeMs: Date.parse('2024-02-01T00:00:00.000Z'),
    ctimeMs: Date.parse('2024-01-01T00:00:00.000Z'),
    generation: Date.parse('2024-02-01T00:00:00.000Z')
  });
});

test('unknown owners fail as I/O errors', async () => {
  const translator = createTranslator(createStaticIdentityDirectory({}));
  await assert.rejects(translator.toAttributes(7n, metadata), isIoFailure);
});

test('identity directory failures fail as I/O errors', async () => {
  const translator = createTranslator({
    kind: 'broken',
    async resolve() {
      throw new Error('directory offline');
    }
  });
  await assert.rejects(translator.toAttributes(7n, metadata), isIoFailure);
});

test('identities must be decimal', async () => {
  const translator = createTranslator(createStaticIdentityDirectory({ 'rods#tempZone': '10x1' }));
  await assert.rejects(translator.toAttributes(7n, metadata), isIoFailure);

  assert.equal(parseIdentity('rods#tempZone', ' 42 '), 42);
  assert.throws(() => parseIdentity('rods#tempZone', '-5'), isIoFailure);
  assert.throws(() => parseIdentity('rods#tempZone', ''), isIoFailure);
  assert.throws(() => parseIdentity('rods#tempZone', '99999999999999999999'), isIoFailure);
});

test('permission bits come from the configured model', async () => {
  const model: PermissionModel = {
    name: 'kind-aware',
    modeFor: (target) => (target.kind === 'directory' ? 0o755 : 0o644)
  };
  const translator = createTranslator(createStaticIdentityDirectory({ 'rods#tempZone': '1001' }), model);

  const file = await translator.toAttributes(3n, metadata);
  const directory = await translator.toAttributes(4n, { ...metadata, kind: 'directory', sizeBytes: 0 });

  assert.equal(file.mode, 0o644);
  assert.equal(directory.mode, 0o755);
  assert.equal(directory.type, 'directory');
});

test('passthrough identities use the owner name', async () => {
  const directory = createPassthroughIdentityDirectory();
  assert.equal(await directory.resolve('1000#tempZone'), '1000');
  assert.equal(await directory.resolve('#tempZone'), null);

  const translator = createTranslator(directory);
  const attributes = await translator.toAttributes(2n, { ...metadata, ownerName: '1000' });
  assert.equal(attributes.uid, 1000);
});

test('identity maps parse name#zone=id pairs', () => {
  assert.deepEqual(parseIdentityMap('alice#tempZone=1001, bob#otherZone=1002,'), {
    'alice#tempZone': '1001',
    'bob#otherZone': '1002'
  });
  assert.throws(() => parseIdentityMap('alice#tempZone'));
  assert.throws(() => parseIdentityMap('=1001'));
});
