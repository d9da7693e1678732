import assert from 'node:assert/strict';
import test from 'node:test';
import { VfsError } from '../src/errors';
import { getNodeName, getParentPath, isWithin, joinPath, normalizePath } from '../src/utils/path';

function isInvalidArgument(err: unknown): boolean {
  return err instanceof VfsError && err.code === 'INVALID_ARGUMENT';
}

test('normalizePath collapses separators and dot segments', () => {
  assert.equal(normalizePath('/tempZone//home/rods/'), '/tempZone/home/rods');
  assert.equal(normalizePath('/a/./b//c'), '/a/b/c');
  assert.equal(normalizePath('/'), '/');
  assert.equal(normalizePath('//'), '/');
});

test('normalizePath keeps component bytes intact', () => {
  assert.equal(normalizePath('/zone/report '), '/zone/report ');
  assert.equal(normalizePath('/zone/a\\b'), '/zone/a\\b');
  assert.equal(normalizePath('/zone/ lead/'), '/zone/ lead');
});

test('normalizePath rejects empty and relative paths', () => {
  assert.throws(() => normalizePath('   '), isInvalidArgument);
  assert.throws(() => normalizePath(''), isInvalidArgument);
  assert.throws(() => normalizePath('tempZone/home'), isInvalidArgument);
  assert.throws(() => normalizePath('\\zone\\home'), isInvalidArgument);
  assert.throws(() => normalizePath('/a/../b'), isInvalidArgument);
  assert.throws(() => normalizePath('/a/b\0c'), isInvalidArgument);
});

test('joinPath appends a single name', () => {
  assert.equal(joinPath('/tempZone/home', 'rods'), '/tempZone/home/rods');
  assert.equal(joinPath('/', 'tempZone'), '/tempZone');
  assert.equal(joinPath('/a', 'b\\c'), '/a/b\\c');
  assert.equal(joinPath('/a', 'notes '), '/a/notes ');
  assert.throws(() => joinPath('/a', 'b/c'), isInvalidArgument);
  assert.throws(() => joinPath('/a', 'b\0c'), isInvalidArgument);
  assert.throws(() => joinPath('/a', '..'), isInvalidArgument);
  assert.throws(() => joinPath('/a', ''), isInvalidArgument);
});

test('parent and name helpers', () => {
  assert.equal(getParentPath('/a/b'), '/a');
  assert.equal(getParentPath('/a'), '/');
  assert.equal(getParentPath('/'), null);
  assert.equal(getParentPath('/a/b\\c'), '/a');
  assert.equal(getNodeName('/a/b.txt'), 'b.txt');
  assert.equal(getNodeName('/a/b\\c '), 'b\\c ');
});

test('isWithin respects segment boundaries', () => {
  assert.equal(isWithin('/a', '/a/b'), true);
  assert.equal(isWithin('/a', '/a'), true);
  assert.equal(isWithin('/a', '/ab'), false);
  assert.equal(isWithin('/', '/anything'), true);
});
