import { VfsError } from '../errors';

/**
 * Backend paths are absolute POSIX paths. Two spellings of the same location
 * (`/zone//home/`, `/zone/./home`) normalize to one string, which is the only
 * form the inode table ever sees. Components are kept byte for byte: a
 * trailing space or a backslash is part of the object name.
 */
export function normalizePath(input: string): string {
  if (input.length === 0) {
    throw new VfsError('Path must not be empty', 'INVALID_ARGUMENT');
  }
  if (!input.startsWith('/')) {
    throw new VfsError('Path must be absolute', 'INVALID_ARGUMENT', { path: input });
  }
  if (input.includes('\0')) {
    throw new VfsError('Path must not contain NUL', 'INVALID_ARGUMENT', { path: input });
  }

  const segments = input.split('/').filter((segment) => segment.length > 0 && segment !== '.');
  if (segments.includes('..')) {
    throw new VfsError('Path must not contain parent references', 'INVALID_ARGUMENT', { path: input });
  }
  return `/${segments.join('/')}`;
}

export function assertValidName(name: string): void {
  if (name.length === 0) {
    throw new VfsError('Name must not be empty', 'INVALID_ARGUMENT');
  }
  if (name === '.' || name === '..') {
    throw new VfsError('Name must not be a relative path component', 'INVALID_ARGUMENT', { name });
  }
  if (name.includes('/') || name.includes('\0')) {
    throw new VfsError('Name must not contain a separator or NUL', 'INVALID_ARGUMENT', { name });
  }
}

export function joinPath(parent: string, name: string): string {
  assertValidName(name);
  const base = normalizePath(parent);
  return base === '/' ? `/${name}` : `${base}/${name}`;
}

export function getParentPath(target: string): string | null {
  const normalized = normalizePath(target);
  if (normalized === '/') {
    return null;
  }
  const index = normalized.lastIndexOf('/');
  return index === 0 ? '/' : normalized.slice(0, index);
}

export function getNodeName(target: string): string {
  const normalized = normalizePath(target);
  return normalized.slice(normalized.lastIndexOf('/') + 1);
}

export function isWithin(root: string, target: string): boolean {
  if (root === '/') {
    return true;
  }
  return target === root || target.startsWith(`${root}/`);
}
