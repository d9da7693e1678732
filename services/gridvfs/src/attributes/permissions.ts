import type { ObjectMetadata } from '../backends/types';

export const USER_READ = 0o400;
export const USER_WRITE = 0o200;
export const USER_EXECUTE = 0o100;
export const USER_MASK = USER_READ | USER_WRITE | USER_EXECUTE;

export function isUserReadSet(mask: number): boolean {
  return (mask & USER_READ) !== 0;
}

export function isUserWriteSet(mask: number): boolean {
  return (mask & USER_WRITE) !== 0;
}

export function isUserExecuteSet(mask: number): boolean {
  return (mask & USER_EXECUTE) !== 0;
}

/** Produces the permission bits reported in an attribute record. */
export interface PermissionModel {
  name: string;
  modeFor(metadata: ObjectMetadata): number;
}

/**
 * Grid ACLs are not mapped yet: every object reports owner read/write no
 * matter what the backend would allow.
 */
export const fixedPermissionModel: PermissionModel = {
  name: 'fixed',
  modeFor() {
    return USER_READ | USER_WRITE;
  }
};
