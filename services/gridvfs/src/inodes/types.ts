/** 64-bit unsigned inode number. */
export type Handle = bigint;

export const ROOT_HANDLE: Handle = 1n;

export const MAX_HANDLE: Handle = 0xffff_ffff_ffff_ffffn;
