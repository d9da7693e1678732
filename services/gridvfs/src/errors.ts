export type VfsErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'ALREADY_MAPPED'
  | 'PERMISSION_DENIED'
  | 'IO_FAILURE'
  | 'INVALID_ARGUMENT'
  | 'INTERNAL_INCONSISTENCY'
  | 'NOT_SUPPORTED';

export class VfsError extends Error {
  public readonly code: VfsErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: VfsErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VfsError';
    this.code = code;
    this.details = details;
  }
}

export function isVfsError(err: unknown, code?: VfsErrorCode): err is VfsError {
  return err instanceof VfsError && (code === undefined || err.code === code);
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
