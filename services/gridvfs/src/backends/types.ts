export type ObjectKind = 'file' | 'directory';

export type ObjectMetadata = {
  path: string;
  kind: ObjectKind;
  sizeBytes: number;
  ownerName: string;
  ownerZone: string;
  createdAt: Date;
  modifiedAt: Date;
};

export type BackendCapacity = {
  totalBytes: number;
  freeBytes: number;
};

export type BackendErrorReason = 'NOT_FOUND' | 'ALREADY_EXISTS' | 'PERMISSION_DENIED' | 'IO';

export class BackendError extends Error {
  public readonly reason: BackendErrorReason;
  public readonly path?: string;

  constructor(message: string, reason: BackendErrorReason, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendError';
    this.reason = reason;
    this.path = path;
  }
}

/**
 * One connection to the storage backend. Sessions are a limited resource:
 * whoever opens one must release it, see `withSession`.
 */
export interface BackendSession {
  stat(path: string): Promise<ObjectMetadata>;
  canRead(path: string): Promise<boolean>;
  canWrite(path: string): Promise<boolean>;
  canExecute(path: string): Promise<boolean>;
  create(path: string, kind: ObjectKind): Promise<void>;
  /** Absolute paths of the immediate children, in backend order. */
  list(path: string): Promise<string[]>;
  capacity?(): Promise<BackendCapacity>;
  release(): Promise<void>;
}

export interface StorageBackend {
  kind: string;
  openSession(): Promise<BackendSession>;
}
