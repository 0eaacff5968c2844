/**
 * A Redis lock held by this process
 */
export interface Lock {
  resource: string;
  /** "{uuid}:{timestamp}"; only the holder of this value may release */
  value: string;
  /** Unix time in ms after which Redis drops the key */
  expiresAt: number;
}

export interface AcquireLockOptions {
  /** Lock lifetime in ms */
  ttl?: number;
  /** Attempts after the first; 0 gives up immediately when held elsewhere */
  maxRetry?: number;
  /** Base backoff between attempts in ms */
  retryDelay?: number;
}

export type LockedResult<T> =
  | { success: true; result: T }
  | { success: false; result: null };
