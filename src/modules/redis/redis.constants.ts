/**
 * Redis constants for key patterns and lock configuration
 */

// Lock key patterns
export const LOCK_RESERVATION_SWEEP = 'lock:sweep:reservations';

// Idempotency cache for reservation requests
export const IDEMPOTENCY_RESERVE_PREFIX = 'idempotency:reserve:';
export const IDEMPOTENCY_TTL_MS = 3600000; // 1 hour

// Lock configuration defaults
export const DEFAULT_LOCK_TTL = 5000; // milliseconds
export const DEFAULT_MAX_RETRY = 3;
export const DEFAULT_RETRY_DELAY = 100; // milliseconds

// Redis injection token
export const REDIS_CLIENT = 'REDIS_CLIENT';

// Lua scripts for atomic operations
export const LUA_SCRIPTS = {
  /**
   * Acquire lock script
   * KEYS[1]: lock key
   * ARGV[1]: lock value (owner identifier)
   * ARGV[2]: TTL in milliseconds
   * Returns: "OK" if acquired, null if not
   */
  ACQUIRE_LOCK: `
    return redis.call('SET', KEYS[1], ARGV[1], 'NX', 'PX', ARGV[2])
  `,

  /**
   * Release lock script
   * KEYS[1]: lock key
   * ARGV[1]: lock value (owner identifier)
   * Returns: 1 if released, 0 if not owner or key doesn't exist
   */
  RELEASE_LOCK: `
    if redis.call('GET', KEYS[1]) == ARGV[1] then
      return redis.call('DEL', KEYS[1])
    else
      return 0
    end
  `,
} as const;
