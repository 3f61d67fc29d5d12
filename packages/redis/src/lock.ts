import { createId } from '@paralleldrive/cuid2'

const RELEASE_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`

const EXTEND_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("pexpire", KEYS[1], ARGV[2])
  else
    return 0
  end
`

export const LOCK_SCRIPTS = {
  release: RELEASE_LUA,
  extend: EXTEND_LUA,
} as const

export const DEFAULT_LOCK_TTL_MS = 120_000

/**
 * The subset of ioredis commands the lock needs.
 * An ioredis client satisfies it structurally.
 */
export interface LockCommands {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<string | null>
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>
}

export interface RedisLockHandle {
  key: string
  token: string
}

/**
 * Acquire a lock with owner token + TTL.
 * Returns null if the lock is already held.
 */
export async function acquireRedisLock(
  redis: LockCommands,
  key: string,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<RedisLockHandle | null> {
  const token = createId()
  const result = await redis.set(key, token, 'PX', ttlMs, 'NX')
  if (result !== 'OK') {
    return null
  }
  return { key, token }
}

/**
 * Release a lock only if the token matches the current owner.
 */
export async function releaseRedisLock(
  redis: LockCommands,
  handle: RedisLockHandle
): Promise<boolean> {
  const result = await redis.eval(RELEASE_LUA, 1, handle.key, handle.token)
  return Number(result) === 1
}

/**
 * Extend a lock TTL only if the token matches the current owner.
 */
export async function extendRedisLock(
  redis: LockCommands,
  handle: RedisLockHandle,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<boolean> {
  const result = await redis.eval(EXTEND_LUA, 1, handle.key, handle.token, ttlMs.toString())
  return Number(result) === 1
}
