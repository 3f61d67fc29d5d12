/**
 * Token bucket rate limiter
 *
 * Holds up to `capacity` tokens and refills them continuously at
 * capacity / periodSeconds tokens per second. Non-blocking: a refused
 * request leaves the bucket untouched.
 */

import { ValidationError } from '../errors.js'

export interface TokenBucketOptions {
  capacity: number
  periodSeconds: number
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number
}

export interface RateLimiterState {
  capacity: number
  availableTokens: number
  /** Epoch milliseconds of the last refill */
  lastRefillTime: number
}

export class TokenBucket {
  private readonly capacity: number
  private readonly periodSeconds: number
  private readonly now: () => number
  private availableTokens: number
  private lastRefillTime: number

  constructor(options: TokenBucketOptions) {
    if (!(options.capacity > 0) || !(options.periodSeconds > 0)) {
      throw new ValidationError('Token bucket capacity and period must be positive', {
        capacity: options.capacity,
        periodSeconds: options.periodSeconds,
      })
    }
    this.capacity = options.capacity
    this.periodSeconds = options.periodSeconds
    this.now = options.now ?? Date.now
    this.availableTokens = options.capacity
    this.lastRefillTime = this.now()
  }

  /**
   * Add tokens for the time elapsed since the last refill, capped at capacity.
   * A clock that moves backwards adds nothing.
   */
  refill(): void {
    const now = this.now()
    const elapsedSeconds = Math.max(0, (now - this.lastRefillTime) / 1000)
    this.availableTokens = Math.min(
      this.capacity,
      this.availableTokens + (elapsedSeconds / this.periodSeconds) * this.capacity
    )
    this.lastRefillTime = now
  }

  tryConsume(tokens = 1): boolean {
    if (!(tokens > 0)) {
      throw new ValidationError('tokens must be positive', { tokens })
    }
    this.refill()
    if (this.availableTokens >= tokens) {
      this.availableTokens -= tokens
      return true
    }
    return false
  }

  getState(): RateLimiterState {
    return {
      capacity: this.capacity,
      availableTokens: this.availableTokens,
      lastRefillTime: this.lastRefillTime,
    }
  }
}
