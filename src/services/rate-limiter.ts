import { setTimeout as delay } from "node:timers/promises"

export class QueueOverflowError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "QueueOverflowError"
  }
}

interface QueueItem {
  run: () => Promise<void>
}

export interface RateLimiterOptions {
  requestsPerSecond: number
  maxQueued: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Spaces outbound calls to a provider at a fixed requests-per-second rate.
 * Rejects immediately with {@link QueueOverflowError} when the queue is full.
 */
export class RateLimiterQueue {
  private readonly minIntervalMs: number
  private readonly maxQueued: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly queue: QueueItem[] = []

  private isRunning = false
  private nextAvailableAt = 0

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = 1000 / Math.max(1, options.requestsPerSecond)
    this.maxQueued = Math.max(1, options.maxQueued)
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? ((ms) => delay(ms))
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    if (this.queue.length >= this.maxQueued) {
      return Promise.reject(new QueueOverflowError(`Search request queue is full (max=${this.maxQueued})`))
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task())
          } catch (error) {
            reject(error)
          }
        },
      })
      void this.pump()
    })
  }

  private async pump(): Promise<void> {
    if (this.isRunning) {
      return
    }
    this.isRunning = true

    try {
      while (this.queue.length > 0) {
        const waitMs = this.nextAvailableAt - this.now()
        if (waitMs > 0) {
          await this.sleep(waitMs)
        }

        const next = this.queue.shift()
        if (!next) {
          continue
        }

        this.nextAvailableAt = Math.max(this.nextAvailableAt, this.now()) + this.minIntervalMs
        await next.run()
      }
    } finally {
      this.isRunning = false
      if (this.queue.length > 0) {
        void this.pump()
      }
    }
  }
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number }

export interface SlidingWindowOptions {
  requestsPerMinute: number
  windowMs?: number
  now?: () => number
}

/** Per-client request counter over a trailing window (60 s by default). */
export class SlidingWindowRateLimiter {
  readonly requestsPerMinute: number
  private readonly windowMs: number
  private readonly now: () => number
  private readonly requests = new Map<string, number[]>()
  private lastSweepAt: number

  constructor(options: SlidingWindowOptions) {
    this.requestsPerMinute = Math.max(1, options.requestsPerMinute)
    this.windowMs = options.windowMs ?? 60_000
    this.now = options.now ?? Date.now
    this.lastSweepAt = this.now()
  }

  /** Number of clients with requests still inside the window (or not yet swept). */
  get trackedClients(): number {
    return this.requests.size
  }

  isAllowed(clientId: string): boolean {
    return this.active(clientId).length < this.requestsPerMinute
  }

  record(clientId: string): void {
    const timestamps = this.active(clientId)
    timestamps.push(this.now())
    this.requests.set(clientId, timestamps)
  }

  remaining(clientId: string): number {
    return Math.max(0, this.requestsPerMinute - this.active(clientId).length)
  }

  /** Seconds until the oldest counted request leaves the window; 0 when none are counted. */
  resetSeconds(clientId: string): number {
    const oldest = this.active(clientId)[0]
    if (oldest === undefined) {
      return 0
    }
    return Math.max(0, Math.ceil((this.windowMs - (this.now() - oldest)) / 1000))
  }

  consume(clientId: string): RateLimitDecision {
    this.maybeSweep()

    if (!this.isAllowed(clientId)) {
      return { allowed: false, retryAfterSeconds: Math.max(1, this.resetSeconds(clientId)) }
    }

    this.record(clientId)
    return { allowed: true, remaining: this.remaining(clientId) }
  }

  /** Drops idle clients, at most once per window. */
  private maybeSweep(): void {
    const now = this.now()
    if (now - this.lastSweepAt < this.windowMs) {
      return
    }

    this.lastSweepAt = now
    const cutoff = now - this.windowMs
    for (const [clientId, timestamps] of this.requests) {
      const newest = timestamps[timestamps.length - 1]
      if (newest === undefined || newest <= cutoff) {
        this.requests.delete(clientId)
      }
    }
  }

  private active(clientId: string): number[] {
    const cutoff = this.now() - this.windowMs
    const timestamps = (this.requests.get(clientId) ?? []).filter((ts) => ts > cutoff)
    if (timestamps.length === 0) {
      this.requests.delete(clientId)
    } else {
      this.requests.set(clientId, timestamps)
    }
    return timestamps
  }
}
