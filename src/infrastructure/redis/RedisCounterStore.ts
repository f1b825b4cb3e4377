import Redis from "ioredis";
import type { CounterStore } from "../../ports/CounterStore";

const SCAN_BATCH = 200;

export const REDIS_MAX_RETRIES_PER_REQUEST = 3;

/**
 * The connection itself keeps reconnecting with backoff, but a command issued
 * during an outage, BLPOP included, rejects with MaxRetriesPerRequestError
 * after three failed reconnects. That rejection is what ends the worker loop.
 */
export const redisOptions = {
  lazyConnect: true,
  maxRetriesPerRequest: REDIS_MAX_RETRIES_PER_REQUEST,
  retryStrategy: (times: number) => Math.min(times * 500, 30_000)
};

/**
 * Redis-backed counter store.
 *
 * BLPOP holds its connection until it returns, so pops go through a duplicate
 * connection and never queue up behind, or in front of, counter commands.
 */
export class RedisCounterStore implements CounterStore {
  private blocking?: Redis;

  constructor(private readonly redis: Redis) {}

  static fromUrl(redisUrl: string): RedisCounterStore {
    return new RedisCounterStore(new Redis(redisUrl, redisOptions));
  }

  incr(key: string): Promise<number> {
    return this.redis.incr(key);
  }

  decr(key: string): Promise<number> {
    return this.redis.decr(key);
  }

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string | number): Promise<void> {
    await this.redis.set(key, String(value));
  }

  async blockingPop(queue: string, timeoutSeconds: number): Promise<string | null> {
    this.blocking ??= this.redis.duplicate();
    const popped = await this.blocking.blpop(queue, timeoutSeconds);
    return popped ? popped[1] : null;
  }

  // RPUSH + BLPOP keeps the queue first-in, first-out.
  push(queue: string, value: string): Promise<number> {
    return this.redis.rpush(queue, value);
  }

  async keys(pattern: string): Promise<string[]> {
    const found = new Set<string>();
    let cursor = "0";
    do {
      const [next, batch] = await this.redis.scan(cursor, "MATCH", pattern, "COUNT", SCAN_BATCH);
      for (const key of batch) found.add(key);
      cursor = next;
    } while (cursor !== "0");
    return Array.from(found);
  }

  async close(): Promise<void> {
    await this.blocking?.quit();
    await this.redis.quit();
    this.blocking = undefined;
  }
}
