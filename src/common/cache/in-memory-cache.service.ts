import { Inject, Injectable } from '@nestjs/common';

import { INJECTION_TOKENS } from '../constants/injection-tokens';
import type { ICacheService } from '../interfaces/cache.interface';
import type { IClock } from '../interfaces/clock.interface';

/**
 * Cache entry with optional expiration timestamp
 */
interface CacheEntry {
  value: unknown;
  expiresAt?: number;
}

/**
 * In-memory cache implementation using Map with TTL support.
 * Suitable for single-instance deployments.
 */
@Injectable()
export class InMemoryCacheService implements ICacheService {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(@Inject(INJECTION_TOKENS.CLOCK) private readonly clock: IClock) {}

  async get<T>(key: string): Promise<T | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return null;
    }

    // El tipo lo fija quien escribió la clave
    return entry.value as T;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const expiresAt =
      ttlSeconds && ttlSeconds > 0
        ? this.clock.now().getTime() + ttlSeconds * 1000
        : undefined;
    this.cache.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const result: string[] = [];
    for (const [key, entry] of this.cache.entries()) {
      if (key.startsWith(prefix) && !this.isExpired(entry)) {
        result.push(key);
      }
    }
    return result;
  }

  private isExpired(entry: CacheEntry): boolean {
    return (
      entry.expiresAt !== undefined &&
      this.clock.now().getTime() > entry.expiresAt
    );
  }
}
