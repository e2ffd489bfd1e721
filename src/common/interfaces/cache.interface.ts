/**
 * Cache service interface for abstraction over different cache implementations.
 * Allows future swapping between in-memory, Redis, etc.
 */
export interface ICacheService {
  /**
   * Get a value from cache by key
   */
  get<T>(key: string): Promise<T | null>;

  /**
   * Set a value in cache; without TTL the entry never expires
   */
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

  /**
   * Delete a key from cache
   */
  delete(key: string): Promise<void>;

  /**
   * Keys currently stored under a prefix
   */
  keys(prefix: string): Promise<string[]>;
}
