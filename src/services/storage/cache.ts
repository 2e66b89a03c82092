// In-memory TTL cache for fetched resource descriptions

/**
 * Cache entry with TTL support
 */
interface CacheEntry<T> {
  data: T;
  timestamp: number;
  expiresAt: number;
}

/**
 * Cache configuration options
 */
export interface CacheConfig {
  /** Time-to-live in milliseconds (default: 60 seconds) */
  ttl: number;
  /** Maximum number of entries (default: 500) */
  maxEntries: number;
  /** Enable/disable cache (default: true) */
  enabled: boolean;
  /** Clock, replaceable in tests */
  now: () => number;
}

const DEFAULT_CONFIG: CacheConfig = {
  ttl: 60000,
  maxEntries: 500,
  enabled: true,
  now: () => Date.now()
};

/**
 * Simple in-memory cache with TTL expiry and oldest-first eviction.
 *
 * Concurrent workers may ask for the same key at once; `getOrLoad`
 * shares a single pending load between them.
 */
export class TtlCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private pending: Map<string, Promise<T>> = new Map();
  private config: CacheConfig;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Gets a cached value if available and not expired
   */
  get(key: string): T | undefined {
    if (!this.config.enabled) return undefined;

    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.config.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.data;
  }

  /**
   * Stores a value
   */
  set(key: string, data: T): void {
    if (!this.config.enabled) return;

    if (!this.cache.has(key) && this.cache.size >= this.config.maxEntries) {
      this.evictOldest();
    }

    const now = this.config.now();
    this.cache.set(key, {
      data,
      timestamp: now,
      expiresAt: now + this.config.ttl
    });
  }

  /**
   * Returns the cached value, or runs `loader` and caches its result.
   * A rejected load is not cached.
   */
  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const load = loader()
      .then(data => {
        this.set(key, data);
        return data;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, load);
    return load;
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  /**
   * Invalidates all cache entries
   */
  invalidate(): void {
    this.cache.clear();
  }

  /**
   * Removes every expired entry
   */
  cleanup(): number {
    const now = this.config.now();
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Evicts the oldest cache entry
   */
  private evictOldest(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache) {
      if (entry.timestamp < oldestTime) {
        oldestTime = entry.timestamp;
        oldestKey = key;
      }
    }

    if (oldestKey !== null) {
      this.cache.delete(oldestKey);
    }
  }

  /**
   * Gets cache statistics
   */
  getStats(): { size: number; pending: number; enabled: boolean; ttl: number } {
    return {
      size: this.cache.size,
      pending: this.pending.size,
      enabled: this.config.enabled,
      ttl: this.config.ttl
    };
  }
}
