export interface ClockPort {
  now(): Date;
}

export interface CachePort<V> {
  getOrFetch(key: string, ttlMs: number, fetch: () => Promise<V>): Promise<V>;
}
