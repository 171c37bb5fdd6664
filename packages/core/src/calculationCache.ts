import { validatePositive } from "./errors";

const stableNormalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(stableNormalize);
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, inner]) => [key, stableNormalize(inner)]),
    );
  }
  return value;
};

export const stableJson = (input: unknown): string => JSON.stringify(stableNormalize(input));

export const calculationFingerprint = (input: unknown): string => {
  const text = stableJson(input);
  let hash = 2166136261;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash +=
      (hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24);
  }
  return `fnv1a-${(hash >>> 0).toString(16).padStart(8, "0")}`;
};

interface CacheEntry<T> {
  value: T;
  accessCount: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Bounded memo owned by the caller, keyed by the full key-sorted JSON of the
 * input. When full, the entry read the fewest times is evicted (oldest first
 * on a tie).
 */
export class CalculationCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxSize = 128) {
    validatePositive(maxSize, "maxSize");
  }

  getOrCompute(key: unknown, compute: () => T): T {
    const text = stableJson(key);
    const cached = this.entries.get(text);
    if (cached) {
      cached.accessCount += 1;
      this.hits += 1;
      return cached.value;
    }

    this.misses += 1;
    const value = compute();
    if (this.entries.size >= this.maxSize) {
      this.evictLeastAccessed();
    }
    this.entries.set(text, { value, accessCount: 0 });
    return value;
  }

  has(key: unknown): boolean {
    return this.entries.has(stableJson(key));
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  private evictLeastAccessed(): void {
    let victim: string | undefined;
    let fewest = Number.POSITIVE_INFINITY;
    for (const [text, entry] of this.entries) {
      if (entry.accessCount < fewest) {
        fewest = entry.accessCount;
        victim = text;
      }
    }
    if (victim !== undefined) {
      this.entries.delete(victim);
    }
  }
}
