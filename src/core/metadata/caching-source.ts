/**
 * Memoizing wrapper around a metadata source.
 * Misses are cached too; call clear() when the underlying data changes.
 */

import type { MetadataSource, PackageMetadata } from './types.js';

export class CachingMetadataSource implements MetadataSource {
  readonly name: string;
  private readonly cache: Map<string, PackageMetadata | null> = new Map();

  constructor(private readonly source: MetadataSource) {
    this.name = source.name;
  }

  lookup(packageName: string): PackageMetadata | undefined {
    const cached = this.cache.get(packageName);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    const result = this.source.lookup(packageName);
    this.cache.set(packageName, result ?? null);
    return result;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
