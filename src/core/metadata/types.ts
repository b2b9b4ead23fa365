import type { Dependency } from '../dependency-resolver/dependency-spec.js';

/**
 * What a metadata source knows about one package.
 */
export interface PackageMetadata {
  name: string;
  version: string;
  dependencies: Dependency[];
  description?: string;
  /** Repository the entry came from, when known */
  repository?: string;
}

/**
 * Synchronous package lookup. Implementations must not throw for unknown names.
 */
export interface MetadataSource {
  readonly name: string;
  lookup(packageName: string): PackageMetadata | undefined;
}
