/**
 * Package metadata sources consumed by the dependency resolver
 */

export type { PackageMetadata, MetadataSource } from './types.js';
export { RepositorySet, type RepositoryOptions, type RepositorySummary } from './repository-set.js';
export { InstalledPackages } from './installed-packages.js';
export { CachingMetadataSource } from './caching-source.js';
