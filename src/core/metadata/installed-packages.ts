import type { MetadataSource, PackageMetadata } from './types.js';

/**
 * Packages already present on the system. One entry per name.
 */
export class InstalledPackages implements MetadataSource {
  readonly name = 'installed';
  private readonly packages: Map<string, PackageMetadata> = new Map();

  constructor(packages: PackageMetadata[] = []) {
    for (const pkg of packages) {
      this.add(pkg);
    }
  }

  /** Later entries replace earlier ones with the same name */
  add(pkg: PackageMetadata): void {
    this.packages.set(pkg.name, pkg);
  }

  remove(packageName: string): boolean {
    return this.packages.delete(packageName);
  }

  has(packageName: string): boolean {
    return this.packages.has(packageName);
  }

  list(): PackageMetadata[] {
    return Array.from(this.packages.values());
  }

  lookup(packageName: string): PackageMetadata | undefined {
    return this.packages.get(packageName);
  }
}
