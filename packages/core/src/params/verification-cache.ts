/**
 * Paths whose content already matched the manifest digest.
 *
 * Entries are never invalidated: a file changed on disk after it was
 * verified keeps reporting ok for the lifetime of the cache. Hashing a
 * multi-gigabyte parameter file is what this avoids.
 *
 * Lookups and inserts run on the event loop thread, so the set needs no lock.
 */
export class VerificationCache {
  private readonly verified = new Set<string>();

  has(path: string): boolean {
    return this.verified.has(path);
  }

  add(path: string): void {
    this.verified.add(path);
  }

  get size(): number {
    return this.verified.size;
  }
}
