import { DEFAULT_EXCLUDED_PATHS } from '@gatehouse/shared';

/**
 * Ordered, immutable set of path prefixes that skip token validation.
 * Matching is a case-insensitive prefix test.
 */
export class ExcludedPaths {
  private readonly prefixes: readonly string[];

  constructor(prefixes: Iterable<string>) {
    const seen = new Set<string>();
    const ordered: string[] = [];
    for (const prefix of prefixes) {
      const normalized = prefix.trim().toLowerCase();
      if (normalized.length === 0 || seen.has(normalized)) continue;
      seen.add(normalized);
      ordered.push(normalized);
    }
    this.prefixes = Object.freeze(ordered);
  }

  static defaults(): ExcludedPaths {
    return new ExcludedPaths(DEFAULT_EXCLUDED_PATHS);
  }

  matches(path: string | undefined): boolean {
    if (!path) return false;
    const lower = path.toLowerCase();
    return this.prefixes.some(prefix => lower.startsWith(prefix));
  }

  /** Returns a new set with the extra prefixes appended. */
  with(...extra: string[]): ExcludedPaths {
    return new ExcludedPaths([...this.prefixes, ...extra]);
  }

  list(): readonly string[] {
    return this.prefixes;
  }
}
