/**
 * Wildcard Pattern Matcher
 *
 * IAM-style `*` matching for policy actions and resources, plus a compiled
 * glob (`*` and `?`) for opaque ARN patterns.
 */

/**
 * Match `text` against `pattern`.
 *
 * Without `*` the two must be equal. Otherwise the text must start with the
 * piece before the first `*`, end with the piece after the last `*`, and
 * contain every interior piece in order without overlap. A bare `*` matches
 * anything, including the empty string.
 */
export function wildcardMatch(pattern: string, text: string): boolean {
  if (pattern === "*") {
    return true;
  }
  if (!pattern.includes("*")) {
    return pattern === text;
  }

  const pieces = pattern.split("*");
  const head = pieces[0];
  const tail = pieces[pieces.length - 1];

  if (head.length + tail.length > text.length) {
    return false;
  }
  if (!text.startsWith(head) || !text.endsWith(tail)) {
    return false;
  }

  let cursor = head.length;
  const limit = text.length - tail.length;
  for (const piece of pieces.slice(1, -1)) {
    if (piece === "") {
      continue;
    }
    const found = text.indexOf(piece, cursor);
    if (found < 0 || found + piece.length > limit) {
      return false;
    }
    cursor = found + piece.length;
  }
  return true;
}

/**
 * Compiled glob: `*` matches any run of characters, `?` exactly one.
 * Anchored at both ends.
 */
export class WildcardPattern {
  private readonly regex: RegExp;

  constructor(pattern: string) {
    const regexStr = pattern
      .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape regex special chars
      .replace(/\*/g, ".*")
      .replace(/\?/g, ".");
    this.regex = new RegExp(`^${regexStr}$`);
  }

  matches(value: string): boolean {
    return this.regex.test(value);
  }
}

/**
 * WildcardMatcher - cached glob matching
 */
export class WildcardMatcher {
  // Compiled glob cache
  private static patternCache: Map<string, WildcardPattern> = new Map();
  private static readonly CACHE_MAX_SIZE = 1000;

  private static getCachedPattern(pattern: string): WildcardPattern {
    let cached = this.patternCache.get(pattern);

    if (!cached) {
      if (this.patternCache.size >= this.CACHE_MAX_SIZE) {
        // Remove oldest entry
        const firstKey = this.patternCache.keys().next().value;
        if (firstKey !== undefined) {
          this.patternCache.delete(firstKey);
        }
      }
      cached = new WildcardPattern(pattern);
      this.patternCache.set(pattern, cached);
    }

    return cached;
  }

  static clearCache(): void {
    this.patternCache.clear();
  }

  static getCacheSize(): number {
    return this.patternCache.size;
  }

  /**
   * Glob match supporting `?` as well as `*`
   */
  matchesGlob(value: string, pattern: string): boolean {
    return WildcardMatcher.getCachedPattern(pattern).matches(value);
  }
}

const defaultMatcher = new WildcardMatcher();

/**
 * First pattern in `patterns` that matches `value`, if any
 */
export function findMatchingPattern(
  value: string,
  patterns: readonly string[],
): string | undefined {
  return patterns.find((pattern) => wildcardMatch(pattern, value));
}

export function matchesAnyPattern(
  value: string,
  patterns: readonly string[],
): boolean {
  return findMatchingPattern(value, patterns) !== undefined;
}

export function globMatch(value: string, pattern: string): boolean {
  return defaultMatcher.matchesGlob(value, pattern);
}
