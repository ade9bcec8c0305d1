/**
 * Conditions Module Index
 *
 * Wildcard matching for action and resource patterns.
 */

export {
  WildcardPattern,
  WildcardMatcher,
  wildcardMatch,
  findMatchingPattern,
  matchesAnyPattern,
  globMatch,
} from "./WildcardMatcher";
