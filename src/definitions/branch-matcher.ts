import picomatch from 'picomatch';
import type { BranchFilter } from './definition.types';

/**
 * Compile branch glob patterns (e.g. main, release/**, !release/old-*) into a matcher.
 * Patterns prefixed with ! exclude; with only exclusions every other branch matches.
 */
export function compileBranchFilter(patterns: readonly string[]): BranchFilter {
  const includes = patterns.filter((p) => !p.startsWith('!'));
  const excludes = patterns.filter((p) => p.startsWith('!')).map((p) => p.slice(1));

  const include = includes.length > 0 ? picomatch(includes, { dot: true }) : null;
  const exclude = excludes.length > 0 ? picomatch(excludes, { dot: true }) : null;

  return {
    patterns: Object.freeze([...patterns]),
    matches(branch: string): boolean {
      if (exclude && exclude(branch)) return false;
      return include ? include(branch) : true;
    },
  };
}
