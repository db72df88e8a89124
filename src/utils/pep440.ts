import pep440 from '@renovatebot/pep440';
import type { SpecifierOperator, VersionConstraint } from '../types/index.js';

/**
 * PEP 440 helpers on top of @renovatebot/pep440.
 *
 * Python release numbers do not fit semver (epochs, four segment releases,
 * post and dev releases, local labels).
 */

export function isValidVersion(text: string): boolean {
  return pep440.valid(text) !== null;
}

/**
 * Pre and dev releases; false for anything that does not parse.
 */
export function isPrerelease(text: string): boolean {
  return pep440.explain(text)?.is_prerelease ?? false;
}

/**
 * Order two valid versions; negative when a sorts before b.
 */
export function compareVersions(a: string, b: string): number {
  return pep440.compare(a, b);
}

/**
 * PEP 440 equality (`1.0` equals `1.0.0`); plain string equality when
 * either side does not parse.
 */
export function sameVersion(a: string, b: string): boolean {
  return isValidVersion(a) && isValidVersion(b) ? pep440.compare(a, b) === 0 : a === b;
}

/**
 * Check one `operator version` clause, pre-releases included.
 */
export function matchesSpecifier(version: string, operator: SpecifierOperator, specVersion: string): boolean {
  return pep440.satisfies(version, `${operator}${specVersion}`, { prereleases: true });
}

/**
 * Whether a specifier set opts into pre-releases by naming one.
 */
export function specifiesPrerelease(constraints: readonly VersionConstraint[]): boolean {
  return constraints.some(([operator, text]) => {
    if (operator === '!=' || operator === '===') {
      return false;
    }
    return isPrerelease(text.endsWith('.*') ? text.slice(0, -2) : text);
  });
}

/**
 * Select every version satisfying all constraints, sorted ascending.
 *
 * Invalid version strings are dropped. Pre-releases are only returned when
 * a constraint names one, or when no final release matches.
 */
export function filterVersions(versions: readonly string[], constraints: readonly VersionConstraint[]): string[] {
  const matching = versions
    .filter((version) => isValidVersion(version))
    .filter((version) => constraints.every(([operator, spec]) => matchesSpecifier(version, operator, spec)))
    .sort(compareVersions);

  const finals = matching.filter((version) => !isPrerelease(version));
  return specifiesPrerelease(constraints) || finals.length === 0 ? matching : finals;
}
