/**
 * Version range resolution against a single package index.
 * Turns requirement strings into the concrete versions the index publishes.
 */

import type { PackageSource } from './package-index.js';
import { parseRequirement } from '../solver/requirement-parser.js';
import { filterVersions } from '../../utils/pep440.js';

export interface SolveOptions {
  /** Return every satisfying version instead of only the highest */
  allVersions?: boolean;
}

/**
 * Resolves requirement strings against one index.
 *
 * solve() maps each requirement's package name to its satisfying versions,
 * ascending. It throws PackageNotFoundError when the index does not know a
 * package; a known package with no satisfying version maps to an empty list.
 */
export interface VersionSolver {
  readonly source: PackageSource;
  solve(requirements: readonly string[], options?: SolveOptions): Promise<Map<string, string[]>>;
}

export class PythonVersionSolver implements VersionSolver {
  readonly source: PackageSource;

  constructor(source: PackageSource) {
    this.source = source;
  }

  async solve(requirements: readonly string[], options: SolveOptions = {}): Promise<Map<string, string[]>> {
    const { allVersions = false } = options;
    const solution = new Map<string, string[]>();

    for (const raw of requirements) {
      const requirement = parseRequirement(raw);
      const available = await this.source.getPackageVersions(requirement.name);
      const matching = filterVersions(available, requirement.spec);
      const selected = allVersions ? matching : matching.slice(-1);

      // Several requirements on the same project narrow each other
      const previous = solution.get(requirement.name);
      solution.set(
        requirement.name,
        previous ? previous.filter((version) => selected.includes(version)) : selected
      );
    }

    return solution;
  }
}

