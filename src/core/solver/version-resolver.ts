import type { PackageSource } from '../index/package-index.js';
import type { VersionSolver } from '../index/version-solver.js';
import { PackageNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Turns (name, range) into concrete versions at one index.
 *
 * Never throws: an unknown package and a failed lookup both come back as an
 * empty list and differ only in how they are logged.
 */
export class VersionResolver {
  private readonly solver: VersionSolver;

  constructor(solver: VersionSolver) {
    this.solver = solver;
  }

  get source(): PackageSource {
    return this.solver.source;
  }

  get indexUrl(): string {
    return this.solver.source.url;
  }

  /**
   * @param range - Range expression such as `>=1.0,<2.0`; empty means any version
   */
  async resolve(packageName: string, range: string): Promise<string[]> {
    try {
      const solution = await this.solver.solve([packageName + range], { allVersions: true });
      if (solution.size !== 1) {
        throw new Error(`Resolution of ${packageName} returned ${solution.size} packages`);
      }
      const [versions] = solution.values();
      return versions;
    } catch (error) {
      if (error instanceof PackageNotFoundError) {
        logger.info(
          `No versions were resolved for ${packageName} with version specification '${range}' on ${this.indexUrl}`
        );
      } else {
        logger.error(`Failed to resolve versions for ${packageName} with version specification '${range}'`, error);
      }
      return [];
    }
  }
}
