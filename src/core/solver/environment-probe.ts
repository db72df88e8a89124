import type {
  CommandResolutionError,
  DependencyEntry,
  NotSitePackageError
} from '../../types/index.js';
import type { PackageHash, PackageSource } from '../index/package-index.js';
import { CommandError, formatCommand } from '../../utils/exec.js';
import { logger } from '../../utils/logger.js';
import { isSamePackage } from '../../utils/package-name.js';
import { createDependencyEntry } from './entry.js';
import { findInventoryEntry } from './pipdeptree.js';
import type { InstallationEnvironment } from './python-environment.js';

export type ProbeOutcome =
  | { kind: 'installed'; entry: DependencyEntry }
  | { kind: 'command_error'; error: CommandResolutionError }
  | { kind: 'not_site_package'; error: NotSitePackageError };

function commandErrorOutcome(
  packageName: string,
  version: string,
  indexUrl: string,
  error: unknown
): ProbeOutcome {
  const details = error instanceof CommandError
    ? error.toDetails()
    : {
        command: formatCommand('pip', ['install', `${packageName}==${version}`]),
        return_code: null,
        stdout: '',
        stderr: '',
        timeout: false,
        message: error instanceof Error ? error.message : String(error)
      };

  return {
    kind: 'command_error',
    error: { type: 'command_error', package_name: packageName, index: indexUrl, version, details }
  };
}

/**
 * Installs one exact package version into the environment, reads back what
 * actually got installed, and puts the environment back the way it was.
 *
 * The environment is shared by every probe of a pass, so probes must run one
 * at a time.
 */
export class EnvironmentProbe {
  private readonly environment: InstallationEnvironment;

  constructor(environment: InstallationEnvironment) {
    this.environment = environment;
  }

  async probe(packageName: string, version: string, source: PackageSource): Promise<ProbeOutcome> {
    const indexUrl = source.url;

    let previousVersion: string | undefined;
    try {
      previousVersion = findInventoryEntry(await this.environment.inventory(), packageName)?.package.installed_version;
      await this.environment.install(packageName, version, indexUrl);
    } catch (error) {
      logger.debug(
        `There was an error during package ${packageName} in version ${version} discovery from ${indexUrl}`,
        error
      );
      return commandErrorOutcome(packageName, version, indexUrl, error);
    }

    let outcome: ProbeOutcome;
    try {
      outcome = await this.inspect(packageName, version, source);
    } catch (error) {
      logger.debug(`Failed to inspect package ${packageName} in version ${version}`, error);
      outcome = commandErrorOutcome(packageName, version, indexUrl, error);
    } finally {
      await this.restore(packageName, version, previousVersion);
    }
    return outcome;
  }

  private async inspect(packageName: string, version: string, source: PackageSource): Promise<ProbeOutcome> {
    const inventory = await this.environment.inventory();
    const installed = findInventoryEntry(inventory, packageName);

    if (!installed) {
      logger.warn(`Package ${packageName} was not found in pipdeptree output`);
      return {
        kind: 'not_site_package',
        error: {
          type: 'not_site_package',
          package_name: packageName,
          index: source.url,
          version,
          details: {
            message: 'Failed to get information about installed package, probably not site package'
          }
        }
      };
    }

    if (installed.package.installed_version !== version) {
      logger.warn(
        `Requested to install version ${version} of package ${packageName}, ` +
        `but installed version is ${installed.package.installed_version}, error is not fatal`
      );
    }

    if (!isSamePackage(installed.package.package_name, packageName)) {
      logger.warn(
        `Requested to install package ${packageName}, ` +
        `but installed package name is ${installed.package.package_name}, error is not fatal`
      );
    }

    const hashes = await this.lookupHashes(source, installed.package.package_name, installed.package.installed_version);
    return { kind: 'installed', entry: createDependencyEntry(installed, source.url, hashes) };
  }

  private async lookupHashes(source: PackageSource, packageName: string, version: string): Promise<PackageHash[]> {
    try {
      return await source.getPackageHashes(packageName, version);
    } catch (error) {
      logger.warn(`Failed to obtain hashes of ${packageName} ${version} from ${source.url}`, error);
      return [];
    }
  }

  /**
   * Reinstall the version present before the probe, or remove the package if
   * there was none. Failures only warn: the probe result stands either way.
   */
  private async restore(packageName: string, version: string, previousVersion: string | undefined): Promise<void> {
    logger.debug(`Restoring previous environment setup after installation of ${packageName}`);

    if (previousVersion) {
      logger.debug(`Installing previous version ${previousVersion} of package ${packageName}`);
      try {
        await this.environment.install(packageName, previousVersion);
      } catch (error) {
        logger.warn(
          `Failed to restore previous environment for package ${packageName} (installed version ${version}, ` +
          `previous version ${previousVersion}), the error is not fatal but can affect future actions`,
          error
        );
      }
      return;
    }

    try {
      await this.environment.uninstall(packageName);
    } catch (error) {
      logger.warn(
        `Failed to restore previous environment by removing package ${packageName} (installed version ${version}), ` +
        `the error is not fatal but can affect future actions`,
        error
      );
    }
  }
}
