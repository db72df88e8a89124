/**
 * Data model of a resolution run.
 *
 * Output records keep snake_case field names because they are serialized
 * verbatim into the report consumed by downstream tooling.
 */

/** Comparison operators accepted in a version specifier. */
export type SpecifierOperator = '~=' | '==' | '!=' | '<=' | '>=' | '<' | '>' | '===';

export type VersionConstraint = readonly [operator: SpecifierOperator, version: string];

/**
 * A parsed requirement string such as `requests[socks]>=2.0,<3; python_version>"3"`.
 */
export interface Requirement {
  readonly name: string;
  readonly extras: readonly string[];
  /** Version constraints in the order they were written */
  readonly spec: readonly VersionConstraint[];
  /** Environment marker, kept for display only */
  readonly marker?: string;
}

/**
 * A (name, version) pair. Names compare case-insensitively, see packageKeyId().
 */
export interface PackageKey {
  name: string;
  version: string;
}

export interface ResolvedVersions {
  index_url: string;
  versions: string[];
}

export interface Dependency {
  package_name: string;
  /** Range expression as declared by the parent; empty string means any version */
  required_version: string;
  /** One element per configured index, in configuration order */
  resolved_versions: ResolvedVersions[];
}

export interface DependencyEntry {
  package_name: string;
  package_version: string;
  index_url: string;
  /** sha256 digests of the files the index publishes for this version */
  sha256: string[];
  dependencies: Dependency[];
}

export interface InstalledDependency {
  package_name: string;
  required_version: string;
}

/**
 * One package of the probe environment as it was before any probe ran.
 */
export interface InstalledPackage {
  package_name: string;
  package_version: string;
  dependencies: InstalledDependency[];
}

export type EnvironmentSnapshot = InstalledPackage[];

/** Serialized form of a failed command, see CommandError.toDetails(). */
export interface CommandErrorDetails {
  command: string;
  return_code: number | null;
  stdout: string;
  stderr: string;
  timeout: boolean;
  message: string;
}

export interface CommandResolutionError {
  type: 'command_error';
  package_name: string;
  index: string;
  version: string;
  details: CommandErrorDetails;
}

export interface NotSitePackageError {
  type: 'not_site_package';
  package_name: string;
  index: string;
  version: string;
  details: { message: string };
}

export type ResolutionError = CommandResolutionError | NotSitePackageError;

export interface UnresolvedRequirement {
  package_name: string;
  version_spec: string;
  index: string;
}

export interface UnparsedRequirement {
  requirement: string;
  details: string;
}

export interface PassResult {
  tree: DependencyEntry[];
  errors: ResolutionError[];
  unparsed: UnparsedRequirement[];
  unresolved: UnresolvedRequirement[];
  environment: EnvironmentSnapshot;
}
