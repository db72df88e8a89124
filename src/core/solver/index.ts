export { resolve, assertPythonVersion, type ResolveOptions, type EnvironmentSettings } from './orchestrator.js';
export { buildDependencyGraph, packageKeyId, type GraphBuilderOptions, type ProbeProgress } from './graph-builder.js';
export { EnvironmentProbe, type ProbeOutcome } from './environment-probe.js';
export { PythonEnvironment, type InstallationEnvironment, type PythonEnvironmentOptions } from './python-environment.js';
export { VersionResolver } from './version-resolver.js';
export { parseRequirement, formatVersionSpec } from './requirement-parser.js';
export { SimpleIndex, type PackageSource, type PackageHash } from '../index/package-index.js';
export { PythonVersionSolver, type VersionSolver, type SolveOptions } from '../index/version-solver.js';
export type * from '../../types/solver.js';
