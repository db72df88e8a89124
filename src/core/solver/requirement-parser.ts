import type { Requirement, SpecifierOperator, VersionConstraint } from '../../types/index.js';
import { RequirementParseError } from '../../utils/errors.js';
import { isValidVersion } from '../../utils/pep440.js';

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const EXTRAS_PATTERN = /^\[([^\]]*)\]/;
const EXTRA_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const CLAUSE_PATTERN = /^(~=|===|==|!=|<=|>=|<|>)\s*(\S+)$/;

const OPERATORS: readonly SpecifierOperator[] = ['~=', '===', '==', '!=', '<=', '>=', '<', '>'];

function isOperator(value: string): value is SpecifierOperator {
  return OPERATORS.some((operator) => operator === value);
}

function parseExtras(raw: string, requirement: string): string[] {
  const extras = raw.split(',').map((extra) => extra.trim()).filter((extra) => extra.length > 0);
  for (const extra of extras) {
    if (!EXTRA_PATTERN.test(extra)) {
      throw new RequirementParseError(requirement, `invalid extra '${extra}'`);
    }
  }
  return extras;
}

function parseClause(clause: string, requirement: string): VersionConstraint {
  const match = CLAUSE_PATTERN.exec(clause);
  const operator = match?.[1];
  if (!match || operator === undefined || !isOperator(operator)) {
    throw new RequirementParseError(requirement, `invalid version specifier '${clause}'`);
  }

  const version = match[2];

  if (operator === '===') {
    return [operator, version];
  }

  const wildcard = version.endsWith('.*');
  if (wildcard && operator !== '==' && operator !== '!=') {
    throw new RequirementParseError(requirement, `wildcard is not allowed with '${operator}'`);
  }
  if (!isValidVersion(wildcard ? version.slice(0, -2) : version)) {
    throw new RequirementParseError(requirement, `invalid version '${version}'`);
  }
  if (operator === '~=' && version.split('.').length < 2) {
    throw new RequirementParseError(requirement, `'~=' needs at least two release segments`);
  }

  return [operator, version];
}

/**
 * Parse a requirement such as `requests[socks]>=2.0,<3; python_version >= "3"`.
 *
 * Direct URL requirements (`name @ https://...`) are not supported since
 * they cannot be resolved against an index.
 */
export function parseRequirement(raw: string): Requirement {
  let rest = raw.trim();
  if (!rest) {
    throw new RequirementParseError(raw, 'empty requirement');
  }

  const nameMatch = NAME_PATTERN.exec(rest);
  if (!nameMatch) {
    throw new RequirementParseError(raw, 'missing package name');
  }
  const name = nameMatch[1];
  rest = rest.slice(name.length).trimStart();

  let extras: string[] = [];
  const extrasMatch = EXTRAS_PATTERN.exec(rest);
  if (extrasMatch) {
    extras = parseExtras(extrasMatch[1], raw);
    rest = rest.slice(extrasMatch[0].length).trimStart();
  }

  if (rest.startsWith('@')) {
    throw new RequirementParseError(raw, 'direct URL requirements are not supported');
  }

  let marker: string | undefined;
  const markerStart = rest.indexOf(';');
  if (markerStart >= 0) {
    marker = rest.slice(markerStart + 1).trim() || undefined;
    rest = rest.slice(0, markerStart).trim();
  }

  if (rest.startsWith('(')) {
    if (!rest.endsWith(')')) {
      throw new RequirementParseError(raw, 'unbalanced parentheses');
    }
    rest = rest.slice(1, -1).trim();
  }

  const spec = rest
    ? rest.split(',').map((clause) => parseClause(clause.trim(), raw))
    : [];

  return { name, extras, spec, ...(marker ? { marker } : {}) };
}

/**
 * Render constraints back into a range expression: `>=1.0,<2.0`.
 * An empty list renders as the empty string, meaning any version.
 */
export function formatVersionSpec(spec: readonly VersionConstraint[]): string {
  return spec.map(([operator, version]) => `${operator}${version}`).join(',');
}

