/**
 * Normalize a project name the way simple indices do (PEP 503): lowercase,
 * with runs of `-`, `_` and `.` collapsed into a single `-`.
 */
export function normalizePackageName(name: string): string {
  return name.trim().replace(/[-_.]+/g, '-').toLowerCase();
}

/**
 * Whether two project names refer to the same project.
 */
export function isSamePackage(a: string, b: string): boolean {
  return normalizePackageName(a) === normalizePackageName(b);
}
