/**
 * Shared constants for the depprobe CLI application
 */

export const DIR_PATTERNS = {
  DEPPROBE: '.depprobe'
} as const;

export const DEPPROBE_DIRS = {
  VENV: 'venv'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json'
} as const;

export const DEFAULT_INDEX_URL = 'https://pypi.org/simple';

export const DEFAULT_PYTHON_VERSION = 3;

/** Ten minutes; building an sdist can be slow */
export const DEFAULT_COMMAND_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Simple API content types, most preferred first. HTML (PEP 503) is the
 * fallback for indexes without the JSON API.
 */
export const SIMPLE_API_ACCEPT = [
  'application/vnd.pypi.simple.v1+json',
  'application/vnd.pypi.simple.latest+json;q=0.9',
  'text/html;q=0.1'
].join(', ');

/**
 * Values pipdeptree prints for a dependency declared without a version range.
 */
export const ANY_VERSION_MARKERS = ['Any', 'any', '*'] as const;
