import { readTextFile } from './fs.js';

/**
 * Extract requirement lines from the contents of a requirements file.
 *
 * Blank lines, comment lines and option lines (`-r other.txt`,
 * `--index-url ...`) are skipped; a ` #` starts an inline comment.
 * Trailing backslash continuations are joined.
 */
export function parseRequirementsText(content: string): string[] {
  const lines = content.replace(/\\\r?\n/g, ' ').split(/\r?\n/);
  const requirements: string[] = [];

  for (const rawLine of lines) {
    const line = stripComment(rawLine).trim();
    if (!line || line.startsWith('-')) {
      continue;
    }
    requirements.push(line);
  }

  return requirements;
}

function stripComment(line: string): string {
  if (line.trimStart().startsWith('#')) {
    return '';
  }
  const inline = line.search(/\s#/);
  return inline >= 0 ? line.slice(0, inline) : line;
}

export async function readRequirementsFile(path: string): Promise<string[]> {
  return parseRequirementsText(await readTextFile(path));
}
