import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Write object to a JSONC-compatible file
 * Note: Writes standard JSON format (JSONC is a superset that can read JSON)
 */
export async function writeJsoncFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  const content = JSON.stringify(data, null, indent);
  await writeTextFile(path, content + '\n');
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it.
 * The caller validates the shape of the returned value.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  // Use JSONC parser which handles both JSON and JSONC
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reasons = errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, reasons });
  }
  return result;
}
