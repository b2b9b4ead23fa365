import { promises as fs, constants as fsConstants } from 'fs';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
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
 * Read JSON or JSONC (comments and trailing commas allowed)
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reason = errors.length > 0 ? printParseErrorCode(errors[0].error) : 'empty document';
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path} (${reason})`, { path });
  }
  return result;
}
