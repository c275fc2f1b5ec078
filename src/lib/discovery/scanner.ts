/**
 * Input Discovery
 *
 * Lists the diagram files in a single directory. Subdirectories are not
 * descended into; symbolic links to files are followed. Results are sorted
 * by name so runs are repeatable.
 */

import { readdir, stat } from 'fs/promises';
import { join, resolve, extname, basename, dirname } from 'path';
import { DirectoryNotFoundError, NoInputsError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface InputFile {
  /** Absolute path */
  path: string;
  /** File name with extension */
  name: string;
}

export interface DiscoveryOptions {
  /** Source extension, matched exactly (default: .html) */
  extension?: string;
}

// ============================================================================
// Discovery
// ============================================================================

export async function discoverInputs(
  directory: string,
  options: DiscoveryOptions = {}
): Promise<InputFile[]> {
  const extension = options.extension ?? '.html';
  const root = resolve(directory);

  if (!(await isDirectory(root))) {
    throw new DirectoryNotFoundError(directory);
  }

  const entries = await readdir(root, { withFileTypes: true });
  const inputs: InputFile[] = [];

  for (const entry of entries) {
    if (extname(entry.name) !== extension) continue;

    const path = join(root, entry.name);
    const isFile = entry.isSymbolicLink() ? await isLinkToFile(path) : entry.isFile();
    if (isFile) inputs.push({ path, name: entry.name });
  }

  inputs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  if (inputs.length === 0) {
    throw new NoInputsError(directory, extension);
  }

  return inputs;
}

/**
 * Sibling output path: same directory, same stem, new extension
 */
export function deriveOutputPath(inputPath: string, outputExtension: string = '.jpg'): string {
  const stem = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${stem}${outputExtension}`);
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * Dangling links and links to directories are not inputs
 */
async function isLinkToFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
