import fs from 'fs';
import path from 'path';

import { InvalidDirectoryError } from '../errors/batchErrors';

/**
 * Resolves `directory` and checks that it exists, is a directory and is writable.
 * Throws {@link InvalidDirectoryError} otherwise.
 */
export async function validateOutputDirectory(directory: string): Promise<string> {
  if (!directory.trim()) {
    throw new InvalidDirectoryError('Output directory path is empty.', directory);
  }

  const resolved = path.resolve(directory);

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(resolved);
  } catch {
    throw new InvalidDirectoryError(`Output directory does not exist: ${resolved}`, resolved);
  }

  if (!stats.isDirectory()) {
    throw new InvalidDirectoryError(`Output path is not a directory: ${resolved}`, resolved);
  }

  try {
    await fs.promises.access(resolved, fs.constants.W_OK);
  } catch {
    throw new InvalidDirectoryError(`Cannot write to output directory: ${resolved}`, resolved);
  }

  return resolved;
}

export async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }

    await fs.promises.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
