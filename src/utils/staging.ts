import fs from 'fs/promises';
import path from 'path';
import { errorMessage, UnexpectedError } from './errors';
import type { Logger } from './logger';

export const STAGING_PREFIX = 'iges-';

/**
 * Runs `fn` inside a fresh, uniquely named directory under `root`.
 * The directory and everything in it is removed once `fn` settles.
 */
export async function withStagingDir<T>(
  root: string,
  logger: Logger,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  let dir: string;
  try {
    dir = await fs.mkdtemp(path.join(root, STAGING_PREFIX));
  } catch (err) {
    throw new UnexpectedError(`Could not create staging directory: ${errorMessage(err)}`, { cause: err });
  }

  try {
    return await fn(dir);
  } finally {
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      logger.error('Failed to remove staging directory', { dir }, err);
    }
  }
}
