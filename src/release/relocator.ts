/**
 * Payload Relocation
 * Finds the payload inside an extracted release and copies it to the output directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExtractError, IOError, toError } from '../errors';

/** Copies the contents of srcDir into dstDir */
export type CopyDirectory = (srcDir: string, dstDir: string) => void;

/**
 * Recursive copy, merging into (and overwriting files in) an existing dstDir
 */
export const copyDirectory: CopyDirectory = (srcDir, dstDir) => {
  try {
    fs.mkdirSync(dstDir, { recursive: true });
    fs.cpSync(srcDir, dstDir, { recursive: true, force: true });
  } catch (error) {
    throw new IOError(
      `Failed to copy ${srcDir} to ${dstDir}: ${toError(error).message}`,
      dstDir,
      { cause: error }
    );
  }
};

/**
 * Locate the payload directory of an extracted release.
 *
 * Release tarballs wrap everything in one generated top-level directory
 * (e.g. "swagger-api-swagger-ui-1a2b3c4"); anything else is rejected.
 */
export function locatePayload(stagingDir: string, payloadDir: string): string {
  const topLevel = fs.readdirSync(stagingDir, { withFileTypes: true });

  if (topLevel.length !== 1) {
    const names = topLevel.map((d) => d.name).join(', ') || '(empty)';
    throw new ExtractError(
      `Expected exactly one top-level directory in the archive, found ${topLevel.length}: ${names}`
    );
  }

  const [root] = topLevel;
  if (!root.isDirectory()) {
    throw new ExtractError(`Archive top-level entry "${root.name}" is not a directory`, root.name);
  }

  const payloadPath = path.resolve(stagingDir, root.name, payloadDir);
  if (!fs.existsSync(payloadPath) || !fs.statSync(payloadPath).isDirectory()) {
    throw new ExtractError(
      `Payload directory "${payloadDir}" not found in archive`,
      path.posix.join(root.name, payloadDir)
    );
  }
  return payloadPath;
}
