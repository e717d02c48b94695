/**
 * OpenAPI Spec Installer
 * Copies a spec file next to the Swagger UI payload and points the UI at it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { IOError, toError } from '../errors';

/** URL the stock Swagger UI distribution loads by default */
export const DEFAULT_SPEC_URL = 'https://petstore.swagger.io/v2/swagger.json';

/** Files that carry the default URL, newest layout first */
export const SPEC_URL_HOSTS = ['swagger-initializer.js', 'index.html'] as const;

export interface SpecInstallResult {
  /** Spec file as copied into the output directory */
  specPath: string;
  /** Output file whose URL was rewritten, or null when none referenced the default */
  patchedFile: string | null;
}

export function installSpec(specFile: string, outputDir: string): SpecInstallResult {
  const specName = path.basename(specFile);
  const specPath = path.join(outputDir, specName);

  try {
    fs.copyFileSync(specFile, specPath);

    for (const host of SPEC_URL_HOSTS) {
      const hostPath = path.join(outputDir, host);
      if (!fs.existsSync(hostPath)) continue;

      const content = fs.readFileSync(hostPath, 'utf8');
      if (!content.includes(DEFAULT_SPEC_URL)) continue;

      fs.writeFileSync(hostPath, content.split(DEFAULT_SPEC_URL).join(`./${specName}`), 'utf8');
      return { specPath, patchedFile: hostPath };
    }
  } catch (error) {
    throw new IOError(`Failed to install spec ${specFile}: ${toError(error).message}`, specPath, {
      cause: error,
    });
  }

  return { specPath, patchedFile: null };
}
