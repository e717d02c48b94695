/**
 * Package version, read from package.json next to src/ or dist/
 */

import * as fs from 'fs';
import * as path from 'path';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion === null) {
    const pkg: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf8')
    );
    const version: unknown = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
    cachedVersion = typeof version === 'string' ? version : '0.0.0';
  }
  return cachedVersion;
}
