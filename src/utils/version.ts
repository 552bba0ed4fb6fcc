/**
 * Package version lookup
 */

import * as fs from 'fs';
import * as path from 'path';

/** Installation root of the npm package (the directory holding package.json) */
export const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

/**
 * Read the version from package.json at packageRoot
 * @throws Error when package.json is missing or has no version
 */
export function getVersion(packageRoot: string = PACKAGE_ROOT): string {
  const manifestPath = path.join(packageRoot, 'package.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string' &&
    parsed.version.trim()
  ) {
    return parsed.version.trim();
  }
  throw new Error(`No version field in ${manifestPath}`);
}
