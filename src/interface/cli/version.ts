/**
 * Version utility - reads version from package.json
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  // src/interface/cli/ and dist/interface/cli/ both sit three levels below the root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = resolve(thisDir, '..', '..', '..', 'package.json');
  if (!existsSync(pkgPath)) {
    return FALLBACK_VERSION;
  }

  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  cachedVersion =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : FALLBACK_VERSION;
  return cachedVersion;
}
