import fs from 'fs';
import path from 'path';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

/**
 * Version field of a package.json, or the fallback when the file is missing,
 * unreadable or carries no string version.
 */
export function readPackageVersion(pkgPath: string): string {
  let pkg: unknown;
  try {
    pkg = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  } catch {
    return FALLBACK_VERSION;
  }
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return FALLBACK_VERSION;
}

// dist/index.js and src/index.ts both sit one level below cli/package.json
export function getCliVersion(): string {
  if (!cachedVersion) {
    cachedVersion = readPackageVersion(path.resolve(__dirname, '..', 'package.json'));
  }
  return cachedVersion;
}
