import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { getCliVersion, readPackageVersion } from '../../src/version';

describe('version', () => {
  let tmpRoot: string;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'devcat-version-'));
  });

  afterEach(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('should read the version field', () => {
    const pkgPath = path.join(tmpRoot, 'package.json');
    fs.writeFileSync(pkgPath, JSON.stringify({ name: 'devcat', version: '1.4.2' }));
    expect(readPackageVersion(pkgPath)).toBe('1.4.2');
  });

  it('should fall back when the version is missing or not a string', () => {
    const pkgPath = path.join(tmpRoot, 'package.json');
    fs.writeFileSync(pkgPath, JSON.stringify({ name: 'devcat', version: 3 }));
    expect(readPackageVersion(pkgPath)).toBe('0.0.0');
    expect(readPackageVersion(path.join(tmpRoot, 'missing.json'))).toBe('0.0.0');
  });

  it('should report the CLI package version', () => {
    expect(getCliVersion()).toBe('0.3.0');
  });
});
