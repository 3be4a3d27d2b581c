/**
 * Build version helper.
 *
 * Format: v1.0.0+20251129.204700, where the version comes from package.json
 * and the suffix is the process start time (YYYYMMDD.HHMMSS). Computed once
 * so it is stable for the lifetime of the running server.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

const getPackageVersion = (): string => {
  const packageJsonPath = findPackageJson(__dirname);
  if (!packageJsonPath) return '1.0.0';
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '1.0.0';
  } catch {
    return '1.0.0';
  }
};

export const packageVersion: string = getPackageVersion();

const buildVersion: string = (() => {
  const now = new Date();
  const dateStr = String(now.getFullYear()) +
    String(now.getMonth() + 1).padStart(2, '0') +
    String(now.getDate()).padStart(2, '0');
  const timeStr = String(now.getHours()).padStart(2, '0') +
    String(now.getMinutes()).padStart(2, '0') +
    String(now.getSeconds()).padStart(2, '0');
  return `v${packageVersion}+${dateStr}.${timeStr}`;
})();

export function getBuildVersion(): string {
  return buildVersion;
}
