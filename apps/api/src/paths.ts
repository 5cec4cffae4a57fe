import path from 'node:path';

/**
 * Repository root for a module in `apps/api/src`, whether it runs from sources
 * or from the build in `dist/apps/api/src`.
 */
export function resolveRepoRoot(moduleDir: string): string {
  const appRoot = path.resolve(moduleDir, '../../..');
  return path.basename(appRoot) === 'dist' ? path.dirname(appRoot) : appRoot;
}
