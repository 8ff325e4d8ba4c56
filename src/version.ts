import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const SERVICE_NAME = 'pipeline-dag-check';

/**
 * Read `version` from the package.json found `levels` directories above
 * this file: one from src/ (tsx), two from dist/src/ (built).
 */
function readPackageVersion(levels: number): string | undefined {
  try {
    const pkgUrl = new URL(`${'../'.repeat(levels)}package.json`, import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgUrl), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Service version (single source of truth). SERVICE_VERSION env wins.
 */
export const SERVICE_VERSION: string =
  process.env.SERVICE_VERSION ?? readPackageVersion(1) ?? readPackageVersion(2) ?? '0.0.0';
