import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageVersion = z.object({ version: z.string().default('0.0.0') });

function readVersion(relativePath: string): string {
  const pkgPath = new URL(relativePath, import.meta.url);
  return PackageVersion.parse(JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'))).version;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolved relative to this file so both `src/version.ts` (tests, tsx)
 * and `dist/src/version.js` (built) find the root package.json.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readVersion('../package.json');
    } catch {
      try {
        return readVersion('../../package.json');
      } catch {
        return '0.0.0';
      }
    }
  })();
