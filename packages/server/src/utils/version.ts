/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const PACKAGE_NAME = '@roomcast/server';

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string().min(1),
});

/**
 * Reads the server version from package.json.
 */
export function getServerVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // "../package.json" from dist/, "../../package.json" from src/utils/
  const possiblePaths = [join(here, '../package.json'), join(here, '../../package.json')];

  for (const packageJsonPath of possiblePaths) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    } catch {
      continue;
    }
    const parsed = PackageJsonSchema.safeParse(raw);
    if (parsed.success && parsed.data.name === PACKAGE_NAME) {
      return parsed.data.version;
    }
  }

  return 'unknown';
}
