import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string().min(1) });

let cachedVersion: string | null = null;

/**
 * Version of this package, read from package.json
 * (two levels up from both src/utils and dist/utils)
 */
export function getPackageVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  const result = PackageJsonSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error('package.json has no version field');
  }

  cachedVersion = result.data.version;
  return cachedVersion;
}
