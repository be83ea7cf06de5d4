import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageSchema = z.object({ name: z.string(), version: z.string() });

let cached: string | undefined;

export function getVersion(): string {
  if (cached) return cached;
  // src/version.ts and dist/version.js both sit one level below package.json
  const candidate = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    if (existsSync(candidate)) {
      const pkg = PackageSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (pkg.success && pkg.data.name === 'tagwatch') {
        cached = pkg.data.version;
        return cached;
      }
    }
  } catch {
    // fall through to the placeholder version
  }
  cached = '0.0.0';
  return cached;
}
