import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { isMapping } from './validation/mapping.js';

/**
 * Version of the CLI from the nearest package.json above this module
 * (src/utils when run from source, dist/src/utils when built).
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (isMapping(parsed) && typeof parsed.version === 'string') {
          return parsed.version;
        }
      } catch {
        return '0.0.0';
      }
    }
    dir = dirname(dir);
  }
  return '0.0.0';
}
