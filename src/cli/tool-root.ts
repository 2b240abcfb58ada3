import { existsSync } from 'node:fs';
import path from 'node:path';

/** Nearest ancestor of `startDir` (inclusive) holding a package.json. */
export function findToolRoot(startDir: string): string | undefined {
  let current = path.resolve(startDir);

  for (;;) {
    if (existsSync(path.join(current, 'package.json'))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
