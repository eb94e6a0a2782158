import { accessSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * First executable named `name` on the search path, or null.
 */
export function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? '',
  check: (path: string) => boolean = isExecutable,
): string | null {
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (check(candidate)) return candidate;
  }
  return null;
}
