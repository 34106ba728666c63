/**
 * Path containment helpers
 */

import path from 'path';
import { UnsafePathError } from './errors.js';

/**
 * Absolute path of `entry` under `base`; entries resolving outside `base` are refused
 */
export function resolveInside(base: string, entry: string): string {
  const target = path.resolve(base, entry);
  const relative = path.relative(base, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new UnsafePathError(entry);
  }
  return target;
}
