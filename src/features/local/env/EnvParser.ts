/**
 * .env parsing and merging
 *
 * Produces ordered KEY=VALUE lists, the form the container engine takes for Env.
 */

import type { IFileSystem } from '../../../platform/IFileSystem.js';
import { MalformedLineError } from '../../../shared/utils/errors.js';

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value
      .slice(1, -1)
      .replaceAll('\\"', '"')
      .replaceAll('\\n', '\n')
      .replaceAll('\\r', '\r');
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse .env content.
 *
 * Blank lines and `#` comments are skipped; any other line must be KEY=VALUE.
 * Unquoted values end at an inline ` #`. Double quotes unescape \" \n \r,
 * single quotes are taken verbatim.
 *
 * @throws MalformedLineError on the first line without `=` or with an empty key
 */
export function parseEnv(source: string): string[] {
  const result: string[] = [];
  const lines = source.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      throw new MalformedLineError(index + 1, line);
    }

    const key = line.slice(0, separator).trim();
    let value = line.slice(separator + 1).trim();
    if (key === '') {
      throw new MalformedLineError(index + 1, line);
    }

    if (!value.startsWith('"') && !value.startsWith("'")) {
      const comment = value.indexOf(' #');
      if (comment !== -1) {
        value = value.slice(0, comment).trimEnd();
      }
    }

    result.push(`${key}=${unquote(value)}`);
  });

  return result;
}

export async function parseEnvFile(path: string, fs: IFileSystem): Promise<string[]> {
  const content = await fs.readFile(path);
  return parseEnv(content);
}

/**
 * Merge KEY=VALUE lists; the last occurrence of a key wins.
 * With ignoreEmpty, `KEY=` entries are dropped before they can overwrite anything.
 * Keys keep the position of their first appearance.
 */
export function mergeEnv(lists: readonly (readonly string[])[], ignoreEmpty: boolean): string[] {
  const merged = new Map<string, string>();

  for (const entry of lists.flat()) {
    const separator = entry.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const key = entry.slice(0, separator);
    const value = entry.slice(separator + 1);
    if (ignoreEmpty && value === '') {
      continue;
    }
    merged.set(key, value);
  }

  return [...merged].map(([key, value]) => `${key}=${value}`);
}

export function serializeEnv(entries: readonly string[]): string {
  return entries.join('\n');
}
