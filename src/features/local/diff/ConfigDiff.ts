/**
 * Compare the local airflow.cfg with an environment's configuration overrides
 */

import ini from 'ini';
import type { IFileSystem } from '../../../platform/IFileSystem.js';

export type ConfigDiffKind = 'missing-in-local' | 'missing-in-remote' | 'value-mismatch';

export interface ConfigDiff {
  key: string;
  kind: ConfigDiffKind;
  localValue?: string;
  remoteValue?: string;
}

const KIND_ORDER: readonly ConfigDiffKind[] = [
  'missing-in-local',
  'missing-in-remote',
  'value-mismatch',
];

const HEADINGS: Record<ConfigDiffKind, string> = {
  'missing-in-local': 'Missing in local configuration:',
  'missing-in-remote': 'Missing in remote configuration:',
  'value-mismatch': 'Different values:',
};

/**
 * Flatten an ini document to `section.key`; top-level keys and DEFAULT are dropped
 */
export function flattenConfig(source: string): Record<string, string> {
  const parsed: Record<string, unknown> = ini.parse(source);
  const flat: Record<string, string> = {};

  for (const [section, values] of Object.entries(parsed)) {
    if (section === 'DEFAULT' || typeof values !== 'object' || values === null) {
      continue;
    }
    for (const [key, value] of Object.entries(values)) {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        flat[`${section}.${key}`] = String(value);
      }
    }
  }
  return flat;
}

export function diffConfig(
  local: Record<string, string>,
  remote: Record<string, string>
): ConfigDiff[] {
  const diffs: ConfigDiff[] = [];

  for (const [key, remoteValue] of Object.entries(remote)) {
    if (remoteValue === '') {
      continue;
    }
    const localValue = local[key];
    if (localValue === undefined || localValue === '') {
      diffs.push({ key, kind: 'missing-in-local', remoteValue });
    } else if (localValue !== remoteValue) {
      diffs.push({ key, kind: 'value-mismatch', localValue, remoteValue });
    }
  }

  for (const [key, localValue] of Object.entries(local)) {
    if (localValue === '') {
      continue;
    }
    const remoteValue = remote[key];
    if (remoteValue === undefined || remoteValue === '') {
      diffs.push({ key, kind: 'missing-in-remote', localValue });
    }
  }

  return diffs.sort(
    (a, b) =>
      KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind) || a.key.localeCompare(b.key)
  );
}

export async function readLocalConfig(
  file: string,
  fs: IFileSystem
): Promise<Record<string, string>> {
  return flattenConfig(await fs.readFile(file));
}

export function formatDiffs(diffs: ConfigDiff[]): string {
  if (diffs.length === 0) {
    return 'No differences found.';
  }

  const lines: string[] = [];
  for (const kind of KIND_ORDER) {
    const group = diffs.filter((diff) => diff.kind === kind);
    if (group.length === 0) {
      continue;
    }
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(HEADINGS[kind]);
    for (const diff of group) {
      switch (diff.kind) {
        case 'missing-in-local':
          lines.push(`  ${diff.key} = ${diff.remoteValue ?? ''}`);
          break;
        case 'missing-in-remote':
          lines.push(`  ${diff.key} = ${diff.localValue ?? ''}`);
          break;
        case 'value-mismatch':
          lines.push(`  ${diff.key}: local=${diff.localValue ?? ''} remote=${diff.remoteValue ?? ''}`);
          break;
      }
    }
  }
  return lines.join('\n');
}
