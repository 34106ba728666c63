/**
 * Small string helpers shared by the runner and the CLI
 */

/**
 * Image tag form of a runner version: "v2.10.3" -> "2_10_3"
 */
export function normalizeVersion(version: string): string {
  return version.replace(/^v/, '').replaceAll('.', '_');
}

/**
 * Keep printable ASCII, tab and newline
 */
export function stripNonPrintable(input: string): string {
  let out = '';
  for (const ch of input) {
    const code = ch.charCodeAt(0);
    if (ch === '\t' || ch === '\n' || (code >= 0x20 && code < 0x7f)) {
      out += ch;
    }
  }
  return out;
}

/**
 * Display form of a container id
 */
export function shortId(id: string): string {
  return id.slice(0, 12);
}

/**
 * Parse a wait duration: "90" (seconds), "30s", "5m", "1h", "1m30s". Returns milliseconds.
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;
  const units: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(pattern)) {
    total += Number(match[1]) * units[match[2]];
    consumed += match[0].length;
  }

  if (consumed === 0 || consumed !== trimmed.length) {
    throw new Error(`invalid duration: ${value}`);
  }
  return total;
}
