/**
 * Open a URL in the user's default browser
 */

import type { IProcessExecutor } from '../../platform/IProcessExecutor.js';
import { MwaaLocalError } from './errors.js';

export function browserCommand(
  url: string,
  platform: NodeJS.Platform = process.platform
): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['open', [url]];
    case 'win32':
      return ['rundll32', ['url.dll,FileProtocolHandler', url]];
    default:
      return ['xdg-open', [url]];
  }
}

export async function openBrowser(
  url: string,
  executor: IProcessExecutor,
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  const [command, args] = browserCommand(url, platform);
  const result = await executor.execute(command, args, { timeout: 10_000 });
  if (result.exitCode !== 0) {
    throw new MwaaLocalError(
      `failed to open browser with ${command}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`
    );
  }
}
