import { describe, it, expect, vi } from 'vitest';
import { browserCommand, openBrowser } from '../../../../src/shared/utils/browser.js';
import type { IProcessExecutor } from '../../../../src/platform/IProcessExecutor.js';
import { MwaaLocalError } from '../../../../src/shared/utils/errors.js';

const URL = 'https://example.test/aws_mwaa/aws-console-sso?login=true#test-token';

function createExecutor(exitCode: number, stderr = '') {
  return {
    execute: vi.fn<IProcessExecutor['execute']>().mockResolvedValue({
      stdout: '',
      stderr,
      exitCode,
      command: 'open',
      timedOut: false,
    }),
  };
}

describe('browserCommand', () => {
  it.each([
    ['darwin', 'open', [URL]],
    ['win32', 'rundll32', ['url.dll,FileProtocolHandler', URL]],
    ['linux', 'xdg-open', [URL]],
  ] as const)('should use the %s opener', (platform, command, args) => {
    expect(browserCommand(URL, platform)).toEqual([command, args]);
  });
});

describe('openBrowser', () => {
  it('should launch the platform opener with a timeout', async () => {
    const executor = createExecutor(0);

    await openBrowser(URL, executor, 'linux');

    expect(executor.execute).toHaveBeenCalledWith('xdg-open', [URL], { timeout: 10_000 });
  });

  it('should fail when the opener exits non-zero', async () => {
    await expect(openBrowser(URL, createExecutor(3, 'no display\n'), 'linux')).rejects.toThrow(
      new MwaaLocalError('failed to open browser with xdg-open: no display')
    );
  });
});
