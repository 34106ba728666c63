/**
 * Airflow CLI commands run on an environment's web server through a CLI token
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { CliCommandError } from '../../shared/utils/errors.js';
import type { IEnvironmentClient } from './EnvironmentClient.js';

const CliResponseSchema = z.object({
  stdout: z.string().default(''),
  stderr: z.string().default(''),
});

export interface CliResult {
  stdout: string;
  stderr: string;
}

const NOISE = [
  'RemovedInAirflow3Warning',
  'FutureWarning',
  'UserWarning',
  'CloudWatch logging is disabled',
];

/**
 * Drop Airflow deprecation warnings and logging notices from CLI output
 */
export function filterCliOutput(text: string): string {
  return text
    .split('\n')
    .filter((line) => !NOISE.some((marker) => line.includes(marker)))
    .join('\n')
    .trim();
}

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

export class AirflowCli {
  private http: AxiosInstance;

  constructor(
    private readonly client: Pick<IEnvironmentClient, 'createCliToken'>,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create();
  }

  async run(environment: string, command: string): Promise<CliResult> {
    const { token, hostname } = await this.client.createCliToken(environment);
    const response = await this.http.post(`https://${hostname}/aws_mwaa/cli`, command, {
      headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'text/plain' },
      validateStatus: () => true,
      responseType: 'text',
    });

    const data: unknown = response.data;
    const body = typeof data === 'string' ? data : JSON.stringify(data);
    if (response.status !== 200) {
      throw new CliCommandError(body.trim(), response.status);
    }

    const parsed = CliResponseSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      throw new CliCommandError(`unexpected CLI response: ${body.trim()}`, response.status);
    }
    return {
      stdout: Buffer.from(parsed.data.stdout, 'base64').toString('utf-8'),
      stderr: Buffer.from(parsed.data.stderr, 'base64').toString('utf-8'),
    };
  }
}
