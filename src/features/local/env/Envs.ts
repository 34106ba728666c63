/**
 * Credential and storage-path overlay for runner containers
 */

import type { AwsCredentials } from '../../aws/types.js';

export interface Envs {
  credentials?: AwsCredentials;
  s3DagsPath?: string;
  s3RequirementsPath?: string;
  s3PluginsPath?: string;
}

/**
 * Flatten an overlay into KEY=VALUE entries. Absent and empty fields are omitted.
 */
export function renderEnvs(envs: Envs): string[] {
  const entries: string[] = [];
  const add = (key: string, value: string | undefined): void => {
    if (value) {
      entries.push(`${key}=${value}`);
    }
  };

  const credentials = envs.credentials;
  if (credentials) {
    add('AWS_ACCESS_KEY_ID', credentials.accessKeyId);
    add('AWS_SECRET_ACCESS_KEY', credentials.secretAccessKey);
    add('AWS_SESSION_TOKEN', credentials.sessionToken);
    add('AWS_REGION', credentials.region);
    add('AWS_DEFAULT_REGION', credentials.region);
  }

  add('S3_DAGS_PATH', envs.s3DagsPath);
  add('S3_REQUIREMENTS_PATH', envs.s3RequirementsPath);
  add('S3_PLUGINS_PATH', envs.s3PluginsPath);

  return entries;
}
