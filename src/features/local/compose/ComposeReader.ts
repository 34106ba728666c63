/**
 * Compose-file reader
 *
 * Only the parts the runner needs: each service's image and environment.
 */

import yaml from 'yaml';
import { z } from 'zod';
import type { IFileSystem } from '../../../platform/IFileSystem.js';
import { ComposeDecodeError, ServiceNotFoundError } from '../../../shared/utils/errors.js';

const EnvironmentSchema = z
  .union([
    z.array(z.string()),
    z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  ])
  .transform((env) =>
    Array.isArray(env)
      ? env
      : Object.entries(env).map(([key, value]) => `${key}=${value === null ? '' : String(value)}`)
  );

const ServiceSchema = z
  .object({
    image: z.string().optional(),
    environment: EnvironmentSchema.default([]),
  })
  .nullable()
  .transform((service) => service ?? { image: undefined, environment: [] });

export const ComposeSchema = z.object({
  services: z.record(ServiceSchema).default({}),
});

export type Compose = z.infer<typeof ComposeSchema>;
export type ComposeService = Compose['services'][string];

export function parseCompose(text: string): Compose {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new ComposeDecodeError(
      `failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const result = ComposeSchema.safeParse(document ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ComposeDecodeError(
      `invalid compose document at ${issue.path.join('.') || '<root>'}: ${issue.message}`,
      result.error
    );
  }
  return result.data;
}

export async function readComposeFile(path: string, fs: IFileSystem): Promise<Compose> {
  return parseCompose(await fs.readFile(path));
}

function getService(compose: Compose, name: string): ComposeService {
  if (!Object.hasOwn(compose.services, name)) {
    throw new ServiceNotFoundError(name);
  }
  return compose.services[name];
}

export function getServiceImage(compose: Compose, name: string): string {
  const image = getService(compose, name).image;
  if (!image) {
    throw new ComposeDecodeError(`service ${name} has no image`);
  }
  return image;
}

export function getServiceEnvironment(compose: Compose, name: string): string[] {
  return getService(compose, name).environment;
}
