/**
 * Credential resolution for the local runner
 *
 * Either assumes a role through STS or resolves the SDK's default provider chain,
 * and pins a region onto the result so the container sees both.
 */

import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts';
import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import type { ILogger } from '../../shared/utils/logger.js';
import { MwaaLocalError, errorMessage } from '../../shared/utils/errors.js';
import { validateArn } from './arn.js';
import { AwsContext, awsClientConfig } from './clients.js';
import type { AwsCredentials } from './types.js';

export const ROLE_SESSION_NAME = 'mwaa-local';

export interface IRoleAssumer {
  assumeRole(roleArn: string, sessionName: string): Promise<AwsCredentials>;
}

export type CredentialProvider = () => Promise<{
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}>;

export type RegionProvider = () => Promise<string>;

export class StsRoleAssumer implements IRoleAssumer {
  constructor(private readonly client: STSClient) {}

  async assumeRole(roleArn: string, sessionName: string): Promise<AwsCredentials> {
    const output = await this.client.send(
      new AssumeRoleCommand({ RoleArn: roleArn, RoleSessionName: sessionName })
    );
    const credentials = output.Credentials;
    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey) {
      throw new MwaaLocalError(`assume role returned no credentials for ${roleArn}`);
    }
    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
    };
  }
}

export interface CredentialResolverDeps {
  logger: ILogger;
  roleAssumer?: IRoleAssumer;
  provider?: CredentialProvider;
  /** SDK region chain; consulted only when no region is configured */
  regionProvider?: RegionProvider;
}

export class CredentialResolver {
  private readonly logger: ILogger;
  private readonly roleAssumer: IRoleAssumer;
  private readonly provider: CredentialProvider;
  private readonly regionProvider: RegionProvider;

  constructor(
    private readonly context: AwsContext,
    deps: CredentialResolverDeps
  ) {
    this.logger = deps.logger;
    const sts = new STSClient(awsClientConfig(context));
    this.roleAssumer = deps.roleAssumer ?? new StsRoleAssumer(sts);
    this.provider = deps.provider ?? fromNodeProviderChain({ profile: context.profile });
    this.regionProvider = deps.regionProvider ?? (() => sts.config.region());
  }

  async resolve(options: { roleArn?: string } = {}): Promise<AwsCredentials> {
    const region = await this.resolveRegion();

    if (options.roleArn) {
      validateArn(options.roleArn);
      this.logger.info(`Assuming role ${options.roleArn}`);
      const assumed = await this.roleAssumer.assumeRole(options.roleArn, ROLE_SESSION_NAME);
      return { ...assumed, region };
    }

    const identity = await this.provider();
    return {
      accessKeyId: identity.accessKeyId,
      secretAccessKey: identity.secretAccessKey,
      sessionToken: identity.sessionToken,
      region,
    };
  }

  /**
   * --region, then configured region, then whatever the SDK finds
   */
  async resolveRegion(): Promise<string | undefined> {
    if (this.context.region) {
      return this.context.region;
    }
    try {
      return await this.regionProvider();
    } catch (error) {
      this.logger.debug('No AWS region found in the SDK chain', { error: errorMessage(error) });
      return undefined;
    }
  }
}
