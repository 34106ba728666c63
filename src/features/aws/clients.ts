/**
 * AWS client configuration shared by every service client
 */

export interface AwsContext {
  profile?: string;
  region?: string;
}

/**
 * Config for any v3 SDK client; unset fields fall back to the SDK's own chains
 */
export function awsClientConfig(context: AwsContext): { region?: string; profile?: string } {
  const config: { region?: string; profile?: string } = {};
  if (context.region) {
    config.region = context.region;
  }
  if (context.profile) {
    config.profile = context.profile;
  }
  return config;
}
