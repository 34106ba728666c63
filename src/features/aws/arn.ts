/**
 * ARN helpers
 */

import { InvalidArnError } from '../../shared/utils/errors.js';

const ARN_PATTERN = /^arn:(aws|aws-cn|aws-us-gov):[a-zA-Z0-9-]+:[a-z0-9-]*:[0-9]{12}:[^:]+$/;

export function isValidArn(arn: string): boolean {
  return ARN_PATTERN.test(arn);
}

export function validateArn(arn: string): void {
  if (!isValidArn(arn)) {
    throw new InvalidArnError(arn);
  }
}

/**
 * Bucket name of an S3 bucket ARN (arn:aws:s3:::my-bucket)
 */
export function bucketNameFromArn(arn: string): string {
  const parts = arn.split(':');
  if (parts.length < 6 || parts[0] !== 'arn' || parts[2] !== 's3' || parts[5] === '') {
    throw new InvalidArnError(arn);
  }
  return parts[5];
}
