import { describe, it, expect } from 'vitest';
import { bucketNameFromArn, isValidArn, validateArn } from '../../../../src/features/aws/arn.js';
import { InvalidArnError } from '../../../../src/shared/utils/errors.js';

describe('isValidArn', () => {
  it.each([
    'arn:aws:iam::123456789012:role/mwaa-execution',
    'arn:aws-cn:iam::123456789012:role/ops',
    'arn:aws-us-gov:iam::123456789012:role/path/to/role',
  ])('should accept %s', (arn) => {
    expect(isValidArn(arn)).toBe(true);
  });

  it.each([
    '',
    'role/mwaa-execution',
    'arn:aws:iam::12345:role/short-account',
    'arn:other:iam::123456789012:role/bad-partition',
    'arn:aws:iam::123456789012:',
  ])('should reject %j', (arn) => {
    expect(isValidArn(arn)).toBe(false);
  });
});

describe('validateArn', () => {
  it('should throw InvalidArnError naming the value', () => {
    expect(() => validateArn('not-an-arn')).toThrow(new InvalidArnError('not-an-arn'));
  });
});

describe('bucketNameFromArn', () => {
  it('should return the bucket of an S3 bucket ARN', () => {
    expect(bucketNameFromArn('arn:aws:s3:::test-airflow-bucket')).toBe('test-airflow-bucket');
  });

  it.each(['arn:aws:s3:::', 'arn:aws:iam::123456789012:role/x', 'test-airflow-bucket'])(
    'should reject %j',
    (arn) => {
      expect(() => bucketNameFromArn(arn)).toThrow(InvalidArnError);
    }
  );
});
