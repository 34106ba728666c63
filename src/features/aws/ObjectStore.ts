/**
 * Object storage reads (S3)
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { MwaaLocalError } from '../../shared/utils/errors.js';

export interface IObjectStore {
  getObject(bucket: string, key: string, versionId?: string): Promise<Uint8Array>;
}

export class S3ObjectStore implements IObjectStore {
  constructor(private readonly client: S3Client) {}

  async getObject(bucket: string, key: string, versionId?: string): Promise<Uint8Array> {
    const output = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key, VersionId: versionId || undefined })
    );
    if (!output.Body) {
      throw new MwaaLocalError(`s3://${bucket}/${key} has no body`);
    }
    return output.Body.transformToByteArray();
  }
}
