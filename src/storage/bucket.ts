/**
 * S3-compatible object storage
 *
 * Used for two things: the remote history backend and the overflow path for
 * audio files too large to attach. Code outside this module sees only the
 * BlobBucket interface.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

export interface BlobBucket {
  readonly name: string;
  /** Object body as UTF-8 text, or null when the key does not exist */
  getText(key: string): Promise<string | null>;
  putText(key: string, body: string, contentType: string): Promise<void>;
  putFile(key: string, filePath: string, contentType: string): Promise<void>;
  /** Time-limited GET link for an object */
  presignGet(key: string, expiresInSeconds: number): Promise<string>;
}

export interface S3Options {
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

/**
 * Credentials come from the default AWS provider chain
 * (AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY, profile, instance role)
 */
export function createS3Client(options: S3Options): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle: options.forcePathStyle,
  });
}

function isNotFound(error: unknown): boolean {
  if (error instanceof S3ServiceException) {
    return error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404;
  }
  return false;
}

export class S3Bucket implements BlobBucket {
  constructor(
    private readonly client: S3Client,
    public readonly name: string
  ) {}

  async getText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.name, Key: key }));
      if (!response.Body) return '';
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async putText(key: string, body: string, contentType: string): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: this.name,
      Key: key,
      Body: body,
      ContentType: contentType,
    }));
  }

  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    // Streaming bodies need an explicit length or the SDK refuses to sign them
    const { size } = await stat(filePath);
    await this.client.send(new PutObjectCommand({
      Bucket: this.name,
      Key: key,
      Body: createReadStream(filePath),
      ContentLength: size,
      ContentType: contentType,
    }));
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.name, Key: key }),
      { expiresIn: expiresInSeconds }
    );
  }
}
