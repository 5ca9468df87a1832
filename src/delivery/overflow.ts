/**
 * Overflow path for audio too large to attach
 *
 * Mail providers cap attachments around 25 MB, so anything strictly larger
 * than 25 MiB is uploaded to a bucket and mailed as a presigned link.
 */

import * as path from 'node:path';
import type { BlobBucket } from '../storage/bucket.js';
import type { AudioArtifact } from '../media/types.js';

export const OVERFLOW_THRESHOLD_BYTES = 25 * 1024 * 1024;

/**
 * Hard cutoff: exactly the threshold is attached, one byte more is not
 */
export function needsOverflow(fileSize: number): boolean {
  return fileSize > OVERFLOW_THRESHOLD_BYTES;
}

export interface OverflowLink {
  url: string;
  expiresAt: string;
}

export interface OverflowUploader {
  upload(artifact: AudioArtifact): Promise<OverflowLink>;
}

export class BucketOverflowUploader implements OverflowUploader {
  constructor(
    private readonly bucket: BlobBucket,
    private readonly prefix: string,
    private readonly linkTtlHours: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Key layout: {prefix}/{YYYY-MM-DD}/{file name}
   */
  objectKey(artifact: AudioArtifact): string {
    const day = this.now().toISOString().slice(0, 10);
    const prefix = this.prefix.replace(/^\/+|\/+$/g, '');
    const parts = [prefix, day, path.basename(artifact.filePath)].filter(part => part.length > 0);
    return parts.join('/');
  }

  async upload(artifact: AudioArtifact): Promise<OverflowLink> {
    const key = this.objectKey(artifact);
    const expiresInSeconds = this.linkTtlHours * 3600;

    await this.bucket.putFile(key, artifact.filePath, 'audio/mpeg');
    const url = await this.bucket.presignGet(key, expiresInSeconds);

    console.log(JSON.stringify({
      event: 'overflow_uploaded',
      bucket: this.bucket.name,
      key,
      fileSize: artifact.fileSize,
      timestamp: new Date().toISOString(),
    }));

    return {
      url,
      expiresAt: new Date(this.now().getTime() + expiresInSeconds * 1000).toISOString(),
    };
  }
}
