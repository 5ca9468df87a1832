/**
 * Type definitions for audio extraction
 */

import type { Channel, Item } from '../channels/types.js';

export interface AudioArtifact {
  item: Item;
  channel: Channel;
  filePath: string;         // Local mp3 path; kept on delivery failure
  fileSize: number;         // Bytes, as measured on disk
  downloadDuration: number; // Milliseconds (0 when an earlier file was reused)
}

/**
 * Result of an extraction attempt
 * Discriminated union by success boolean
 */
export type AudioDownloadResult =
  | ({ success: true } & AudioArtifact)
  | {
      success: false;
      item: Item;
      error: string;
      reason: 'download_failed' | 'file_missing';
    };

export interface AudioDownloader {
  download(item: Item, channel: Channel): Promise<AudioDownloadResult>;
}
