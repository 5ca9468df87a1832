/**
 * Audio collector
 * Extracts mp3 audio with yt-dlp into the current weekly bin
 */

import { existsSync, statSync, unlinkSync } from 'node:fs';
import * as path from 'node:path';
import { getWeeklyBinPath, ensureWeeklyBinExists, getAudioFilename } from './organization.js';
import type { YtDlpRunner } from '../channels/ytdlp.js';
import type { Channel, Item } from '../channels/types.js';
import type { AudioDownloader, AudioDownloadResult } from './types.js';

export class YtDlpAudioCollector implements AudioDownloader {
  constructor(
    private readonly run: YtDlpRunner,
    private readonly dataDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Extract audio for an item
   * Reuses an existing non-empty file (a previous run may have downloaded it
   * and then failed to deliver)
   */
  async download(item: Item, channel: Channel): Promise<AudioDownloadResult> {
    const startTime = Date.now();

    try {
      const binPath = await ensureWeeklyBinExists(getWeeklyBinPath(this.dataDir, this.now()));
      const filename = getAudioFilename(item);
      const filePath = path.join(binPath, filename);

      if (existsSync(filePath)) {
        const stats = statSync(filePath);
        if (stats.size > 0) {
          return { success: true, item, channel, filePath, fileSize: stats.size, downloadDuration: 0 };
        }
        // Empty leftover from an interrupted extraction
        unlinkSync(filePath);
      }

      const outputTemplate = path.join(binPath, `${path.parse(filename).name}.%(ext)s`);
      const result = await this.run([
        '--format', 'bestaudio/best',
        '--extract-audio',
        '--audio-format', 'mp3',
        '--audio-quality', '192K',
        '--no-playlist',
        '--no-progress',
        '--output', outputTemplate,
        item.url,
      ]);

      if (!result.success) {
        return {
          success: false,
          item,
          error: result.error ?? 'yt-dlp failed',
          reason: 'download_failed',
        };
      }

      if (!existsSync(filePath)) {
        return {
          success: false,
          item,
          error: `Expected ${filename} after extraction`,
          reason: 'file_missing',
        };
      }

      const stats = statSync(filePath);
      if (stats.size === 0) {
        unlinkSync(filePath);
        return {
          success: false,
          item,
          error: 'Extracted file is empty',
          reason: 'download_failed',
        };
      }

      return {
        success: true,
        item,
        channel,
        filePath,
        fileSize: stats.size,
        downloadDuration: Date.now() - startTime,
      };
    } catch (error) {
      return {
        success: false,
        item,
        error: error instanceof Error ? error.message : String(error),
        reason: 'download_failed',
      };
    }
  }
}
