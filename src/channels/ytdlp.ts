/**
 * yt-dlp subprocess runner
 *
 * Every provider interaction (listing, probing, audio extraction) goes through
 * the yt-dlp CLI. The runner never rejects: spawn failures and non-zero exits
 * come back as a result with success: false so callers decide what they mean.
 */

import { spawn } from 'node:child_process';

export interface YtDlpResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export type YtDlpRunner = (args: string[]) => Promise<YtDlpResult>;

/**
 * Listing and probing finish in seconds; audio extraction of a long talk can
 * take a while behind a slow connection
 */
export const YTDLP_TIMEOUTS = {
  list: 2 * 60 * 1000,
  probe: 60 * 1000,
  download: 30 * 60 * 1000,
};

/**
 * Create a runner bound to a yt-dlp binary and a timeout
 */
export function createYtDlpRunner(binaryPath: string, timeoutMs: number): YtDlpRunner {
  return (args: string[]) =>
    new Promise<YtDlpResult>((resolve) => {
      const child = spawn(binaryPath, args, {
        env: process.env,
        timeout: timeoutMs,
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve({ success: true, exitCode: code, stdout, stderr });
        } else {
          resolve({
            success: false,
            exitCode: code,
            stdout,
            stderr,
            error: `yt-dlp exited with code ${code}: ${lastLine(stderr)}`,
          });
        }
      });

      child.on('error', (error) => {
        resolve({
          success: false,
          exitCode: null,
          stdout,
          stderr,
          error: `Failed to spawn yt-dlp: ${error.message}`,
        });
      });
    });
}

/**
 * yt-dlp prints progress and warnings before the actual error line
 */
function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

/**
 * Turn a configured channel handle into something yt-dlp can list
 *
 * - full URLs pass through
 * - ytsearchN:terms queries pass through
 * - @handle -> https://www.youtube.com/@handle/videos
 * - UC... channel ids -> https://www.youtube.com/channel/UC.../videos
 * - anything else is treated as a handle without the @
 */
export function resolveChannelUrl(channel: string): string {
  const trimmed = channel.trim();

  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  if (/^ytsearch\d*:/i.test(trimmed)) return trimmed;
  if (trimmed.startsWith('@')) return `https://www.youtube.com/${trimmed}/videos`;
  if (/^UC[\w-]{22}$/.test(trimmed)) return `https://www.youtube.com/channel/${trimmed}/videos`;

  return `https://www.youtube.com/@${trimmed}/videos`;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
