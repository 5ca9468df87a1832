import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { makeItem } from '../test-support/fakes.js';
import { YtDlpAudioCollector } from './collector.js';
import type { YtDlpResult, YtDlpRunner } from '../channels/ytdlp.js';

const ok: YtDlpResult = { success: true, exitCode: 0, stdout: '', stderr: '' };

// 2026-10-18 is a Sunday in ISO week 42
const now = () => new Date(2026, 9, 18, 12, 0, 0);

/**
 * Runner that writes the file yt-dlp would produce for the --output template
 */
function writingRunner(content: string, calls: string[][]): YtDlpRunner {
  return async (args) => {
    calls.push(args);
    const template = args[args.indexOf('--output') + 1];
    await writeFile(template.replace('%(ext)s', 'mp3'), content);
    return ok;
  };
}

describe('YtDlpAudioCollector', () => {
  let dataDir: string;
  let binPath: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), 'collector-'));
    binPath = path.join(dataDir, 'media', '2026-W42', 'audio');
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('extracts mp3 audio into the weekly bin', async () => {
    const calls: string[][] = [];
    const collector = new YtDlpAudioCollector(writingRunner('mp3-bytes', calls), dataDir, now);

    const result = await collector.download(makeItem('abc123'), '@SomeTalks');

    expect(result).toMatchObject({
      success: true,
      channel: '@SomeTalks',
      filePath: path.join(binPath, 'abc123.mp3'),
      fileSize: 9,
    });
    expect(calls).toEqual([[
      '--format', 'bestaudio/best',
      '--extract-audio',
      '--audio-format', 'mp3',
      '--audio-quality', '192K',
      '--no-playlist',
      '--no-progress',
      '--output', path.join(binPath, 'abc123.%(ext)s'),
      'https://www.youtube.com/watch?v=abc123',
    ]]);
  });

  it('reuses a file left by an earlier run', async () => {
    await mkdir(binPath, { recursive: true });
    await writeFile(path.join(binPath, 'abc123.mp3'), 'earlier');
    const calls: string[][] = [];
    const collector = new YtDlpAudioCollector(writingRunner('fresh', calls), dataDir, now);

    const result = await collector.download(makeItem('abc123'), '@SomeTalks');

    expect(calls).toEqual([]);
    expect(result).toMatchObject({ success: true, fileSize: 7, downloadDuration: 0 });
  });

  it('replaces an empty leftover file', async () => {
    await mkdir(binPath, { recursive: true });
    await writeFile(path.join(binPath, 'abc123.mp3'), '');
    const calls: string[][] = [];
    const collector = new YtDlpAudioCollector(writingRunner('fresh', calls), dataDir, now);

    const result = await collector.download(makeItem('abc123'), '@SomeTalks');

    expect(calls).toHaveLength(1);
    expect(result).toMatchObject({ success: true, fileSize: 5 });
  });

  it('reports a failed extraction', async () => {
    const collector = new YtDlpAudioCollector(async () => ({
      success: false,
      exitCode: 1,
      stdout: '',
      stderr: 'ERROR: Postprocessing: ffprobe and ffmpeg not found',
      error: 'yt-dlp exited with code 1: ERROR: Postprocessing: ffprobe and ffmpeg not found',
    }), dataDir, now);

    const result = await collector.download(makeItem('abc123'), '@SomeTalks');

    expect(result).toEqual({
      success: false,
      item: makeItem('abc123'),
      error: 'yt-dlp exited with code 1: ERROR: Postprocessing: ffprobe and ffmpeg not found',
      reason: 'download_failed',
    });
  });

  it('reports a missing file after a successful exit', async () => {
    const collector = new YtDlpAudioCollector(async () => ok, dataDir, now);
    const result = await collector.download(makeItem('abc123'), '@SomeTalks');
    expect(result).toMatchObject({ success: false, reason: 'file_missing', error: 'Expected abc123.mp3 after extraction' });
  });

  it('deletes an empty extraction and fails', async () => {
    const collector = new YtDlpAudioCollector(writingRunner('', []), dataDir, now);
    const result = await collector.download(makeItem('abc123'), '@SomeTalks');
    expect(result).toMatchObject({ success: false, reason: 'download_failed', error: 'Extracted file is empty' });
    expect(existsSync(path.join(binPath, 'abc123.mp3'))).toBe(false);
  });
});
