/**
 * Channel listing via yt-dlp flat playlists
 */

import { ProviderError } from '../errors.js';
import { resolveChannelUrl, watchUrl } from './ytdlp.js';
import type { YtDlpRunner } from './ytdlp.js';
import type { Channel, Item, ItemLister } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Listings report duration as a float (or null for live/upcoming entries)
 */
function parseDuration(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return undefined;
  return Math.round(value);
}

/**
 * Parse `yt-dlp -J --flat-playlist` output into items
 *
 * Nested playlists (channel tabs) are skipped. Entries without an id are kept
 * with an empty id; the selector drops them.
 */
export function parseFlatPlaylist(json: string): Item[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ProviderError('yt-dlp listing is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ProviderError('yt-dlp listing is not a JSON object');
  }

  // A single video URL lists as the video itself
  if (parsed._type !== 'playlist' && typeof parsed.id === 'string') {
    return [toItem(parsed)];
  }

  const entries = parsed.entries;
  if (!Array.isArray(entries)) {
    throw new ProviderError('yt-dlp listing has no entries');
  }

  const items: Item[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    if (entry._type === 'playlist') continue;
    items.push(toItem(entry));
  }
  return items;
}

function toItem(entry: Record<string, unknown>): Item {
  const id = optionalString(entry.id) ?? '';
  const url = optionalString(entry.url);

  return {
    id,
    title: optionalString(entry.title) ?? id,
    url: url && /^https?:\/\//.test(url) ? url : watchUrl(id),
    duration: parseDuration(entry.duration),
    availability: optionalString(entry.availability),
  };
}

export class YtDlpLister implements ItemLister {
  constructor(
    private readonly run: YtDlpRunner,
    private readonly listLimit: number
  ) {}

  async list(channel: Channel): Promise<Item[]> {
    const target = resolveChannelUrl(channel);
    const result = await this.run([
      '--flat-playlist',
      '--dump-single-json',
      '--no-warnings',
      '--playlist-end', String(this.listLimit),
      target,
    ]);

    if (!result.success) {
      throw new ProviderError(result.error ?? `Listing failed for ${target}`, { channel });
    }

    try {
      return parseFlatPlaylist(result.stdout);
    } catch (error) {
      if (error instanceof ProviderError) {
        throw new ProviderError(`${error.message} (${target})`, { channel, cause: error });
      }
      throw error;
    }
  }
}
