/**
 * Weekly bin organization for downloaded audio
 * Files land in {DATA_DIR}/media/{year}-W{week}/audio/ using ISO 8601 weeks
 */

import { mkdir } from 'node:fs/promises';
import * as path from 'node:path';
import sanitizeFilename from 'sanitize-filename';
import type { Item } from '../channels/types.js';

interface ISOWeek {
  year: number;
  week: number;
}

/**
 * ISO 8601 week: Monday is the first day, week 1 contains January 4
 */
export function getISOWeekNumber(date: Date): ISOWeek {
  const d = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));

  // The week belongs to the year that contains its Thursday
  const dayNum = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);

  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  const weekNum = Math.ceil((((d.getTime() - yearStart.getTime()) / 86400000) + 1) / 7);

  return { year: d.getUTCFullYear(), week: weekNum };
}

/**
 * Example: ./data/media/2026-W04/audio
 */
export function getWeeklyBinPath(dataDir: string, date: Date): string {
  const { year, week } = getISOWeekNumber(date);
  const weekStr = week.toString().padStart(2, '0');
  return path.join(dataDir, 'media', `${year}-W${weekStr}`, 'audio');
}

export async function ensureWeeklyBinExists(binPath: string): Promise<string> {
  await mkdir(binPath, { recursive: true });
  return binPath;
}

/**
 * On-disk name: the provider id, which is stable and filesystem-safe
 */
export function getAudioFilename(item: Item): string {
  return `${sanitizeFilename(item.id, { replacement: '_' })}.mp3`;
}

/**
 * Attachment name shown to the recipient: the title, falling back to the id
 */
export function getAttachmentFilename(item: Item): string {
  const fromTitle = sanitizeFilename(item.title, { replacement: '' }).trim().substring(0, 120);
  return `${fromTitle || sanitizeFilename(item.id, { replacement: '_' }) || 'audio'}.mp3`;
}
