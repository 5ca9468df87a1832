import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { makeItem } from '../test-support/fakes.js';
import { getAttachmentFilename, getAudioFilename, getISOWeekNumber, getWeeklyBinPath } from './organization.js';

describe('getISOWeekNumber', () => {
  it.each([
    [new Date(2026, 0, 1), { year: 2026, week: 1 }],
    [new Date(2027, 0, 1), { year: 2026, week: 53 }],
    [new Date(2026, 9, 18), { year: 2026, week: 42 }],
    [new Date(2024, 11, 30), { year: 2025, week: 1 }],
  ])('puts %s in %o', (date, expected) => {
    expect(getISOWeekNumber(date)).toEqual(expected);
  });
});

describe('getWeeklyBinPath', () => {
  it('pads the week number', () => {
    expect(getWeeklyBinPath('./data', new Date(2026, 0, 20))).toBe(path.join('data', 'media', '2026-W04', 'audio'));
  });
});

describe('filenames', () => {
  it('stores audio under the provider id', () => {
    expect(getAudioFilename(makeItem('abc-123_X'))).toBe('abc-123_X.mp3');
  });

  it('names the attachment after the title', () => {
    expect(getAttachmentFilename(makeItem('v1', { title: 'Q&A: "Why?" <Live>' }))).toBe('Q&A Why Live.mp3');
  });

  it('falls back to the id when the title sanitizes to nothing', () => {
    expect(getAttachmentFilename(makeItem('v1', { title: '???' }))).toBe('v1.mp3');
  });
});
