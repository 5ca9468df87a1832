import { describe, it, expect } from 'vitest';
import { makeItem } from '../test-support/fakes.js';
import { buildDeliveryMessage, formatDuration, formatSize } from './mailer.js';
import type { AudioArtifact } from '../media/types.js';

const addresses = { from: 'sender@test.invalid', to: 'listener@test.invalid' };

function artifact(overrides: Partial<AudioArtifact> = {}): AudioArtifact {
  return {
    item: makeItem('abc123', { title: 'Morning Talk: Ep/12', duration: 754 }),
    channel: '@SomeTalks',
    filePath: '/data/media/2026-W42/audio/abc123.mp3',
    fileSize: 5 * 1024 * 1024,
    downloadDuration: 100,
    ...overrides,
  };
}

describe('formatDuration', () => {
  it.each([
    [0, '0:00'],
    [59, '0:59'],
    [754, '12:34'],
    [3723, '1:02:03'],
  ])('formats %i seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('formatSize', () => {
  it.each([
    [512, '512 B'],
    [2048, '2.0 KB'],
    [5 * 1024 * 1024, '5.0 MB'],
  ])('formats %i bytes as %s', (bytes, expected) => {
    expect(formatSize(bytes)).toBe(expected);
  });
});

describe('buildDeliveryMessage', () => {
  it('attaches the audio for a direct delivery', () => {
    const message = buildDeliveryMessage(artifact(), addresses);

    expect(message.from).toBe('sender@test.invalid');
    expect(message.to).toBe('listener@test.invalid');
    expect(message.subject).toBe('[Channel Audio] Morning Talk: Ep/12');
    expect(message.attachments).toEqual([
      {
        filename: 'Morning Talk Ep12.mp3',
        path: '/data/media/2026-W42/audio/abc123.mp3',
        contentType: 'audio/mpeg',
      },
    ]);
    expect(message.text).toBe([
      'Hello,',
      '',
      'Here is the latest audio picked from @SomeTalks.',
      '',
      'Title: Morning Talk: Ep/12',
      'Source: https://www.youtube.com/watch?v=abc123',
      'Length: 12:34',
      'Size: 5.0 MB',
      '',
      'The audio is attached as Morning Talk Ep12.mp3.',
      '',
      'This message was generated automatically.',
      '',
    ].join('\n'));
  });

  it('links instead of attaching for an overflow delivery', () => {
    const message = buildDeliveryMessage(
      artifact({ fileSize: 30 * 1024 * 1024, item: makeItem('big1', { title: 'Long Interview' }) }),
      addresses,
      { url: 'https://bucket.test.invalid/big1.mp3', expiresAt: '2026-10-25T06:00:00.000Z' }
    );

    expect(message.attachments).toEqual([]);
    expect(message.text).toBe([
      'Hello,',
      '',
      'Here is the latest audio picked from @SomeTalks.',
      '',
      'Title: Long Interview',
      'Source: https://www.youtube.com/watch?v=big1',
      'Size: 30.0 MB',
      '',
      'The file is larger than 25 MB, so it was uploaded instead of attached.',
      'Download it here (link valid until 2026-10-25T06:00:00.000Z):',
      '',
      'https://bucket.test.invalid/big1.mp3',
      '',
      'This message was generated automatically.',
      '',
    ].join('\n'));
  });
});
