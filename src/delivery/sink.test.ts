import { describe, it, expect } from 'vitest';
import { DeliverySinkError } from '../errors.js';
import { makeItem } from '../test-support/fakes.js';
import { MailDeliverySink } from './sink.js';
import type { DeliveryMessage, Mailer, MailReceipt } from './mailer.js';
import type { OverflowUploader } from './overflow.js';
import type { AudioArtifact } from '../media/types.js';

class RecordingMailer implements Mailer {
  readonly sent: DeliveryMessage[] = [];

  constructor(private readonly outcome: MailReceipt | Error = { accepted: ['listener@test.invalid'], rejected: [] }) {}

  async send(message: DeliveryMessage): Promise<MailReceipt> {
    this.sent.push(message);
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

const addresses = { from: 'sender@test.invalid', to: 'listener@test.invalid' };

const artifact: AudioArtifact = {
  item: makeItem('x1'),
  channel: '@SomeTalks',
  filePath: '/data/x1.mp3',
  fileSize: 100,
  downloadDuration: 1,
};

const uploader: OverflowUploader = {
  async upload() {
    return { url: 'https://bucket.test.invalid/x1.mp3', expiresAt: '2026-10-25T00:00:00.000Z' };
  },
};

describe('MailDeliverySink', () => {
  it('mails the attachment directly', async () => {
    const mailer = new RecordingMailer({ messageId: '<m1@test.invalid>', accepted: ['listener@test.invalid'], rejected: [] });
    const sink = new MailDeliverySink(mailer, addresses, uploader);

    const receipt = await sink.deliver(artifact, 'direct');

    expect(receipt).toEqual({ mode: 'direct', messageId: '<m1@test.invalid>', overflowUrl: undefined });
    expect(mailer.sent[0].attachments).toHaveLength(1);
  });

  it('uploads first and mails the link on overflow', async () => {
    const mailer = new RecordingMailer();
    const sink = new MailDeliverySink(mailer, addresses, uploader);

    const receipt = await sink.deliver(artifact, 'overflow');

    expect(receipt.overflowUrl).toBe('https://bucket.test.invalid/x1.mp3');
    expect(mailer.sent[0].attachments).toEqual([]);
    expect(mailer.sent[0].text).toContain('https://bucket.test.invalid/x1.mp3');
  });

  it('fails an overflow delivery without an uploader', async () => {
    const mailer = new RecordingMailer();
    const sink = new MailDeliverySink(mailer, addresses);

    await expect(sink.deliver(artifact, 'overflow')).rejects.toThrow(
      'File exceeds the attachment limit and no OVERFLOW_BUCKET is configured'
    );
    expect(mailer.sent).toEqual([]);
  });

  it('does not mail when the upload fails', async () => {
    const mailer = new RecordingMailer();
    const failing: OverflowUploader = {
      async upload() {
        throw new Error('AccessDenied');
      },
    };
    const sink = new MailDeliverySink(mailer, addresses, failing);

    const delivery = sink.deliver(artifact, 'overflow');
    await expect(delivery).rejects.toBeInstanceOf(DeliverySinkError);
    await expect(delivery).rejects.toThrow('Overflow upload failed: AccessDenied');
    expect(mailer.sent).toEqual([]);
  });

  it('wraps transport errors', async () => {
    const sink = new MailDeliverySink(new RecordingMailer(new Error('connect ECONNREFUSED')), addresses);
    const delivery = sink.deliver(artifact, 'direct');
    await expect(delivery).rejects.toBeInstanceOf(DeliverySinkError);
    await expect(delivery).rejects.toMatchObject({
      message: 'Mail send failed: connect ECONNREFUSED',
      channel: '@SomeTalks',
      itemId: 'x1',
    });
  });

  it('treats a rejected recipient as a failure', async () => {
    const mailer = new RecordingMailer({ accepted: [], rejected: ['listener@test.invalid'] });
    const sink = new MailDeliverySink(mailer, addresses);
    await expect(sink.deliver(artifact, 'direct')).rejects.toThrow('Recipient rejected: listener@test.invalid');
  });
});
