/**
 * Email delivery over SMTP
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { getAttachmentFilename } from '../media/organization.js';
import type { AudioArtifact } from '../media/types.js';
import type { OverflowLink } from './overflow.js';

export interface MailAttachment {
  filename: string;
  path: string;
  contentType: string;
}

export interface DeliveryMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  attachments: MailAttachment[];
}

export interface MailReceipt {
  messageId?: string;
  accepted: string[];
  rejected: string[];
}

export interface Mailer {
  send(message: DeliveryMessage): Promise<MailReceipt>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
}

export const SUBJECT_PREFIX = '[Channel Audio]';

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * 754 -> "12:34", 3723 -> "1:02:03"
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const mm = hours > 0 ? minutes.toString().padStart(2, '0') : minutes.toString();
  const ss = seconds.toString().padStart(2, '0');
  return hours > 0 ? `${hours}:${mm}:${ss}` : `${mm}:${ss}`;
}

/**
 * Compose the delivery email
 * With an overflow link the body carries the link and nothing is attached
 */
export function buildDeliveryMessage(
  artifact: AudioArtifact,
  addresses: { from: string; to: string },
  overflow?: OverflowLink
): DeliveryMessage {
  const { item } = artifact;
  const attachmentName = getAttachmentFilename(item);

  const lines = [
    'Hello,',
    '',
    `Here is the latest audio picked from ${artifact.channel}.`,
    '',
    `Title: ${item.title}`,
    `Source: ${item.url}`,
  ];

  if (item.duration !== undefined) {
    lines.push(`Length: ${formatDuration(item.duration)}`);
  }
  lines.push(`Size: ${formatSize(artifact.fileSize)}`, '');

  if (overflow) {
    lines.push(
      'The file is larger than 25 MB, so it was uploaded instead of attached.',
      `Download it here (link valid until ${overflow.expiresAt}):`,
      '',
      overflow.url,
    );
  } else {
    lines.push(`The audio is attached as ${attachmentName}.`);
  }

  lines.push('', 'This message was generated automatically.');

  return {
    from: addresses.from,
    to: addresses.to,
    subject: `${SUBJECT_PREFIX} ${item.title}`,
    text: `${lines.join('\n')}\n`,
    attachments: overflow
      ? []
      : [{ filename: attachmentName, path: artifact.filePath, contentType: 'audio/mpeg' }],
  };
}

function addressList(addresses: unknown): string[] {
  if (!Array.isArray(addresses)) return [];
  return addresses.map(entry =>
    typeof entry === 'object' && entry !== null && 'address' in entry ? String(entry.address) : String(entry)
  );
}

export class SmtpMailer implements Mailer {
  private readonly transport: Transporter;

  constructor(settings: SmtpSettings) {
    // Port 587 upgrades with STARTTLS; 465 is implicit TLS
    this.transport = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      requireTLS: !settings.secure,
      auth: { user: settings.user, pass: settings.pass },
    });
  }

  async send(message: DeliveryMessage): Promise<MailReceipt> {
    const info = await this.transport.sendMail(message);
    return {
      messageId: info.messageId,
      accepted: addressList(info.accepted),
      rejected: addressList(info.rejected),
    };
  }
}
