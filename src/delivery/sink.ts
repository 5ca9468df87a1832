/**
 * Delivery sink: overflow upload (when instructed) plus the email itself
 *
 * Either the recipient has the audio afterwards or deliver() throws
 * DeliverySinkError; there is no partial success.
 */

import { DeliverySinkError, describeError } from '../errors.js';
import { buildDeliveryMessage } from './mailer.js';
import type { Mailer } from './mailer.js';
import type { OverflowLink, OverflowUploader } from './overflow.js';
import type { AudioArtifact } from '../media/types.js';

export type DeliveryMode = 'direct' | 'overflow';

export interface DeliveryReceipt {
  mode: DeliveryMode;
  messageId?: string;
  overflowUrl?: string;
}

export interface DeliverySink {
  deliver(artifact: AudioArtifact, mode: DeliveryMode): Promise<DeliveryReceipt>;
}

export class MailDeliverySink implements DeliverySink {
  constructor(
    private readonly mailer: Mailer,
    private readonly addresses: { from: string; to: string },
    private readonly overflow?: OverflowUploader
  ) {}

  async deliver(artifact: AudioArtifact, mode: DeliveryMode): Promise<DeliveryReceipt> {
    const context = { channel: artifact.channel, itemId: artifact.item.id };

    let link: OverflowLink | undefined;
    if (mode === 'overflow') {
      if (!this.overflow) {
        throw new DeliverySinkError('File exceeds the attachment limit and no OVERFLOW_BUCKET is configured', context);
      }
      try {
        link = await this.overflow.upload(artifact);
      } catch (error) {
        throw new DeliverySinkError(`Overflow upload failed: ${describeError(error)}`, { ...context, cause: error });
      }
    }

    const message = buildDeliveryMessage(artifact, this.addresses, link);

    try {
      const receipt = await this.mailer.send(message);
      if (receipt.rejected.length > 0) {
        throw new DeliverySinkError(`Recipient rejected: ${receipt.rejected.join(', ')}`, context);
      }
      return { mode, messageId: receipt.messageId, overflowUrl: link?.url };
    } catch (error) {
      if (error instanceof DeliverySinkError) throw error;
      throw new DeliverySinkError(`Mail send failed: ${describeError(error)}`, { ...context, cause: error });
    }
  }
}
