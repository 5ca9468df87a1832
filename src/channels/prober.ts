/**
 * Accessibility probing
 *
 * Membership-only, private and age-gated videos show up in channel listings
 * but cannot be extracted without an account. The flat listing sometimes says
 * so already; otherwise a simulated extraction tells us.
 */

import { GATED_AVAILABILITY } from './types.js';
import type { YtDlpRunner } from './ytdlp.js';
import type { AccessibilityProbe, Item } from './types.js';

const gated = new Set<string>(GATED_AVAILABILITY);

export function isGatedAvailability(availability: string | undefined): boolean {
  return availability !== undefined && gated.has(availability);
}

export class YtDlpProbe implements AccessibilityProbe {
  constructor(private readonly run: YtDlpRunner) {}

  async isAccessible(item: Item): Promise<boolean> {
    if (isGatedAvailability(item.availability)) {
      return false;
    }

    const result = await this.run(['--simulate', '--quiet', '--no-warnings', '--no-playlist', item.url]);

    if (!result.success) {
      console.log(JSON.stringify({
        event: 'probe_inaccessible',
        itemId: item.id,
        reason: result.error,
        timestamp: new Date().toISOString(),
      }));
    }

    return result.success;
  }
}
