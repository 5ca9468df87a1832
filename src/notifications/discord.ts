/**
 * Discord webhook notifications for run summaries
 *
 * Only active if DISCORD_WEBHOOK_URL is configured. Best-effort: a failed
 * notification is logged and never affects the run.
 */

import { env } from '../config/env.js';
import type { RunOutcome, RunSummary } from '../runs/types.js';

const COLORS = {
  success: 0x28a745,  // Green
  failure: 0xdc3545,  // Red
  warning: 0xffc107,  // Yellow
  info: 0x17a2b8,     // Blue
};

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  description?: string;
  color: number;
  fields?: EmbedField[];
  timestamp?: string;
  footer?: {
    text: string;
  };
}

interface DiscordPayload {
  content?: string;
  embeds?: DiscordEmbed[];
}

export function isDiscordEnabled(): boolean {
  return !!env.DISCORD_WEBHOOK_URL;
}

async function sendToDiscord(payload: DiscordPayload): Promise<void> {
  if (!env.DISCORD_WEBHOOK_URL) {
    return;
  }

  try {
    const response = await fetch(env.DISCORD_WEBHOOK_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      console.error(`[Discord] Webhook failed: ${response.status} ${response.statusText}`, body);
    }
  } catch (error) {
    console.error('[Discord] Notification error:', error instanceof Error ? error.message : error);
  }
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

const STATE_ICONS: Record<RunOutcome['state'], string> = {
  COMMITTED: '✅',
  DELIVERED: '⚠️',
  FAILED: '❌',
  SKIPPED_NO_CANDIDATE: '⏭️',
};

function outcomeLine(outcome: RunOutcome): string {
  const subject = outcome.item ? truncate(outcome.item.title, 60) : 'no item';
  const detail = outcome.error ? ` (${truncate(outcome.error, 80)})` : '';
  return `${STATE_ICONS[outcome.state]} **${truncate(outcome.channel, 40)}**: ${subject}${detail}`;
}

/**
 * Green when every channel committed cleanly, yellow on partial success,
 * duplicate risk or repeats, red when nothing went out
 */
export function buildRunSummaryEmbed(summary: RunSummary): DiscordEmbed {
  let color = COLORS.warning;
  if (summary.committed === summary.attempted && summary.duplicateRisk.length === 0 && summary.repeated.length === 0) {
    color = COLORS.success;
  } else if (summary.committed === 0 && summary.duplicateRisk.length === 0) {
    color = COLORS.failure;
  }

  const fields: EmbedField[] = [
    { name: 'Committed', value: `${summary.committed}/${summary.attempted}`, inline: true },
    { name: 'Trigger', value: summary.trigger, inline: true },
  ];

  if (summary.duplicateRisk.length > 0) {
    fields.push({
      name: 'Delivered but not recorded',
      value: truncate(summary.duplicateRisk.map(outcome => `${outcome.channel}: ${outcome.item?.id ?? '?'}`).join('\n'), 1024),
      inline: false,
    });
  }

  if (summary.repeated.length > 0) {
    fields.push({
      name: 'Sent again',
      value: truncate(summary.repeated.map(outcome => `${outcome.channel}: ${outcome.item?.id ?? '?'}`).join('\n'), 1024),
      inline: false,
    });
  }

  if (summary.historyDegraded) {
    fields.push({ name: 'History', value: `Could not load ${summary.historyStore}`, inline: false });
  }

  return {
    title: 'Channel Audio Run Complete',
    description: truncate(summary.outcomes.map(outcomeLine).join('\n'), 4096),
    color,
    fields,
    timestamp: summary.finishedAt,
    footer: { text: `Run ${summary.runId.substring(0, 8)}` },
  };
}

export async function notifyRunComplete(summary: RunSummary): Promise<void> {
  await sendToDiscord({ embeds: [buildRunSummaryEmbed(summary)] });
}
