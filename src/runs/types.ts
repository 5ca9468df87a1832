/**
 * Run and per-channel outcome types
 */

import type { Channel } from '../channels/types.js';
import type { DeliveryMode } from '../delivery/sink.js';

/**
 * Per-channel pipeline states
 *
 * PENDING -> LISTING -> SELECTING -> SKIPPED_NO_CANDIDATE
 *                                 -> DOWNLOADING -> SIZING -> DELIVERING_* -> DELIVERED -> COMMITTED
 * Any step after SELECTING can end in FAILED. DELIVERED is terminal only when
 * the history save fails and no later save in the run records the item.
 */
export type ChannelState =
  | 'PENDING'
  | 'LISTING'
  | 'SELECTING'
  | 'SKIPPED_NO_CANDIDATE'
  | 'DOWNLOADING'
  | 'SIZING'
  | 'DELIVERING_DIRECT'
  | 'DELIVERING_VIA_OVERFLOW'
  | 'DELIVERED'
  | 'COMMITTED'
  | 'FAILED';

export type TerminalState = Extract<ChannelState, 'SKIPPED_NO_CANDIDATE' | 'FAILED' | 'DELIVERED' | 'COMMITTED'>;

export type RunTrigger = 'scheduled' | 'manual' | 'cli';

export interface RunOutcome {
  channel: Channel;
  state: TerminalState;
  item?: { id: string; title: string };
  delivered: boolean;
  committed: boolean;
  mode?: DeliveryMode;
  /** Local audio path, when one was produced */
  filePath?: string;
  /** Sent while dedup was blind, and the stored history already held it */
  repeated?: boolean;
  error?: string;
}

export interface RunSummary {
  runId: string;
  trigger: RunTrigger;
  startedAt: string;
  finishedAt: string;
  historyStore: string;
  /** History could not be loaded; dedup ran against an empty history */
  historyDegraded: boolean;
  attempted: number;
  committed: number;
  outcomes: RunOutcome[];
  /** Delivered but not recorded: these may be sent again by a later run */
  duplicateRisk: RunOutcome[];
  /** Sent again because the history could not be loaded at run start */
  repeated: RunOutcome[];
}
