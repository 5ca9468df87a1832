/**
 * Run orchestrator
 *
 * Drives every configured channel through list -> select -> download -> size ->
 * deliver -> commit, strictly one channel at a time. A failure ends that
 * channel's pipeline and the run moves on; only delivery earns a history entry.
 */

import { randomUUID } from 'node:crypto';
import { unlink } from 'node:fs/promises';
import { ConfigError, DownloadError, PersistenceError, describeError } from '../errors.js';
import { deliveredIds, mergeHistories, record } from '../history/history.js';
import { selectItem, DEFAULT_MAX_ATTEMPTS } from '../selection/selector.js';
import { needsOverflow } from '../delivery/overflow.js';
import type { AccessibilityProbe, Channel, Item, ItemLister } from '../channels/types.js';
import type { History, HistoryStore } from '../history/types.js';
import type { AudioArtifact, AudioDownloader } from '../media/types.js';
import type { DeliveryMode, DeliverySink } from '../delivery/sink.js';
import type { ChannelState, RunOutcome, RunSummary, RunTrigger } from './types.js';

export interface OrchestratorDeps {
  store: HistoryStore;
  lister: ItemLister;
  probe: AccessibilityProbe;
  downloader: AudioDownloader;
  sink: DeliverySink;
}

export interface OrchestratorOptions {
  maxAttempts?: number;
  /** Remove the local mp3 once its delivery is committed */
  removeDeliveredFiles?: boolean;
  random?: () => number;
}

export interface RunRequest {
  channels: readonly Channel[];
  trigger: RunTrigger;
  runId?: string;
}

export class RunOrchestrator {
  private history: History = {};
  /** The run-start load failed; stays set for the whole run */
  private loadDegraded = false;
  /** The store must be re-read and merged before the next save */
  private needsReload = false;
  /** Delivered and recorded in memory, waiting for a save that succeeds */
  private pending: RunOutcome[] = [];

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(request: RunRequest): Promise<RunSummary> {
    if (request.channels.length === 0) {
      throw new ConfigError('No channels configured');
    }

    const runId = request.runId ?? randomUUID();
    const startedAt = new Date().toISOString();

    console.log(JSON.stringify({
      event: 'run_start',
      runId,
      trigger: request.trigger,
      channels: request.channels.length,
      historyStore: this.deps.store.describe(),
      timestamp: startedAt,
    }));

    this.pending = [];
    await this.loadHistory(runId);

    const outcomes: RunOutcome[] = [];
    for (const channel of request.channels) {
      outcomes.push(await this.runChannel(runId, channel));
    }

    // A later save can commit an earlier channel, so count from the final states
    const committed = outcomes.filter(outcome => outcome.state === 'COMMITTED').length;
    const duplicateRisk = outcomes.filter(outcome => outcome.delivered && !outcome.committed);
    const repeated = outcomes.filter(outcome => outcome.repeated === true);
    const finishedAt = new Date().toISOString();

    console.log(JSON.stringify({
      event: 'run_complete',
      runId,
      committed,
      attempted: outcomes.length,
      duplicateRisk: duplicateRisk.map(outcome => ({ channel: outcome.channel, itemId: outcome.item?.id })),
      repeated: repeated.map(outcome => ({ channel: outcome.channel, itemId: outcome.item?.id })),
      historyDegraded: this.loadDegraded,
      timestamp: finishedAt,
    }));

    return {
      runId,
      trigger: request.trigger,
      startedAt,
      finishedAt,
      historyStore: this.deps.store.describe(),
      historyDegraded: this.loadDegraded,
      attempted: outcomes.length,
      committed,
      outcomes,
      duplicateRisk,
      repeated,
    };
  }

  /**
   * A history we cannot read degrades dedup to "nothing delivered yet"
   * rather than aborting the run
   */
  private async loadHistory(runId: string): Promise<void> {
    try {
      this.history = await this.deps.store.load();
      this.loadDegraded = false;
      this.needsReload = false;
    } catch (error) {
      this.history = {};
      this.loadDegraded = true;
      this.needsReload = true;
      console.warn(JSON.stringify({
        event: 'history_load_degraded',
        runId,
        historyStore: this.deps.store.describe(),
        error: describeError(error),
        timestamp: new Date().toISOString(),
      }));
    }
  }

  private transition(runId: string, channel: Channel, state: ChannelState, item?: { id: string }): void {
    console.log(JSON.stringify({
      event: 'channel_state',
      runId,
      channel,
      state,
      itemId: item?.id,
      timestamp: new Date().toISOString(),
    }));
  }

  private async runChannel(runId: string, channel: Channel): Promise<RunOutcome> {
    this.transition(runId, channel, 'PENDING');

    // LISTING
    this.transition(runId, channel, 'LISTING');
    let candidates: Item[];
    try {
      candidates = await this.deps.lister.list(channel);
    } catch (error) {
      return this.skip(runId, channel, `Listing failed: ${describeError(error)}`);
    }

    // SELECTING
    this.transition(runId, channel, 'SELECTING');
    const selection = await selectItem({
      channel,
      candidates,
      deliveredIds: deliveredIds(this.history, channel),
      probe: this.deps.probe,
      maxAttempts: this.options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      random: this.options.random,
    });

    if (!selection) {
      return this.skip(runId, channel, `No accessible item among ${candidates.length} candidates`);
    }

    const { item } = selection;
    const summaryItem = { id: item.id, title: item.title };

    console.log(JSON.stringify({
      event: 'item_selected',
      runId,
      channel,
      itemId: item.id,
      title: item.title,
      pool: selection.pool,
      probes: selection.probes,
      timestamp: new Date().toISOString(),
    }));

    // DOWNLOADING
    this.transition(runId, channel, 'DOWNLOADING', item);
    let artifact: AudioArtifact;
    try {
      const result = await this.deps.downloader.download(item, channel);
      if (!result.success) {
        throw new DownloadError(`${result.reason}: ${result.error}`, { channel, itemId: item.id });
      }
      artifact = {
        item: result.item,
        channel: result.channel,
        filePath: result.filePath,
        fileSize: result.fileSize,
        downloadDuration: result.downloadDuration,
      };
    } catch (error) {
      return this.fail(runId, channel, summaryItem, error);
    }

    // SIZING
    this.transition(runId, channel, 'SIZING', item);
    const mode: DeliveryMode = needsOverflow(artifact.fileSize) ? 'overflow' : 'direct';

    // DELIVERING_*
    this.transition(runId, channel, mode === 'overflow' ? 'DELIVERING_VIA_OVERFLOW' : 'DELIVERING_DIRECT', item);
    try {
      await this.deps.sink.deliver(artifact, mode);
    } catch (error) {
      return this.fail(runId, channel, summaryItem, error, artifact.filePath, mode);
    }

    // DELIVERED -> COMMITTED
    this.transition(runId, channel, 'DELIVERED', item);
    const delivered: RunOutcome = {
      channel,
      state: 'DELIVERED',
      item: summaryItem,
      delivered: true,
      committed: false,
      mode,
      filePath: artifact.filePath,
    };

    try {
      await this.commit(runId, delivered);
    } catch (error) {
      console.error(JSON.stringify({
        event: 'history_save_failed',
        runId,
        channel,
        itemId: item.id,
        error: describeError(error),
        note: 'item was delivered but not recorded; a later save in this run may still record it',
        timestamp: new Date().toISOString(),
      }));
      delivered.error = `History save failed: ${describeError(error)}`;
    }

    return delivered;
  }

  /**
   * Record the delivery and persist it
   *
   * The in-memory history keeps the record even when the save fails, so the
   * next channel's save carries it along and commits that outcome too. After a
   * degraded load we re-read the store first: overwriting a history we never
   * saw would drop every entry in it.
   */
  private async commit(runId: string, outcome: RunOutcome): Promise<void> {
    if (outcome.item) {
      this.history = record(this.history, outcome.channel, outcome.item.id);
    }
    this.pending.push(outcome);

    if (this.needsReload) {
      let stored: History;
      try {
        stored = await this.deps.store.load();
      } catch (error) {
        throw new PersistenceError(`History still unreadable, not overwriting it: ${describeError(error)}`, { cause: error });
      }
      // Dedup ran blind until now: anything already stored was sent again
      for (const unchecked of this.pending) {
        if (unchecked.item && deliveredIds(stored, unchecked.channel).has(unchecked.item.id)) {
          unchecked.repeated = true;
          console.warn(JSON.stringify({
            event: 'item_repeated',
            runId,
            channel: unchecked.channel,
            itemId: unchecked.item.id,
            timestamp: new Date().toISOString(),
          }));
        }
      }
      this.history = mergeHistories(stored, this.history);
      this.needsReload = false;
    }

    await this.deps.store.save(this.history);

    for (const saved of this.pending.splice(0)) {
      saved.state = 'COMMITTED';
      saved.committed = true;
      delete saved.error;
      this.transition(runId, saved.channel, 'COMMITTED', saved.item);
      await this.cleanup(runId, saved.filePath);
    }
  }

  private async cleanup(runId: string, filePath: string | undefined): Promise<void> {
    if (!this.options.removeDeliveredFiles || !filePath) return;
    try {
      await unlink(filePath);
    } catch (error) {
      console.warn(JSON.stringify({
        event: 'artifact_cleanup_failed',
        runId,
        filePath,
        error: describeError(error),
        timestamp: new Date().toISOString(),
      }));
    }
  }

  private skip(runId: string, channel: Channel, reason: string): RunOutcome {
    this.transition(runId, channel, 'SKIPPED_NO_CANDIDATE');
    console.warn(JSON.stringify({
      event: 'channel_skipped',
      runId,
      channel,
      reason,
      timestamp: new Date().toISOString(),
    }));
    return { channel, state: 'SKIPPED_NO_CANDIDATE', delivered: false, committed: false, error: reason };
  }

  private fail(
    runId: string,
    channel: Channel,
    item: { id: string; title: string },
    error: unknown,
    filePath?: string,
    mode?: DeliveryMode
  ): RunOutcome {
    this.transition(runId, channel, 'FAILED');
    const message = describeError(error);
    console.error(JSON.stringify({
      event: 'channel_failed',
      runId,
      channel,
      itemId: item.id,
      error: message,
      filePath,
      timestamp: new Date().toISOString(),
    }));
    return { channel, state: 'FAILED', item, delivered: false, committed: false, mode, filePath, error: message };
  }
}
