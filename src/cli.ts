#!/usr/bin/env node
/**
 * One-shot run: process every configured channel once and exit
 *
 * Suited to cron or a container job. Does not need Redis.
 *
 * Exit codes:
 * 0 - at least one channel committed a delivery
 * 1 - the run finished but nothing was committed
 * 2 - configuration error, no channel was attempted
 */

import { ConfigError, describeError } from './errors.js';
import type { RunSummary } from './runs/types.js';

function printSummary(summary: RunSummary): void {
  console.log('');
  console.log(`Run ${summary.runId}: ${summary.committed}/${summary.attempted} channels committed`);
  for (const outcome of summary.outcomes) {
    const item = outcome.item ? ` ${outcome.item.id} "${outcome.item.title}"` : '';
    const detail = outcome.error ? ` - ${outcome.error}` : '';
    console.log(`  [${outcome.state}] ${outcome.channel}${item}${detail}`);
  }
  if (summary.duplicateRisk.length > 0) {
    console.log('  Delivered but not recorded (may repeat next run):');
    for (const outcome of summary.duplicateRisk) {
      console.log(`    ${outcome.channel} ${outcome.item?.id ?? ''}`);
    }
  }
  if (summary.repeated.length > 0) {
    console.log('  Sent again (already in the stored history):');
    for (const outcome of summary.repeated) {
      console.log(`    ${outcome.channel} ${outcome.item?.id ?? ''}`);
    }
  }
  if (summary.historyDegraded) {
    console.log(`  History ${summary.historyStore} could not be loaded; dedup was skipped`);
  }
}

async function loadRuntime() {
  // env validates on import, so it is loaded here rather than at the top
  const { env } = await import('./config/env.js');
  const { createRunComponents } = await import('./runs/factory.js');
  const { notifyRunComplete } = await import('./notifications/discord.js');
  return { env, components: createRunComponents(env), notifyRunComplete };
}

async function main(): Promise<number> {
  let runtime: Awaited<ReturnType<typeof loadRuntime>>;
  try {
    runtime = await loadRuntime();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 2;
    }
    throw error;
  }

  const { env, components, notifyRunComplete } = runtime;
  console.log(`Channel audio run starting for ${env.CHANNELS.length} channel(s)`);

  const summary = await components.orchestrator.run({ channels: env.CHANNELS, trigger: 'cli' });
  printSummary(summary);
  await notifyRunComplete(summary);

  return summary.committed > 0 ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`Run aborted: ${describeError(error)}`);
    process.exitCode = 1;
  }
);
