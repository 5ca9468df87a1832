/**
 * channel-audio-mailer service entry point
 *
 * Startup sequence:
 * 1. Environment validation (fail-fast if missing)
 * 2. Redis connections for BullMQ
 * 3. Run components (history store, yt-dlp adapters, mail sink)
 * 4. HTTP server startup (Express + Bull Board)
 * 5. Run scheduler and worker
 *
 * For a single run without Redis, use cli.ts instead.
 */

console.log('channel-audio-mailer starting...');

// Import env first - validates required env vars on load (fail-fast pattern)
import { env } from './config/env.js';
import { workerConnection, queueConnection } from './config/redis.js';
import { RUN_QUEUE_NAME, initializeRunScheduler } from './runs/run.queue.js';
import { startRunWorker, stopRunWorker } from './runs/run.worker.js';
import { createRunComponents } from './runs/factory.js';
import { startServer } from './api/server.js';
import { isDiscordEnabled } from './notifications/discord.js';

console.log(`Environment: ${env.NODE_ENV}`);
console.log(`Channels: ${env.CHANNELS.join(', ')}`);
console.log('Worker connection:', workerConnection.status);
console.log('Queue connection:', queueConnection.status);
console.log(`Discord notifications: ${isDiscordEnabled() ? 'enabled' : 'disabled'}`);

let isShuttingDown = false;
async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`${signal} received, shutting down gracefully...`);

  try {
    // Waits for an in-flight run to finish its current channel pipeline
    await stopRunWorker();
    await queueConnection.quit();
    await workerConnection.quit();
  } catch (error) {
    console.error('Error during shutdown:', error);
  }
  process.exit(0);
}

async function start(): Promise<void> {
  const { orchestrator, store } = createRunComponents(env);
  console.log(`History store: ${store.describe()}`);

  startServer(store);

  await initializeRunScheduler();
  await startRunWorker(orchestrator);

  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  console.log('Initialization complete');
  console.log(`Queue '${RUN_QUEUE_NAME}' accepting runs`);
}

start().catch((error: unknown) => {
  console.error('Startup failed:', error);
  process.exit(1);
});
