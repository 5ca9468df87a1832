/**
 * Bull Board monitoring dashboard setup
 *
 * Web UI for the run queue at /admin/queues
 */

import { createBullBoard } from '@bull-board/api';
import { BullMQAdapter } from '@bull-board/api/bullMQAdapter';
import { ExpressAdapter } from '@bull-board/express';
import { runQueue } from '../runs/run.queue.js';

/**
 * Mount with: app.use('/admin/queues', serverAdapter.getRouter())
 */
export const serverAdapter = new ExpressAdapter();
serverAdapter.setBasePath('/admin/queues');

createBullBoard({
  queues: [new BullMQAdapter(runQueue)],
  serverAdapter,
});
