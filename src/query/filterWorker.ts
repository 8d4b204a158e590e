/**
 * filterWorker — Entry point of a forked chunk-evaluation process.
 *
 * Receives `{ type: 'task', task }` messages over IPC and answers each with
 * a WorkerReply. The process stays up until its parent kills it or closes
 * the channel.
 */

import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { moduleLogger } from '../logging/logger.js';
import { chunkTaskSchema, evaluateChunk } from './ChunkedFilter.js';
import type { WorkerReply } from './ProcessChunkExecutor.js';

const log = moduleLogger('filterWorker');

const taskMessageSchema = z.object({
  type: z.literal('task'),
  task: chunkTaskSchema,
});

function reply(message: WorkerReply): void {
  if (process.send === undefined) {
    throw new Error('filterWorker must be started with an IPC channel');
  }
  process.send(message);
}

process.on('message', (message: unknown) => {
  const parsed = taskMessageSchema.safeParse(message);
  if (!parsed.success) {
    log.error({ issues: parsed.error.issues }, 'Malformed task message');
    reply({ type: 'error', index: -1, message: parsed.error.message });
    return;
  }

  const { task } = parsed.data;
  try {
    reply({ type: 'result', result: evaluateChunk(task, log) });
  } catch (err) {
    reply({ type: 'error', index: task.index, message: errorMessage(err) });
  }
});

process.on('disconnect', () => {
  process.exit(0);
});
