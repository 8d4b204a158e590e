/**
 * ProcessChunkExecutor — Evaluates chunk tasks in forked Node processes.
 *
 * A fixed pool of processes is started per run. Each process takes one
 * task at a time; the next queued task goes to whichever process answers
 * first. Every process is killed when the run ends, whether it succeeded
 * or not.
 *
 * When this module runs from its TypeScript source, workers load the
 * TypeScript worker through the tsx loader.
 */

import { fork, type ChildProcess } from 'node:child_process';
import { dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { moduleLogger, type Logger } from '../logging/logger.js';
import { chunkResultSchema, type ChunkExecutor, type ChunkResult, type ChunkTask } from './ChunkedFilter.js';

export interface ProcessChunkExecutorOptions {
  /** Pool size (default: 2) */
  workers?: number;
  /** Worker module to fork (default: the filterWorker beside this module) */
  workerPath?: string;
  logger?: Logger;
}

export const workerReplySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), result: chunkResultSchema }),
  z.object({ type: z.literal('error'), index: z.number().int(), message: z.string() }),
]);

export type WorkerReply = z.infer<typeof workerReplySchema>;

function defaultWorkerPath(): string {
  const here = fileURLToPath(import.meta.url);
  return join(dirname(here), `filterWorker${extname(here)}`);
}

export class ProcessChunkExecutor implements ChunkExecutor {
  private readonly workers: number;
  private readonly workerPath: string;
  private readonly execArgv: string[];
  private readonly log: Logger;

  constructor(options: ProcessChunkExecutorOptions = {}) {
    this.workers = Math.max(1, Math.floor(options.workers ?? 2));
    this.workerPath = options.workerPath ?? defaultWorkerPath();
    this.execArgv = extname(this.workerPath) === '.ts' ? ['--import', 'tsx'] : [];
    this.log = moduleLogger('ProcessChunkExecutor', options.logger);
  }

  async run(tasks: ChunkTask[]): Promise<ChunkResult[]> {
    if (tasks.length === 0) {
      return [];
    }

    const poolSize = Math.min(this.workers, tasks.length);
    const children: ChildProcess[] = [];
    this.log.debug({ tasks: tasks.length, workers: poolSize }, 'Starting worker pool');

    try {
      for (let i = 0; i < poolSize; i++) {
        children.push(fork(this.workerPath, [], {
          execArgv: this.execArgv,
          serialization: 'advanced',
          stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
        }));
      }
      return await this.dispatch(children, tasks);
    } finally {
      for (const child of children) {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill();
        }
      }
    }
  }

  private dispatch(children: ChildProcess[], tasks: ChunkTask[]): Promise<ChunkResult[]> {
    return new Promise((resolve, reject) => {
      const queue = [...tasks];
      const results: ChunkResult[] = [];
      let settled = false;

      const fail = (err: Error): void => {
        if (!settled) {
          settled = true;
          reject(err);
        }
      };

      const feed = (child: ChildProcess): void => {
        const task = queue.shift();
        if (task === undefined) {
          return;
        }
        child.send({ type: 'task', task }, err => {
          if (err !== null) {
            fail(err);
          }
        });
      };

      for (const child of children) {
        child.on('message', (message: unknown) => {
          const parsed = workerReplySchema.safeParse(message);
          if (!parsed.success) {
            fail(new Error(`Malformed worker reply: ${parsed.error.message}`));
            return;
          }
          const reply = parsed.data;
          if (reply.type === 'error') {
            fail(new Error(`Chunk ${reply.index} failed: ${reply.message}`));
            return;
          }
          results.push(reply.result);
          if (results.length === tasks.length) {
            settled = true;
            resolve(results);
            return;
          }
          feed(child);
        });
        child.on('error', fail);
        child.on('exit', (code, signal) => {
          if (!settled) {
            fail(new Error(`Worker exited early (code ${String(code)}, signal ${String(signal)})`));
          }
        });
        feed(child);
      }
    });
  }
}

export function createProcessChunkExecutor(options?: ProcessChunkExecutorOptions): ProcessChunkExecutor {
  return new ProcessChunkExecutor(options);
}
