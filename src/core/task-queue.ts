/**
 * Background Task Queue
 *
 * Single-worker FIFO executor for deferred work such as directory indexing.
 * submit() is synchronous and returns a handle immediately; execution always
 * starts on a later tick, so a submitter never runs its own task inline.
 *
 * - Exactly one task runs at a time, in submission order
 * - A failing task is recorded as TaskFailure and never rethrown; the next
 *   task proceeds
 * - Only queued tasks can be cancelled. Running tasks see the shared
 *   AbortSignal, which only shutdown() aborts
 * - Terminal records are retained up to maxHistory (oldest dropped first)
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { CompletionError } from '../api/errors.js';
import type { TaskQueueEventName, TaskQueueEvents } from '../api/events.js';
import type { TaskFn, TaskHandle, TaskQueueStats, TaskRecord } from '../types/index.js';
import { createCancelledError } from '../utils/abort.js';

export const DEFAULT_MAX_HISTORY = 100;
export const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

export interface TaskQueueConfig {
  /** Terminal task records kept for getTask()/listTasks() (default: 100) */
  maxHistory?: number;

  /** Default timeout for drain() and shutdown() (default: 30000) */
  drainTimeoutMs?: number;

  /** Clock (default: Date.now) */
  now?: () => number;

  logger?: Logger;
}

interface QueuedTask {
  record: TaskRecord;
  run: (signal: AbortSignal) => Promise<unknown>;
}

export class BackgroundTaskQueue extends EventEmitter<TaskQueueEvents> {
  private readonly maxHistory: number;
  private readonly drainTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  private readonly controller = new AbortController();
  private readonly records = new Map<string, TaskRecord>();
  private readonly terminalOrder: string[] = [];
  private queue: QueuedTask[] = [];

  private working = false;
  private scheduled = false;
  private closed = false;

  private stats = {
    completed: 0,
    failed: 0,
    cancelled: 0,
  };

  constructor(config: TaskQueueConfig = {}) {
    super();
    this.maxHistory = config.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.drainTimeoutMs = config.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;

    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 0) {
      throw new Error(`BackgroundTaskQueue: maxHistory must be a non-negative integer, got ${this.maxHistory}`);
    }
    if (this.drainTimeoutMs <= 0) {
      throw new Error('BackgroundTaskQueue: drainTimeoutMs must be > 0');
    }

    this.logger?.debug(
      { maxHistory: this.maxHistory, drainTimeoutMs: this.drainTimeoutMs },
      'BackgroundTaskQueue initialized'
    );
  }

  /**
   * Enqueue a task. Returns before the task starts.
   *
   * @throws CompletionError('Cancelled') after shutdown()
   */
  public submit<A extends unknown[], R>(name: string, fn: TaskFn<A, R>, ...args: A): TaskHandle {
    if (this.closed) {
      throw new CompletionError('Cancelled', `Task queue has been shut down, rejected task '${name}'`);
    }

    const record: TaskRecord = {
      id: randomUUID(),
      name,
      status: 'queued',
      submittedAt: this.now(),
    };

    this.records.set(record.id, record);
    this.queue.push({ record, run: (signal) => fn(signal, ...args) });

    this.logger?.debug(
      { taskId: record.id, name, queueLength: this.queue.length, working: this.working },
      'Task enqueued'
    );
    this.notify('task:queued', record);

    this.schedule();
    return { id: record.id, name };
  }

  public getTask(id: string): TaskRecord | undefined {
    const record = this.records.get(id);
    return record ? snapshot(record) : undefined;
  }

  /**
   * Every known task (queued, running and retained history) in submission order.
   */
  public listTasks(): TaskRecord[] {
    return Array.from(this.records.values(), snapshot);
  }

  /**
   * Cancel a task that has not started yet.
   *
   * @returns false if the task is unknown, running or already finished
   */
  public cancel(id: string): boolean {
    const index = this.queue.findIndex((task) => task.record.id === id);
    if (index === -1) {
      return false;
    }

    const [task] = this.queue.splice(index, 1);
    this.markCancelled(task.record);
    this.logger?.debug({ taskId: id, name: task.record.name }, 'Task cancelled (queued)');
    return true;
  }

  /**
   * Wait until no task is queued or running.
   *
   * @throws CompletionError('Timeout') if work remains after timeoutMs
   */
  public async drain(timeoutMs = this.drainTimeoutMs): Promise<void> {
    if (this.isIdle()) {
      return;
    }

    const initialQueued = this.queue.length;
    this.logger?.info({ queued: initialQueued, working: this.working, timeoutMs }, 'Draining task queue');

    return new Promise<void>((resolve, reject) => {
      const onIdle = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.off('queue:idle', onIdle);
        this.logger?.error(
          { queued: this.queue.length, working: this.working, initialQueued, timeoutMs },
          'Task queue drain failed'
        );
        reject(
          new CompletionError(
            'Timeout',
            `Task queue drain timeout after ${timeoutMs}ms: ${this.queue.length} queued, ${this.working ? 1 : 0} running`,
            { queued: this.queue.length, running: this.working }
          )
        );
      }, timeoutMs);

      this.once('queue:idle', onIdle);
    });
  }

  /**
   * Stop accepting work, cancel queued tasks, abort the shared signal and
   * wait for the running task to settle. Idempotent.
   */
  public async shutdown(timeoutMs = this.drainTimeoutMs): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const pending = this.queue;
    this.queue = [];
    for (const task of pending) {
      this.markCancelled(task.record);
    }

    this.controller.abort(createCancelledError('Task queue shut down'));
    this.logger?.info({ cancelled: pending.length, working: this.working }, 'Task queue shutting down');

    await this.drain(timeoutMs);
  }

  public isIdle(): boolean {
    return this.queue.length === 0 && !this.working && !this.scheduled;
  }

  public getStats(): TaskQueueStats {
    return {
      queued: this.queue.length,
      running: this.working ? 1 : 0,
      completed: this.stats.completed,
      failed: this.stats.failed,
      cancelled: this.stats.cancelled,
      retained: this.terminalOrder.length,
    };
  }

  /**
   * Start the worker on a later tick unless it is already running or due.
   */
  private schedule(): void {
    if (this.working || this.scheduled) {
      return;
    }
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      void this.work();
    });
  }

  /**
   * Worker loop. Never rejects: task failures are recorded in execute().
   */
  private async work(): Promise<void> {
    this.working = true;
    try {
      while (!this.closed) {
        const next = this.queue.shift();
        if (!next) {
          break;
        }
        await this.execute(next);
      }
    } finally {
      this.working = false;
    }

    if (this.isIdle()) {
      try {
        this.emit('queue:idle');
      } catch (error) {
        this.logger?.error({ event: 'queue:idle', err: error }, 'Task event listener threw');
      }
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    const { record } = task;
    record.status = 'running';
    record.startedAt = this.now();
    this.logger?.debug({ taskId: record.id, name: record.name }, 'Task started');
    this.notify('task:started', record);

    try {
      const result = await task.run(this.controller.signal);
      record.status = 'completed';
      record.result = result;
      record.finishedAt = this.now();
      this.stats.completed++;
      this.logger?.info(
        { taskId: record.id, name: record.name, durationMs: record.finishedAt - record.startedAt },
        'Task completed'
      );
    } catch (error) {
      record.status = 'failed';
      record.error = {
        code: 'TaskFailure',
        message: error instanceof Error ? error.message : String(error),
        ...(error instanceof Error && { cause: error.name }),
      };
      record.finishedAt = this.now();
      this.stats.failed++;
      this.logger?.warn({ taskId: record.id, name: record.name, err: error }, 'Task failed');
    }

    this.retire(record.id);
    this.notify(record.status === 'completed' ? 'task:completed' : 'task:failed', record);
  }

  /**
   * Emit a task event once its record is final. Listener errors are logged
   * and never reach the worker.
   */
  private notify(event: Exclude<TaskQueueEventName, 'queue:idle'>, record: TaskRecord): void {
    try {
      this.emit(event, snapshot(record));
    } catch (error) {
      this.logger?.error({ event, taskId: record.id, name: record.name, err: error }, 'Task event listener threw');
    }
  }

  private markCancelled(record: TaskRecord): void {
    record.status = 'cancelled';
    record.finishedAt = this.now();
    this.stats.cancelled++;
    this.retire(record.id);
    this.notify('task:cancelled', record);
  }

  /**
   * Move a terminal record into bounded history.
   */
  private retire(id: string): void {
    this.terminalOrder.push(id);
    while (this.terminalOrder.length > this.maxHistory) {
      const dropped = this.terminalOrder.shift();
      if (dropped !== undefined) {
        this.records.delete(dropped);
      }
    }
  }
}

function snapshot(record: TaskRecord): TaskRecord {
  return {
    ...record,
    ...(record.error && { error: { ...record.error } }),
  };
}
