/**
 * Background task types
 */

export type TaskStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Deferred unit of work. Receives the queue's shutdown signal as its
 * first argument so long jobs can stop at safe points.
 */
export type TaskFn<A extends unknown[] = unknown[], R = unknown> = (
  signal: AbortSignal,
  ...args: A
) => Promise<R>;

export interface TaskHandle {
  id: string;
  name: string;
}

export interface TaskRecord {
  id: string;
  name: string;
  status: TaskStatus;
  submittedAt: number;
  startedAt?: number;
  finishedAt?: number;
  result?: unknown;
  error?: {
    code: 'TaskFailure';
    message: string;
    cause?: string;
  };
}

export interface TaskQueueStats {
  queued: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  retained: number;
}
