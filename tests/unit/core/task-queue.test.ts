import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { CompletionError } from '../../../src/api/errors.js';
import { BackgroundTaskQueue } from '../../../src/core/task-queue.js';
import type { TaskRecord } from '../../../src/types/index.js';
import { deferred } from '../../helpers/fake-remote.js';

const logger = pino({ level: 'silent' });

function nextStarted(queue: BackgroundTaskQueue): Promise<TaskRecord> {
  return new Promise((resolve) => queue.once('task:started', resolve));
}

describe('BackgroundTaskQueue', () => {
  describe('submission', () => {
    it('returns a handle before the task starts', async () => {
      const queue = new BackgroundTaskQueue({ logger });
      const fn = vi.fn(async () => 'done');

      const handle = queue.submit('job', fn);

      expect(handle.name).toBe('job');
      expect(fn).not.toHaveBeenCalled();
      expect(queue.getTask(handle.id)?.status).toBe('queued');

      await queue.drain();
      expect(fn).toHaveBeenCalledOnce();
      expect(queue.getTask(handle.id)).toMatchObject({ status: 'completed', result: 'done' });
    });

    it('passes the shutdown signal and the submitted arguments', async () => {
      const queue = new BackgroundTaskQueue();
      const fn = vi.fn(async (signal: AbortSignal, a: number, b: string) => `${signal.aborted}:${a}:${b}`);

      const handle = queue.submit('args', fn, 7, 'x');
      await queue.drain();

      expect(queue.getTask(handle.id)?.result).toBe('false:7:x');
    });

    it('rejects submissions after shutdown', async () => {
      const queue = new BackgroundTaskQueue();
      await queue.shutdown();

      expect(() => queue.submit('late', async () => undefined)).toThrow(CompletionError);
    });
  });

  describe('execution order', () => {
    it('runs one task at a time in FIFO order', async () => {
      const queue = new BackgroundTaskQueue();
      const events: string[] = [];
      let running = 0;
      let maxRunning = 0;

      const job = (label: string) => async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        events.push(`start:${label}`);
        await new Promise((resolve) => setImmediate(resolve));
        events.push(`end:${label}`);
        running--;
      };

      queue.submit('1', job('1'));
      queue.submit('2', job('2'));
      queue.submit('3', job('3'));
      await queue.drain();

      expect(maxRunning).toBe(1);
      expect(events).toEqual(['start:1', 'end:1', 'start:2', 'end:2', 'start:3', 'end:3']);
    });

    it('records a failure and continues with the next task', async () => {
      const queue = new BackgroundTaskQueue({ logger });

      const failing = queue.submit('fails', async () => {
        throw new Error('boom');
      });
      const next = queue.submit('next', async () => 42);
      await queue.drain();

      expect(queue.getTask(failing.id)).toMatchObject({
        status: 'failed',
        error: { code: 'TaskFailure', message: 'boom', cause: 'Error' },
      });
      expect(queue.getTask(next.id)).toMatchObject({ status: 'completed', result: 42 });
      expect(queue.getStats()).toEqual({
        queued: 0,
        running: 0,
        completed: 1,
        failed: 1,
        cancelled: 0,
        retained: 2,
      });
    });

    it('captures non-Error rejections', async () => {
      const queue = new BackgroundTaskQueue();

      const handle = queue.submit('odd', () => Promise.reject('plain string'));
      await queue.drain();

      expect(queue.getTask(handle.id)?.error).toEqual({ code: 'TaskFailure', message: 'plain string' });
    });

    it('emits lifecycle events with record snapshots', async () => {
      const queue = new BackgroundTaskQueue();
      const seen: string[] = [];
      queue.on('task:queued', (task) => seen.push(`queued:${task.status}`));
      queue.on('task:started', (task) => seen.push(`started:${task.status}`));
      queue.on('task:completed', (task) => seen.push(`completed:${task.status}`));
      queue.on('queue:idle', () => seen.push('idle'));

      queue.submit('job', async () => undefined);
      await queue.drain();

      expect(seen).toEqual(['queued:queued', 'started:running', 'completed:completed', 'idle']);
    });

    it('keeps a successful record when a completion listener throws', async () => {
      const queue = new BackgroundTaskQueue({ logger });
      queue.on('task:completed', () => {
        throw new Error('listener failure');
      });

      const handle = queue.submit('ok', async () => 42);
      await queue.drain();

      expect(queue.getTask(handle.id)).toMatchObject({ status: 'completed', result: 42 });
      expect(queue.getStats()).toMatchObject({ completed: 1, failed: 0 });
    });

    it('keeps working when a failure listener throws', async () => {
      const queue = new BackgroundTaskQueue({ logger });
      queue.on('task:failed', () => {
        throw new Error('listener failure');
      });

      const failing = queue.submit('fails', async () => {
        throw new Error('task failure');
      });
      const next = queue.submit('next', async () => 'done');
      await queue.drain();

      expect(queue.getTask(failing.id)).toMatchObject({
        status: 'failed',
        error: { code: 'TaskFailure', message: 'task failure' },
      });
      expect(queue.getTask(next.id)).toMatchObject({ status: 'completed', result: 'done' });
    });
  });

  describe('cancellation', () => {
    it('cancels a queued task so it never runs', async () => {
      const queue = new BackgroundTaskQueue();
      const first = vi.fn(async () => 'first');
      const second = vi.fn(async () => 'second');

      queue.submit('first', first);
      const handle = queue.submit('second', second);

      expect(queue.cancel(handle.id)).toBe(true);
      await queue.drain();

      expect(first).toHaveBeenCalledOnce();
      expect(second).not.toHaveBeenCalled();
      expect(queue.getTask(handle.id)?.status).toBe('cancelled');
    });

    it('does not cancel a running or finished task', async () => {
      const queue = new BackgroundTaskQueue();
      const gate = deferred<string>();
      const started = nextStarted(queue);

      const handle = queue.submit('running', () => gate.promise);
      await started;

      expect(queue.cancel(handle.id)).toBe(false);
      gate.resolve('done');
      await queue.drain();

      expect(queue.cancel(handle.id)).toBe(false);
      expect(queue.cancel('unknown-id')).toBe(false);
      expect(queue.getTask(handle.id)?.status).toBe('completed');
    });
  });

  describe('history', () => {
    it('keeps at most maxHistory terminal records', async () => {
      const queue = new BackgroundTaskQueue({ maxHistory: 2 });

      const first = queue.submit('1', async () => 1);
      queue.submit('2', async () => 2);
      queue.submit('3', async () => 3);
      await queue.drain();

      expect(queue.getTask(first.id)).toBeUndefined();
      expect(queue.listTasks().map((t) => t.name)).toEqual(['2', '3']);
    });

    it('returns copies that callers cannot mutate', async () => {
      const queue = new BackgroundTaskQueue();
      const handle = queue.submit('job', async () => 'ok');
      await queue.drain();

      const record = queue.getTask(handle.id);
      if (record) {
        record.status = 'failed';
      }

      expect(queue.getTask(handle.id)?.status).toBe('completed');
    });
  });

  describe('drain and shutdown', () => {
    it('resolves immediately when idle', async () => {
      const queue = new BackgroundTaskQueue();

      await expect(queue.drain(10)).resolves.toBeUndefined();
      expect(queue.isIdle()).toBe(true);
    });

    it('times out while a task is still running', async () => {
      const queue = new BackgroundTaskQueue({ logger });
      const gate = deferred<void>();
      queue.submit('slow', () => gate.promise);

      await expect(queue.drain(20)).rejects.toMatchObject({ code: 'Timeout' });

      gate.resolve();
      await expect(queue.drain()).resolves.toBeUndefined();
    });

    it('aborts the signal, cancels queued tasks and waits for the running one', async () => {
      const queue = new BackgroundTaskQueue({ logger });
      const started = nextStarted(queue);

      const running = queue.submit(
        'cooperative',
        (signal) =>
          new Promise<string>((resolve) => {
            signal.addEventListener('abort', () => resolve('stopped'), { once: true });
          })
      );
      const waiting = queue.submit('waiting', async () => 'never');
      await started;

      await queue.shutdown();

      expect(queue.getTask(running.id)).toMatchObject({ status: 'completed', result: 'stopped' });
      expect(queue.getTask(waiting.id)?.status).toBe('cancelled');
      expect(queue.isIdle()).toBe(true);
    });

    it('is idempotent', async () => {
      const queue = new BackgroundTaskQueue();

      await queue.shutdown();
      await expect(queue.shutdown()).resolves.toBeUndefined();
    });
  });

  it('validates its configuration', () => {
    expect(() => new BackgroundTaskQueue({ maxHistory: -1 })).toThrow(
      'BackgroundTaskQueue: maxHistory must be a non-negative integer, got -1'
    );
    expect(() => new BackgroundTaskQueue({ drainTimeoutMs: 0 })).toThrow(
      'BackgroundTaskQueue: drainTimeoutMs must be > 0'
    );
  });
});
