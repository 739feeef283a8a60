/**
 * Event System
 *
 * Event types and payloads for the completion service and the task queue.
 */

import type { CompletionErrorShape } from './errors.js';
import type { CompletionSource, ServiceMode, TaskRecord } from '../types/index.js';

/**
 * Event payload when the service mode flips
 */
export interface ModeChangedEvent {
  mode: ServiceMode;
  previousMode: ServiceMode;
  reason: string;
  timestamp: number;
}

export interface CacheLookupEvent {
  fingerprint: string;
  mode: ServiceMode;
  timestamp: number;
}

export interface CompletionSucceededEvent {
  fingerprint: string;
  source: CompletionSource;
  durationMs: number;
  timestamp: number;
}

export interface CompletionFailedEvent {
  fingerprint: string;
  error: CompletionErrorShape;
  timestamp: number;
}

/**
 * Map of all completion service events
 */
export interface CompletionServiceEvents {
  'mode:changed': (event: ModeChangedEvent) => void;
  'cache:hit': (event: CacheLookupEvent) => void;
  'cache:miss': (event: CacheLookupEvent) => void;
  'completion:succeeded': (event: CompletionSucceededEvent) => void;
  'completion:failed': (event: CompletionFailedEvent) => void;
}

/**
 * Map of all background task queue events. Payloads are record snapshots.
 */
export interface TaskQueueEvents {
  'task:queued': (task: TaskRecord) => void;
  'task:started': (task: TaskRecord) => void;
  'task:completed': (task: TaskRecord) => void;
  'task:failed': (task: TaskRecord) => void;
  'task:cancelled': (task: TaskRecord) => void;
  'queue:idle': () => void;
}

export type CompletionServiceEventName = keyof CompletionServiceEvents;
export type TaskQueueEventName = keyof TaskQueueEvents;
