/**
 * Low-level scheduler.
 *
 * Independent from signals so the reactive layer can depend on it without cycles.
 *
 * What it provides:
 * - A frame queue (`schedule`) for work grouped per frame (host re-render, batch flush)
 * - A microtask queue (`scheduleMicrotask`) for reactive follow-ups and transition bookkeeping
 * - A batching mechanism (`batch` + `queueInBatch`) that coalesces notifications into one frame
 *
 * Invariants:
 * - Tasks run in FIFO order within each queue.
 * - Queues are drained fully, up to a hard iteration cap.
 * - Flushes drain with `splice(0)` so references are released eagerly.
 */

import { reportError } from './dev.js';

type Task = () => void;

interface SchedulerConfig {
  /** Maximum microtask drain waves before the queue is discarded. Default: 1000. */
  maxMicrotaskIterations: number;
  /** Maximum frame drain waves before the queue is discarded. Default: 100. */
  maxFrameIterations: number;
}

const schedulerConfig: SchedulerConfig = {
  maxMicrotaskIterations: 1000,
  maxFrameIterations: 100,
};

/**
 * Configure scheduler limits.
 *
 * ```ts
 * configureScheduler({ maxMicrotaskIterations: 2000 });
 * ```
 */
export function configureScheduler(config: Partial<SchedulerConfig>): void {
  Object.assign(schedulerConfig, config);
}

export function getSchedulerConfig(): Readonly<SchedulerConfig> {
  return { ...schedulerConfig };
}

const frameImpl: (cb: () => void) => void =
  typeof globalThis.requestAnimationFrame === 'function'
    ? (cb) => globalThis.requestAnimationFrame(() => cb())
    : (cb) => setTimeout(cb, 0);

let frameScheduled = false;
let microtaskScheduled = false;
let isFlushingFrame = false;
let isFlushingMicrotasks = false;

const frameQueue: Task[] = [];
const microtaskQueue: Task[] = [];

let batchDepth = 0;
const batchQueue: Task[] = [];
const batchQueueSet = new Set<Task>();

/**
 * Schedule work for the next frame.
 * Falls back to a zero-delay timer where `requestAnimationFrame` is missing (Node).
 */
export function schedule(task: Task): void {
  frameQueue.push(task);
  if (!frameScheduled) {
    frameScheduled = true;
    frameImpl(flushFrame);
  }
}

/** Schedule work after the current call stack but before the next frame. */
export function scheduleMicrotask(task: Task): void {
  microtaskQueue.push(task);
  if (!microtaskScheduled) {
    microtaskScheduled = true;
    queueMicrotask(flushMicrotasks);
  }
}

/** Returns true while inside a `batch()` call. */
export function isBatching(): boolean {
  return batchDepth > 0;
}

/**
 * Enqueue work to run when the outermost batch exits.
 * The same task identity runs at most once per flush.
 */
export function queueInBatch(task: Task): void {
  if (batchQueueSet.has(task)) return;
  batchQueue.push(task);
  batchQueueSet.add(task);
}

/**
 * Batch several updates so their notifications are grouped.
 *
 * State updates inside the batch are immediate; notifications are deferred
 * until the outermost batch completes and then flushed in one frame.
 */
export function batch(fn: () => void): void {
  batchDepth++;
  try {
    fn();
  } finally {
    batchDepth--;
    if (batchDepth === 0) flushBatch();
  }
}

function flushBatch(): void {
  if (batchQueue.length === 0) return;

  const tasks = batchQueue.splice(0);
  batchQueueSet.clear();

  schedule(() => {
    for (const t of tasks) t();
  });
}

function drain(queue: Task[], maxIterations: number, label: string): void {
  let iterations = 0;
  while (queue.length > 0 && iterations < maxIterations) {
    iterations++;
    for (const task of queue.splice(0)) {
      try {
        task();
      } catch (error) {
        reportError(error, `scheduler.${label}`);
      }
    }
  }

  if (queue.length > 0) {
    console.error(
      `[Waypost] Scheduler exceeded ${maxIterations} ${label} iterations. ` +
        `Possible infinite loop detected. Remaining ${queue.length} tasks discarded.`
    );
    queue.length = 0;
  }
}

function flushMicrotasks(): void {
  if (isFlushingMicrotasks) return;
  isFlushingMicrotasks = true;

  try {
    drain(microtaskQueue, schedulerConfig.maxMicrotaskIterations, 'microtask');
  } finally {
    isFlushingMicrotasks = false;
    microtaskScheduled = false;

    if (microtaskQueue.length > 0) {
      microtaskScheduled = true;
      queueMicrotask(flushMicrotasks);
    }
  }
}

function flushFrame(): void {
  if (isFlushingFrame) return;
  isFlushingFrame = true;

  try {
    drain(frameQueue, schedulerConfig.maxFrameIterations, 'frame');
  } finally {
    isFlushingFrame = false;
    frameScheduled = false;

    if (frameQueue.length > 0) {
      frameScheduled = true;
      frameImpl(flushFrame);
    }
  }
}
