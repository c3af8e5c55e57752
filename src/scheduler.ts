/**
 * Notification Scheduler
 * ======================
 *
 * Owns the queue of pending observer deliveries and decides when they run.
 *
 * - `notify()` on an observable only enqueues; nothing is ever delivered on
 *   the caller's stack.
 * - Deliveries are coalesced per observer: however many observables enqueue
 *   the same callback before a drain, it runs once, with the latest payload.
 * - A drain is posted to the executor at most once per cycle and keeps going
 *   until the queue is empty, so deliveries enqueued while draining run in the
 *   same drain.
 * - A throwing observer is reported and skipped; the drain continues.
 */

import { consoleDiagnostics, DiagnosticSink } from './diagnostics'
import { ObserverError } from './errors'

// =============================================================================
// EXECUTORS
// =============================================================================

export type Task = () => void

/**
 * The host context drains run on. Every posted task must eventually run, once,
 * and never concurrently with another task of the same executor.
 */
export interface Executor {
  post(task: Task): void
}

export const microtaskExecutor: Executor = {
  post: (task) => queueMicrotask(task)
}

/**
 * Posts through `setTimeout(task, 0)`, like a UI run loop's deferred call.
 */
export const macrotaskExecutor: Executor = {
  post: (task) => {
    setTimeout(task, 0)
  }
}

export interface ManualExecutor extends Executor {
  /** Tasks posted and not yet run. */
  readonly pendingTasks: number
  /**
   * Run posted tasks, including tasks they post, until none are left.
   * Returns how many ran.
   */
  runPending(): number
}

/**
 * An executor that only runs tasks when asked to. Hosts that own their event
 * loop call `runPending()` from it; tests use it to step drains.
 */
export function createManualExecutor(): ManualExecutor {
  const tasks: Task[] = []

  return {
    post: (task) => {
      tasks.push(task)
    },

    get pendingTasks() {
      return tasks.length
    },

    runPending: () => {
      let ran = 0
      let task = tasks.shift()
      while (task) {
        task()
        ran++
        task = tasks.shift()
      }
      return ran
    }
  }
}

// =============================================================================
// SCHEDULER
// =============================================================================

export interface SchedulerOptions {
  /** Defaults to `microtaskExecutor`. */
  executor?: Executor
  /** Defaults to the console sink. */
  diagnostics?: DiagnosticSink
}

/** One queued call per source, oldest first; the newest one runs. */
interface PendingDelivery {
  bySource: Map<object, Task>
}

function latest(delivery: PendingDelivery): Task | undefined {
  let last: Task | undefined
  for (const invoke of delivery.bySource.values()) last = invoke
  return last
}

export class NotificationScheduler {
  private readonly pending = new Map<object, PendingDelivery>()
  private readonly executor: Executor
  private readonly diagnostics: DiagnosticSink
  private scheduled = false
  private draining = false

  constructor(options: SchedulerOptions = {}) {
    this.executor = options.executor ?? microtaskExecutor
    this.diagnostics = options.diagnostics ?? consoleDiagnostics
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** True while a drain has been posted and has not started yet. */
  get isScheduled(): boolean {
    return this.scheduled
  }

  get isDraining(): boolean {
    return this.draining
  }

  /**
   * Queue one delivery of `payload` to each observer on behalf of `source`.
   * An observer already pending keeps its place in the queue and gets the new
   * payload.
   */
  enqueueAll<T>(source: object, observers: Iterable<(payload: T) => void>, payload: T): void {
    let added = false
    for (const observer of observers) {
      const invoke = () => observer(payload)
      const existing = this.pending.get(observer)
      if (existing) {
        existing.bySource.delete(source)
        existing.bySource.set(source, invoke)
      } else {
        this.pending.set(observer, { bySource: new Map([[source, invoke]]) })
      }
      added = true
    }

    if (added) {
      this.requestDrain()
    }
  }

  /**
   * Withdraw the pending delivery `source` queued for `observer`. The delivery
   * stays queued while another source still wants it, with the payload that
   * source queued most recently.
   */
  withdraw(source: object, observer: object): void {
    const delivery = this.pending.get(observer)
    if (!delivery) return

    delivery.bySource.delete(source)
    if (delivery.bySource.size === 0) {
      this.pending.delete(observer)
    }
  }

  /**
   * Run pending deliveries one at a time until none are left. Called by the
   * executor; calling it while a drain is running does nothing.
   */
  drain(): void {
    if (this.draining) return

    this.draining = true
    try {
      let next = this.takeNext()
      while (next) {
        try {
          next()
        } catch (error) {
          this.diagnostics.error('Observer failed during drain; continuing with the remaining observers.', new ObserverError(error))
        }
        next = this.takeNext()
      }
    } finally {
      this.draining = false
    }
  }

  /**
   * Drain now, on the caller's stack. For hosts that own the loop and for
   * tests. A drain already posted still runs and delivers whatever was
   * enqueued after this call.
   */
  flush(): void {
    this.drain()
  }

  private takeNext(): Task | undefined {
    for (const [observer, delivery] of this.pending) {
      this.pending.delete(observer)
      return latest(delivery)
    }
    return undefined
  }

  private requestDrain(): void {
    if (this.scheduled || this.draining) return

    this.scheduled = true
    this.executor.post(() => {
      this.scheduled = false
      this.drain()
    })
  }
}

export function createScheduler(options: SchedulerOptions = {}): NotificationScheduler {
  return new NotificationScheduler(options)
}
