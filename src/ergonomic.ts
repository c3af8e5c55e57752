/**
 * Scheduler Context (with unctx)
 * ==============================
 *
 * Lets observables and bindings find the process-wide scheduler without it
 * being passed to every constructor.
 *
 * 1. `createSchedulerWithContext` creates the scheduler and registers it as the
 *    singleton of a namespaced `unctx` context.
 * 2. `useScheduler()` returns it from anywhere. Constructors fall back to it
 *    when no scheduler is passed explicitly.
 *
 * Passing a scheduler explicitly always wins over the context. Tests create
 * their own scheduler per case and either pass it or wrap setup code in
 * `withScheduler`.
 */

import { getContext } from 'unctx'
import { MissingSchedulerError } from './errors'
import { createScheduler, NotificationScheduler, SchedulerOptions } from './scheduler'

const schedulerContext = getContext<NotificationScheduler>('treebind-scheduler-context')

/**
 * Create a scheduler and make it the active one. Replaces any scheduler set
 * before.
 */
export function createSchedulerWithContext(options: SchedulerOptions = {}): NotificationScheduler {
  const scheduler = createScheduler(options)
  schedulerContext.set(scheduler, true)
  return scheduler
}

/**
 * The active scheduler. Throws `MissingSchedulerError` when there is none.
 */
export function useScheduler(): NotificationScheduler {
  const scheduler = tryUseScheduler()
  if (!scheduler) {
    throw new MissingSchedulerError()
  }
  return scheduler
}

export function tryUseScheduler(): NotificationScheduler | null {
  return schedulerContext.tryUse() ?? null
}

/**
 * Run `fn` with `scheduler` active, then restore whatever was active before.
 * Only synchronous code inside `fn` sees it.
 */
export function withScheduler<TResult>(scheduler: NotificationScheduler, fn: () => TResult): TResult {
  const previous = tryUseScheduler()
  schedulerContext.set(scheduler, true)
  try {
    return fn()
  } finally {
    if (previous) {
      schedulerContext.set(previous, true)
    } else {
      schedulerContext.unset()
    }
  }
}

export function resetSchedulerContext(): void {
  schedulerContext.unset()
}

/**
 * `explicit` when given, the active scheduler otherwise.
 */
export function resolveScheduler(explicit?: NotificationScheduler): NotificationScheduler {
  return explicit ?? useScheduler()
}
