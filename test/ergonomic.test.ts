import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

import {
  createSchedulerWithContext,
  resetSchedulerContext,
  tryUseScheduler,
  useScheduler,
  withScheduler
} from '../src/ergonomic'
import { MissingSchedulerError } from '../src/errors'
import { StaticTreeNode } from '../src/node'
import { Observable, ObservableValue } from '../src/observable'
import { createManualExecutor, createScheduler } from '../src/scheduler'

const quiet = { error: vi.fn(), warn: vi.fn() }

beforeEach(() => {
  resetSchedulerContext()
})

afterEach(() => {
  resetSchedulerContext()
})

describe('Scheduler context', () => {
  it('should report a missing scheduler', () => {
    expect(tryUseScheduler()).toBeNull()
    expect(() => useScheduler()).toThrow(MissingSchedulerError)
  })

  it('should refuse to build observables without any scheduler', () => {
    expect(() => new ObservableValue(0)).toThrow(MissingSchedulerError)
    expect(() => new StaticTreeNode('orphan')).toThrow(MissingSchedulerError)
  })

  it('should hand the active scheduler to new observables', () => {
    const executor = createManualExecutor()
    const scheduler = createSchedulerWithContext({ executor, diagnostics: quiet })
    const observable = new Observable<number>()
    const observer = vi.fn()
    observable.addObserver(observer)

    observable.notify(5)

    expect(useScheduler()).toBe(scheduler)
    expect(scheduler.pendingCount).toBe(1)
    executor.runPending()
    expect(observer).toHaveBeenCalledWith(5)
  })

  it('should prefer an explicitly passed scheduler', () => {
    const contextExecutor = createManualExecutor()
    createSchedulerWithContext({ executor: contextExecutor, diagnostics: quiet })
    const explicitExecutor = createManualExecutor()
    const explicit = createScheduler({ executor: explicitExecutor, diagnostics: quiet })

    const node = new StaticTreeNode('explicit', undefined, { scheduler: explicit })
    node.label.addObserver(vi.fn())
    node.label.set('changed')

    expect(contextExecutor.pendingTasks).toBe(0)
    expect(explicitExecutor.pendingTasks).toBe(1)
  })

  it('should scope a scheduler to a callback and restore the previous one', () => {
    const outer = createSchedulerWithContext({ executor: createManualExecutor(), diagnostics: quiet })
    const inner = createScheduler({ executor: createManualExecutor(), diagnostics: quiet })

    const seen = withScheduler(inner, () => useScheduler())

    expect(seen).toBe(inner)
    expect(useScheduler()).toBe(outer)
  })

  it('should clear the context after a scoped call when nothing was active before', () => {
    const scoped = createScheduler({ executor: createManualExecutor(), diagnostics: quiet })

    const value = withScheduler(scoped, () => new ObservableValue('built in scope'))

    expect(value.get()).toBe('built in scope')
    expect(tryUseScheduler()).toBeNull()
  })

  it('should restore the previous scheduler when the callback throws', () => {
    const outer = createSchedulerWithContext({ executor: createManualExecutor(), diagnostics: quiet })
    const inner = createScheduler({ executor: createManualExecutor(), diagnostics: quiet })

    expect(() => withScheduler(inner, () => {
      throw new Error('setup failed')
    })).toThrow('setup failed')
    expect(useScheduler()).toBe(outer)
  })
})
