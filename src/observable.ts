/**
 * Observables
 * ===========
 *
 * `Observable` fans a payload out to its observers; `ObservableValue` is a cell
 * that notifies when its value really changes. Neither delivers on the caller's
 * stack: `notify()` hands the observers to the scheduler, which runs them later
 * on its executor.
 *
 * @example
 * const title = new ObservableValue('Inbox', { scheduler })
 * title.subscribe(value => render(value))
 * title.set('Inbox (3)') // get() sees the new value now, render runs later
 */

import { EqualityFn, deepEqual } from './equality'
import { resolveScheduler } from './ergonomic'
import { NotificationScheduler } from './scheduler'

export type Observer<T> = (payload: T) => void

export interface ObservableOptions {
  /** Defaults to the active scheduler context. */
  scheduler?: NotificationScheduler
}

export class Observable<T = void> {
  private readonly observers = new Set<Observer<T>>()
  private readonly scheduler: NotificationScheduler

  constructor(options: ObservableOptions = {}) {
    this.scheduler = resolveScheduler(options.scheduler)
  }

  get observerCount(): number {
    return this.observers.size
  }

  hasObserver(observer: Observer<T>): boolean {
    return this.observers.has(observer)
  }

  addObserver(observer: Observer<T>): void {
    this.observers.add(observer)
  }

  /**
   * Unregister `observer`. A delivery this observable already queued for it is
   * withdrawn as well.
   */
  removeObserver(observer: Observer<T>): void {
    if (this.observers.delete(observer)) {
      this.scheduler.withdraw(this, observer)
    }
  }

  subscribe(observer: Observer<T>): () => void {
    this.addObserver(observer)
    return () => this.removeObserver(observer)
  }

  notify(payload: T): void {
    if (this.observers.size === 0) return
    this.scheduler.enqueueAll(this, this.observers, payload)
  }
}

export interface ObservableValueOptions<T> extends ObservableOptions {
  /** Decides whether `set` is a change. Defaults to structural `deepEqual`. */
  equals?: EqualityFn<T>
}

export class ObservableValue<T> {
  readonly changed: Observable<T>
  private value: T
  private readonly equals: EqualityFn<T>

  constructor(initialValue: T, options: ObservableValueOptions<T> = {}) {
    this.value = initialValue
    this.equals = options.equals ?? deepEqual
    this.changed = new Observable<T>(options)
  }

  get(): T {
    return this.value
  }

  set(value: T): void {
    if (this.equals(value, this.value)) return
    this.value = value
    this.changed.notify(value)
  }

  update(updater: (current: T) => T): void {
    this.set(updater(this.value))
  }

  addObserver(observer: Observer<T>): void {
    this.changed.addObserver(observer)
  }

  removeObserver(observer: Observer<T>): void {
    this.changed.removeObserver(observer)
  }

  subscribe(observer: Observer<T>): () => void {
    return this.changed.subscribe(observer)
  }
}
