/**
 * Error taxonomy for treebind.
 *
 * Every error raised or reported by the library extends `TreeBindError`, so
 * hosts can tell library failures apart from their own with one `instanceof`.
 */

/**
 * Base class for all library errors.
 */
export class TreeBindError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A node's `children()` threw, either when called or while being iterated.
 * Reported at the expand/rebuild boundary; the item is left collapsed.
 */
export class ChildrenQueryError extends TreeBindError {
  constructor(readonly label: string, cause: unknown) {
    super(`Querying children of "${label}" failed.`, { cause })
  }
}

/**
 * An observer threw while the scheduler was draining.
 */
export class ObserverError extends TreeBindError {
  constructor(cause: unknown) {
    super('Observer failed during drain.', { cause })
  }
}

/**
 * A node was reached twice while materializing. The binding maps one node to
 * one item, so the second occurrence is skipped.
 */
export class SharedNodeError extends TreeBindError {
  constructor(readonly label: string) {
    super(`Node "${label}" is already materialized elsewhere in the tree and was skipped.`)
  }
}

export class BindingReentrancyError extends TreeBindError {
  constructor(readonly operation: string, readonly activeOperation: string) {
    super(`"${operation}" was called while "${activeOperation}" is still running on the same binding.`)
  }
}

export class BindingDisposedError extends TreeBindError {
  constructor(readonly operation: string) {
    super(`"${operation}" was called on a disposed binding.`)
  }
}

export class MissingSchedulerError extends TreeBindError {
  constructor() {
    super('No scheduler was passed and no scheduler context is active. Call createSchedulerWithContext() first.')
  }
}

export class LeafMutationError extends TreeBindError {
  constructor(readonly label: string) {
    super(`Node "${label}" is a leaf and cannot hold children.`)
  }
}

export class UnknownItemError extends TreeBindError {
  constructor(readonly itemId: number) {
    super(`Item ${itemId} does not exist in this view.`)
  }
}
