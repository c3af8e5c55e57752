/**
 * treebind: Reactive Tree Binding
 * ===============================
 *
 * Binds a mutable, lazily expanded domain tree to a visual tree and keeps the
 * two in sync as the model changes.
 *
 * - Observables with deferred, coalesced delivery on one executor
 * - Value cells that notify only on real change
 * - A binding that queries children only on expand and rebuilds on change
 * - A headless in-memory view and a lit-html view
 *
 * @example
 * const scheduler = createSchedulerWithContext()
 * const docs = new StaticTreeNode('Docs', [new StaticTreeNode('README')])
 * const view = new LitTreeView(container)
 * const binding = bindTree(docs, view, { expandRoot: true })
 *
 * docs.label.set('Documents') // the root item's text follows on the next drain
 *
 * @license MIT
 */

export { TreeBinding, bindTree } from './binding'
export type { TreeBindingOptions } from './binding'

export { consoleDiagnostics, createDiagnostics } from './diagnostics'
export type { DiagnosticSink } from './diagnostics'

export { deepEqual } from './equality'
export type { EqualityFn } from './equality'

export {
  createSchedulerWithContext,
  resetSchedulerContext,
  tryUseScheduler,
  useScheduler,
  withScheduler
} from './ergonomic'

export {
  BindingDisposedError,
  BindingReentrancyError,
  ChildrenQueryError,
  LeafMutationError,
  MissingSchedulerError,
  ObserverError,
  SharedNodeError,
  TreeBindError,
  UnknownItemError
} from './errors'

export { LitTreeView } from './lit'
export type { LitTreeViewOptions } from './lit'

export { StaticTreeNode, TreeNode } from './node'
export type { TreeNodeContract } from './node'

export { Observable, ObservableValue } from './observable'
export type { ObservableOptions, ObservableValueOptions, Observer } from './observable'

export { ItemLifecycle } from './robot'
export type { ItemEvent, ItemState } from './robot'

export {
  NotificationScheduler,
  createManualExecutor,
  createScheduler,
  macrotaskExecutor,
  microtaskExecutor
} from './scheduler'
export type { Executor, ManualExecutor, SchedulerOptions, Task } from './scheduler'

export { MemoryTreeView } from './view'
export type { ItemListener, MemoryTreeItem, TreeView } from './view'
