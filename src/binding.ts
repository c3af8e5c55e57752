/**
 * Tree Binding
 * ============
 *
 * Keeps a visual tree in step with a domain tree without materializing more
 * of it than the user has expanded.
 *
 * - The root is materialized when the binding is created. Children are asked
 *   for only when their parent is expanded, and asked again on every expand.
 * - Every materialized node has exactly one item and a pair of observers on
 *   its label and children signals. Mapping entries and observers are created
 *   and released together.
 * - A label change rewrites one item's text. A children change on an expanded
 *   item collapses and re-expands it; deeper expansion state under it is lost.
 * - Notifications arrive later than the changes that caused them, so every
 *   handler treats an unmapped node or item as nothing to do.
 */

import { consoleDiagnostics, DiagnosticSink } from './diagnostics'
import {
  BindingDisposedError,
  BindingReentrancyError,
  ChildrenQueryError,
  SharedNodeError
} from './errors'
import { TreeNodeContract } from './node'
import { Observer } from './observable'
import { ItemLifecycle, ItemState } from './robot'
import { TreeView } from './view'

export interface TreeBindingOptions<TItem> {
  /** Defaults to the console sink. */
  diagnostics?: DiagnosticSink
  /** Expand the root right after attaching it. */
  expandRoot?: boolean
  /** Called whenever an item moves between lifecycle states. */
  onItemStateChange?: (item: TItem, state: ItemState) => void
}

interface Materialized<TItem> {
  readonly node: TreeNodeContract
  readonly item: TItem
  readonly lifecycle: ItemLifecycle
  readonly onLabel: Observer<string>
  readonly onChildren: Observer<void>
  children: Materialized<TItem>[]
}

// =============================================================================
// NODE <-> ITEM INDEX
// =============================================================================

/**
 * The two directions of the node/item mapping. `bind` and `unbind` are the
 * only writers and always touch both maps.
 */
class BindingIndex<TItem> {
  private readonly nodeToItem = new Map<TreeNodeContract, TItem>()
  private readonly itemToNode = new Map<TItem, Materialized<TItem>>()

  get size(): number {
    return this.itemToNode.size
  }

  bind(entry: Materialized<TItem>): void {
    this.nodeToItem.set(entry.node, entry.item)
    this.itemToNode.set(entry.item, entry)
  }

  unbind(entry: Materialized<TItem>): void {
    this.nodeToItem.delete(entry.node)
    this.itemToNode.delete(entry.item)
  }

  hasNode(node: TreeNodeContract): boolean {
    return this.nodeToItem.has(node)
  }

  itemFor(node: TreeNodeContract): TItem | undefined {
    return this.nodeToItem.get(node)
  }

  entryFor(item: TItem): Materialized<TItem> | undefined {
    return this.itemToNode.get(item)
  }

  entryForNode(node: TreeNodeContract): Materialized<TItem> | undefined {
    const item = this.nodeToItem.get(node)
    return item === undefined ? undefined : this.itemToNode.get(item)
  }
}

// =============================================================================
// BINDING
// =============================================================================

export class TreeBinding<TItem> {
  readonly rootItem: TItem
  private readonly index = new BindingIndex<TItem>()
  private readonly rootEntry: Materialized<TItem>
  private readonly diagnostics: DiagnosticSink
  private readonly onItemStateChange: ((item: TItem, state: ItemState) => void) | undefined
  private readonly viewSubscriptions: Array<() => void>
  private activeOperation: string | null = null
  private disposed = false

  constructor(
    readonly root: TreeNodeContract,
    private readonly view: TreeView<TItem>,
    options: TreeBindingOptions<TItem> = {}
  ) {
    this.diagnostics = options.diagnostics ?? consoleDiagnostics
    this.onItemStateChange = options.onItemStateChange

    this.rootEntry = this.guard('attach', () => this.materialize(root, null))
    this.rootItem = this.rootEntry.item

    this.viewSubscriptions = [
      view.onUserExpand(item => this.expand(item)),
      view.onUserCollapse(item => this.collapse(item))
    ]

    if (options.expandRoot || view.isExpanded(this.rootItem)) {
      this.expand(this.rootItem)
    }
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  /** Number of nodes that currently have an item, root included. */
  get materializedCount(): number {
    return this.index.size
  }

  itemFor(node: TreeNodeContract): TItem | undefined {
    return this.index.itemFor(node)
  }

  nodeFor(item: TItem): TreeNodeContract | undefined {
    return this.index.entryFor(item)?.node
  }

  isMaterialized(node: TreeNodeContract): boolean {
    return this.index.hasNode(node)
  }

  /** Lifecycle state of a mapped item; undefined once it is gone. */
  stateOf(item: TItem): ItemState | undefined {
    return this.index.entryFor(item)?.lifecycle.state
  }

  /**
   * Materialize the children of `item`. Does nothing for unknown items, leaf
   * nodes and items that are already expanded.
   */
  expand(item: TItem): void {
    this.assertUsable('expand')
    this.guard('expand', () => {
      const entry = this.index.entryFor(item)
      if (entry) this.expandEntry(entry)
    })
  }

  /**
   * Release every descendant of `item`: observers, mapping entries and items.
   */
  collapse(item: TItem): void {
    this.assertUsable('collapse')
    this.guard('collapse', () => {
      const entry = this.index.entryFor(item)
      if (entry) this.collapseEntry(entry)
    })
  }

  onLabelChanged(node: TreeNodeContract): void {
    this.guard('onLabelChanged', () => {
      const item = this.index.itemFor(node)
      if (item === undefined) return
      this.view.setItemText(item, node.label.get())
    })
  }

  /**
   * Rebuild the children of `node` if its item is expanded. A collapsed item
   * is left alone; its children are queried on the next expand.
   */
  onChildrenChanged(node: TreeNodeContract): void {
    this.guard('onChildrenChanged', () => {
      const entry = this.index.entryForNode(node)
      if (!entry || entry.lifecycle.state !== 'expanded') return
      this.collapseEntry(entry)
      this.expandEntry(entry)
    })
  }

  /**
   * Release every observer and item, root included, and stop listening to the
   * view. Safe to call twice.
   */
  dispose(): void {
    if (this.disposed) return
    this.guard('dispose', () => {
      this.viewSubscriptions.forEach(unsubscribe => unsubscribe())
      this.release(this.rootEntry)
      this.view.destroyItem(this.rootItem)
      this.disposed = true
    })
  }

  // --- internals ---

  private materialize(node: TreeNodeContract, parent: TItem | null): Materialized<TItem> {
    const text = node.label.get()
    const hasChildren = !node.isLeaf()
    const item = parent === null
      ? this.view.createRootItem(text)
      : this.view.appendChildItem(parent, text)
    this.view.setHasChildrenIndicator(item, hasChildren)

    const entry: Materialized<TItem> = {
      node,
      item,
      lifecycle: new ItemLifecycle(state => this.reportState(item, state)),
      onLabel: () => this.onLabelChanged(node),
      onChildren: () => this.onChildrenChanged(node),
      children: []
    }

    this.index.bind(entry)
    node.label.addObserver(entry.onLabel)
    node.childrenChanged.addObserver(entry.onChildren)
    return entry
  }

  private expandEntry(entry: Materialized<TItem>): void {
    if (entry.lifecycle.state !== 'collapsed') return
    if (entry.node.isLeaf()) return

    const created: Materialized<TItem>[] = []
    try {
      for (const child of entry.node.children()) {
        if (this.index.hasNode(child)) {
          this.diagnostics.warn('Skipped a node that is already in the tree.', new SharedNodeError(child.label.get()))
          continue
        }
        created.push(this.materialize(child, entry.item))
      }
    } catch (error) {
      created.forEach(child => this.release(child))
      this.view.destroyChildren(entry.item)
      this.view.setExpanded(entry.item, false)
      this.diagnostics.error('Expanding failed; the item stays collapsed.', new ChildrenQueryError(entry.node.label.get(), error))
      return
    }

    entry.children = created
    this.view.setExpanded(entry.item, true)
    entry.lifecycle.send('expand')
  }

  private collapseEntry(entry: Materialized<TItem>): void {
    if (entry.lifecycle.state !== 'expanded') return

    entry.children.forEach(child => this.release(child))
    entry.children = []
    this.view.destroyChildren(entry.item)
    this.view.setExpanded(entry.item, false)
    entry.lifecycle.send('collapse')
  }

  /**
   * Unobserve and unmap `entry` and everything below it. The caller removes
   * the items from the view.
   */
  private release(entry: Materialized<TItem>): void {
    entry.children.forEach(child => this.release(child))
    entry.children = []
    entry.node.label.removeObserver(entry.onLabel)
    entry.node.childrenChanged.removeObserver(entry.onChildren)
    this.index.unbind(entry)
    entry.lifecycle.send('destroy')
  }

  /**
   * Hand a lifecycle move to the host hook. A throwing hook is reported and
   * does not interrupt the operation that caused the move.
   */
  private reportState(item: TItem, state: ItemState): void {
    if (!this.onItemStateChange) return
    try {
      this.onItemStateChange(item, state)
    } catch (error) {
      this.diagnostics.error(`Item state hook failed on "${state}"; the binding carries on.`, error)
    }
  }

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new BindingDisposedError(operation)
    }
  }

  /**
   * Run `work` as the only binding operation in progress. Handlers are only
   * ever invoked by the scheduler or the view, never from inside another
   * operation, so re-entry means a collaborator called back synchronously.
   */
  private guard<TResult>(operation: string, work: () => TResult): TResult {
    if (this.activeOperation !== null) {
      throw new BindingReentrancyError(operation, this.activeOperation)
    }
    this.activeOperation = operation
    try {
      return work()
    } finally {
      this.activeOperation = null
    }
  }
}

/**
 * Attach `root` to `view` and return the binding.
 */
export function bindTree<TItem>(
  root: TreeNodeContract,
  view: TreeView<TItem>,
  options: TreeBindingOptions<TItem> = {}
): TreeBinding<TItem> {
  return new TreeBinding(root, view, options)
}
