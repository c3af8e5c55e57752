/**
 * Tree Nodes
 * ==========
 *
 * The domain-side boundary of a binding. Domain code implements
 * `TreeNodeContract` (or extends `TreeNode`); the binding reads labels, asks
 * for children only when an item is expanded, and listens for the two change
 * signals.
 */

import { LeafMutationError } from './errors'
import { Observable, ObservableOptions, ObservableValue } from './observable'

/**
 * A node in the domain model that can be shown in a tree.
 */
export interface TreeNodeContract {
  /** Text shown for the node. */
  readonly label: ObservableValue<string>
  /**
   * Fires when the sequence `children()` returns may have changed.
   */
  readonly childrenChanged: Observable
  /**
   * True when `children()` never yields anything. Must stay constant for the
   * lifetime of the node.
   */
  isLeaf(): boolean
  /**
   * Current children. Called each time an item is expanded or rebuilt; the
   * result is never cached, so it may be computed lazily or be expensive.
   */
  children(): Iterable<TreeNodeContract>
}

/**
 * Base class wiring the two observable fields of the contract.
 */
export abstract class TreeNode implements TreeNodeContract {
  readonly label: ObservableValue<string>
  readonly childrenChanged: Observable

  constructor(label: string, options: ObservableOptions = {}) {
    this.label = new ObservableValue(label, options)
    this.childrenChanged = new Observable(options)
  }

  abstract isLeaf(): boolean
  abstract children(): Iterable<TreeNodeContract>
}

/**
 * A node holding its children in an array.
 *
 * Created without a children array it is a leaf for good. Created with one,
 * even an empty one, it is a branch whose children can be replaced, appended
 * and removed; each mutation fires `childrenChanged`.
 */
export class StaticTreeNode extends TreeNode {
  private items: TreeNodeContract[] | undefined

  constructor(label: string, children?: readonly TreeNodeContract[], options: ObservableOptions = {}) {
    super(label, options)
    this.items = children ? [...children] : undefined
  }

  isLeaf(): boolean {
    return this.items === undefined
  }

  children(): readonly TreeNodeContract[] {
    return this.items ? [...this.items] : []
  }

  setChildren(children: readonly TreeNodeContract[]): void {
    this.branch()
    this.items = [...children]
    this.childrenChanged.notify()
  }

  appendChild(child: TreeNodeContract): void {
    this.branch().push(child)
    this.childrenChanged.notify()
  }

  /**
   * Remove the first occurrence of `child`. Returns false, without notifying,
   * when it is not a child.
   */
  removeChild(child: TreeNodeContract): boolean {
    const items = this.branch()
    const index = items.indexOf(child)
    if (index === -1) return false
    items.splice(index, 1)
    this.childrenChanged.notify()
    return true
  }

  private branch(): TreeNodeContract[] {
    if (!this.items) {
      throw new LeafMutationError(this.label.get())
    }
    return this.items
  }
}
