/**
 * Tree View Collaborator
 * ======================
 *
 * The smallest surface a visual tree widget has to offer for a binding to
 * drive it. Item handles are opaque to the binding: it only creates them
 * through the view, stores them as map keys, and passes them back.
 *
 * `MemoryTreeView` is a headless implementation used by tests and by hosts
 * that render the tree themselves.
 */

import { UnknownItemError } from './errors'

export type ItemListener<TItem> = (item: TItem) => void

export interface TreeView<TItem> {
  createRootItem(text: string): TItem
  appendChildItem(parent: TItem, text: string): TItem
  /** Remove `item` and everything under it. */
  destroyItem(item: TItem): void
  /** Remove everything under `item`, keeping `item`. */
  destroyChildren(item: TItem): void
  setItemText(item: TItem, text: string): void
  /** Whether the widget shows an expander for `item` before it is expanded. */
  setHasChildrenIndicator(item: TItem, hasChildren: boolean): void
  isExpanded(item: TItem): boolean
  /** Show `item` expanded or collapsed without raising user events. */
  setExpanded(item: TItem, expanded: boolean): void
  /** Listen for the user expanding an item. Returns the unsubscribe function. */
  onUserExpand(listener: ItemListener<TItem>): () => void
  onUserCollapse(listener: ItemListener<TItem>): () => void
}

// =============================================================================
// IN-MEMORY VIEW
// =============================================================================

export interface MemoryTreeItem {
  readonly id: number
}

interface ItemRecord {
  item: MemoryTreeItem
  parent: MemoryTreeItem | null
  text: string
  hasChildren: boolean
  expanded: boolean
  children: MemoryTreeItem[]
}

/**
 * A view that keeps its items in memory. `userExpand` and `userCollapse` play
 * the part of the user clicking an expander.
 *
 * The expanded flag is view state of its own: only user actions and
 * `setExpanded` change it, never the number of children.
 */
export class MemoryTreeView implements TreeView<MemoryTreeItem> {
  private readonly records = new Map<MemoryTreeItem, ItemRecord>()
  private readonly expandListeners = new Set<ItemListener<MemoryTreeItem>>()
  private readonly collapseListeners = new Set<ItemListener<MemoryTreeItem>>()
  private rootItem: MemoryTreeItem | null = null
  private nextId = 1

  get root(): MemoryTreeItem | null {
    return this.rootItem
  }

  /** Number of live items, root included. */
  get size(): number {
    return this.records.size
  }

  createRootItem(text: string): MemoryTreeItem {
    if (this.rootItem) {
      this.destroyItem(this.rootItem)
    }
    const item = this.createItem(null, text)
    this.rootItem = item
    return item
  }

  appendChildItem(parent: MemoryTreeItem, text: string): MemoryTreeItem {
    const parentRecord = this.record(parent)
    const item = this.createItem(parent, text)
    parentRecord.children.push(item)
    return item
  }

  destroyItem(item: MemoryTreeItem): void {
    const record = this.records.get(item)
    if (!record) return

    this.destroyChildren(item)
    this.records.delete(item)
    if (record.parent) {
      const siblings = this.record(record.parent).children
      siblings.splice(siblings.indexOf(item), 1)
    }
    if (this.rootItem === item) {
      this.rootItem = null
    }
  }

  destroyChildren(item: MemoryTreeItem): void {
    const record = this.records.get(item)
    if (!record) return

    for (const child of [...record.children]) {
      this.destroyItem(child)
    }
  }

  setItemText(item: MemoryTreeItem, text: string): void {
    this.record(item).text = text
  }

  setHasChildrenIndicator(item: MemoryTreeItem, hasChildren: boolean): void {
    this.record(item).hasChildren = hasChildren
  }

  isExpanded(item: MemoryTreeItem): boolean {
    return this.records.get(item)?.expanded ?? false
  }

  onUserExpand(listener: ItemListener<MemoryTreeItem>): () => void {
    this.expandListeners.add(listener)
    return () => this.expandListeners.delete(listener)
  }

  onUserCollapse(listener: ItemListener<MemoryTreeItem>): () => void {
    this.collapseListeners.add(listener)
    return () => this.collapseListeners.delete(listener)
  }

  // --- simulated user actions ---

  /**
   * Mark `item` expanded and tell listeners, as a click on its expander would.
   * Items without a has-children indicator cannot be expanded.
   */
  userExpand(item: MemoryTreeItem): void {
    const record = this.record(item)
    if (record.expanded || !record.hasChildren) return
    record.expanded = true
    this.expandListeners.forEach(listener => listener(item))
  }

  userCollapse(item: MemoryTreeItem): void {
    const record = this.record(item)
    if (!record.expanded) return
    record.expanded = false
    this.collapseListeners.forEach(listener => listener(item))
  }

  setExpanded(item: MemoryTreeItem, expanded: boolean): void {
    this.record(item).expanded = expanded
  }

  // --- inspection ---

  isAlive(item: MemoryTreeItem): boolean {
    return this.records.has(item)
  }

  children(item: MemoryTreeItem): readonly MemoryTreeItem[] {
    return [...this.record(item).children]
  }

  textOf(item: MemoryTreeItem): string {
    return this.record(item).text
  }

  hasChildrenIndicator(item: MemoryTreeItem): boolean {
    return this.record(item).hasChildren
  }

  /**
   * One line per item, indented two spaces per level, prefixed with `-` when
   * expanded, `+` when it shows an expander, and a space otherwise.
   */
  toOutline(): string {
    if (!this.rootItem) return ''
    const lines: string[] = []
    const visit = (item: MemoryTreeItem, depth: number) => {
      const record = this.record(item)
      const marker = record.expanded ? '-' : record.hasChildren ? '+' : ' '
      lines.push(`${'  '.repeat(depth)}${marker} ${record.text}`)
      record.children.forEach(child => visit(child, depth + 1))
    }
    visit(this.rootItem, 0)
    return lines.join('\n')
  }

  private createItem(parent: MemoryTreeItem | null, text: string): MemoryTreeItem {
    const item: MemoryTreeItem = Object.freeze({ id: this.nextId++ })
    this.records.set(item, {
      item,
      parent,
      text,
      hasChildren: false,
      expanded: false,
      children: []
    })
    return item
  }

  private record(item: MemoryTreeItem): ItemRecord {
    const record = this.records.get(item)
    if (!record) {
      throw new UnknownItemError(item.id)
    }
    return record
  }
}
