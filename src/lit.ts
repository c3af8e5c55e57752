/**
 * Lit-HTML Tree View
 * ==================
 *
 * A `TreeView` that renders its items into a DOM container with lit-html.
 *
 * Features:
 * - Nested `ul[role=tree]` / `li[role=treeitem]` markup with `aria-expanded`
 * - Expander buttons that raise `onUserExpand` / `onUserCollapse`
 * - Re-renders batched into one render per tick, however many items changed
 * - Item bookkeeping shared with `MemoryTreeView`, so the same inspection
 *   helpers work in tests
 */

import { html, render, TemplateResult } from 'lit-html'
import { ifDefined } from 'lit-html/directives/if-defined.js'
import { repeat } from 'lit-html/directives/repeat.js'

import { consoleDiagnostics, DiagnosticSink } from './diagnostics'
import { MemoryTreeItem, MemoryTreeView } from './view'

export interface LitTreeViewOptions {
  /** Accessible name for the tree. */
  label?: string
  /**
   * How to defer a render. Defaults to `queueMicrotask`; pass something that
   * runs the task at once to render synchronously.
   */
  scheduleRender?: (task: () => void) => void
  diagnostics?: DiagnosticSink
}

export class LitTreeView extends MemoryTreeView {
  private readonly scheduleRender: (task: () => void) => void
  private readonly diagnostics: DiagnosticSink
  private readonly label: string
  private renderPending = false
  private destroyed = false

  constructor(readonly container: HTMLElement, options: LitTreeViewOptions = {}) {
    super()
    this.label = options.label ?? 'Tree'
    this.scheduleRender = options.scheduleRender ?? (task => queueMicrotask(task))
    this.diagnostics = options.diagnostics ?? consoleDiagnostics
  }

  createRootItem(text: string): MemoryTreeItem {
    const item = super.createRootItem(text)
    this.requestRender()
    return item
  }

  appendChildItem(parent: MemoryTreeItem, text: string): MemoryTreeItem {
    const item = super.appendChildItem(parent, text)
    this.requestRender()
    return item
  }

  destroyItem(item: MemoryTreeItem): void {
    super.destroyItem(item)
    this.requestRender()
  }

  destroyChildren(item: MemoryTreeItem): void {
    super.destroyChildren(item)
    this.requestRender()
  }

  setItemText(item: MemoryTreeItem, text: string): void {
    super.setItemText(item, text)
    this.requestRender()
  }

  setHasChildrenIndicator(item: MemoryTreeItem, hasChildren: boolean): void {
    super.setHasChildrenIndicator(item, hasChildren)
    this.requestRender()
  }

  userExpand(item: MemoryTreeItem): void {
    super.userExpand(item)
    this.requestRender()
  }

  userCollapse(item: MemoryTreeItem): void {
    super.userCollapse(item)
    this.requestRender()
  }

  setExpanded(item: MemoryTreeItem, expanded: boolean): void {
    super.setExpanded(item, expanded)
    this.requestRender()
  }

  /** Render now, dropping any render still pending. */
  flushRender(): void {
    this.renderPending = false
    if (this.destroyed) return

    try {
      render(this.treeTemplate(), this.container)
    } catch (error) {
      this.diagnostics.error('Rendering the tree failed.', error)
      render(html`<div role="alert">Render Error: ${String(error)}</div>`, this.container)
    }
  }

  /** Clear the container and stop rendering. */
  destroy(): void {
    if (this.destroyed) return
    this.destroyed = true
    render(html``, this.container)
  }

  private requestRender(): void {
    if (this.renderPending || this.destroyed) return
    this.renderPending = true
    this.scheduleRender(() => {
      if (this.renderPending) this.flushRender()
    })
  }

  private toggle(item: MemoryTreeItem): void {
    if (this.isExpanded(item)) {
      this.userCollapse(item)
    } else {
      this.userExpand(item)
    }
  }

  private treeTemplate(): TemplateResult {
    const root = this.root
    return html`
      <ul role="tree" aria-label=${this.label}>
        ${root ? this.itemTemplate(root) : html``}
      </ul>
    `
  }

  private itemTemplate(item: MemoryTreeItem): TemplateResult {
    const hasChildren = this.hasChildrenIndicator(item)
    const expanded = this.isExpanded(item)
    const children = this.children(item)

    return html`
      <li role="treeitem" data-item-id=${item.id} aria-expanded=${ifDefined(hasChildren ? String(expanded) : undefined)}>
        ${hasChildren
          ? html`<button class="tree-toggle" type="button" @click=${() => this.toggle(item)}>${expanded ? '-' : '+'}</button>`
          : html`<span class="tree-spacer"></span>`}
        <span class="tree-label">${this.textOf(item)}</span>
        ${expanded && children.length > 0
          ? html`<ul role="group">${repeat(children, child => child.id, child => this.itemTemplate(child))}</ul>`
          : html``}
      </li>
    `
  }
}
