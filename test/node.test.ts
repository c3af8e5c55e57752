import { describe, it, expect, vi } from 'vitest'

import { LeafMutationError } from '../src/errors'
import { StaticTreeNode } from '../src/node'
import { createManualExecutor, createScheduler } from '../src/scheduler'

function setup() {
  const executor = createManualExecutor()
  const scheduler = createScheduler({ executor, diagnostics: { error: vi.fn(), warn: vi.fn() } })
  return { executor, scheduler }
}

describe('StaticTreeNode', () => {
  it('should be a leaf when created without a children array', () => {
    const { scheduler } = setup()
    const leaf = new StaticTreeNode('notes.txt', undefined, { scheduler })

    expect(leaf.isLeaf()).toBe(true)
    expect(leaf.children()).toEqual([])
  })

  it('should be a branch when created with an empty children array', () => {
    const { scheduler } = setup()
    const folder = new StaticTreeNode('empty', [], { scheduler })

    expect(folder.isLeaf()).toBe(false)
    expect(folder.children()).toEqual([])
  })

  it('should hand out a copy of its children', () => {
    const { scheduler } = setup()
    const child = new StaticTreeNode('child', undefined, { scheduler })
    const parent = new StaticTreeNode('parent', [child], { scheduler })

    const first = parent.children()
    const second = parent.children()

    expect(first).toEqual([child])
    expect(first).not.toBe(second)
  })

  it('should notify after replacing, appending and removing children', () => {
    const { executor, scheduler } = setup()
    const a = new StaticTreeNode('a', undefined, { scheduler })
    const b = new StaticTreeNode('b', undefined, { scheduler })
    const parent = new StaticTreeNode('parent', [a], { scheduler })
    const observer = vi.fn()
    parent.childrenChanged.addObserver(observer)

    parent.appendChild(b)
    expect(parent.children()).toEqual([a, b])
    executor.runPending()
    expect(observer).toHaveBeenCalledTimes(1)

    expect(parent.removeChild(a)).toBe(true)
    expect(parent.children()).toEqual([b])
    executor.runPending()
    expect(observer).toHaveBeenCalledTimes(2)

    parent.setChildren([a, b])
    expect(parent.children()).toEqual([a, b])
    executor.runPending()
    expect(observer).toHaveBeenCalledTimes(3)
  })

  it('should not notify when removing a node that is not a child', () => {
    const { executor, scheduler } = setup()
    const stranger = new StaticTreeNode('stranger', undefined, { scheduler })
    const parent = new StaticTreeNode('parent', [], { scheduler })
    parent.childrenChanged.addObserver(vi.fn())

    expect(parent.removeChild(stranger)).toBe(false)
    expect(executor.pendingTasks).toBe(0)
  })

  it('should reject child mutation on a leaf', () => {
    const { scheduler } = setup()
    const leaf = new StaticTreeNode('leaf', undefined, { scheduler })
    const other = new StaticTreeNode('other', undefined, { scheduler })

    expect(() => leaf.appendChild(other)).toThrow(LeafMutationError)
    expect(() => leaf.setChildren([other])).toThrow('Node "leaf" is a leaf and cannot hold children.')
    expect(leaf.isLeaf()).toBe(true)
  })
})
