/**
 * Item Lifecycle (with robot3)
 * ============================
 *
 * Each visual item a binding materializes carries a small `robot3` state
 * machine:
 *
 *   collapsed --expand--> expanded --collapse--> collapsed
 *   collapsed | expanded --destroy--> destroyed
 *
 * Events with no transition from the current state are ignored, so repeated
 * expand or collapse requests are harmless and nothing leaves `destroyed`.
 */

import { createMachine, interpret, state, transition } from 'robot3'

export type ItemState = 'collapsed' | 'expanded' | 'destroyed'

export type ItemEvent = 'expand' | 'collapse' | 'destroy'

const itemMachine = createMachine('collapsed', {
  collapsed: state(
    transition('expand', 'expanded'),
    transition('destroy', 'destroyed')
  ),
  expanded: state(
    transition('collapse', 'collapsed'),
    transition('destroy', 'destroyed')
  ),
  destroyed: state()
})

function toItemState(current: unknown): ItemState {
  if (current === 'expanded' || current === 'destroyed') return current
  return 'collapsed'
}

// robot3 calls onChange after every send, moved or not; report moves only.
function startItemMachine(onChange: (state: ItemState) => void) {
  let last: ItemState = 'collapsed'
  return interpret(itemMachine, (service) => {
    const next = toItemState(service.machine.current)
    if (next === last) return
    last = next
    onChange(next)
  })
}

type ItemService = ReturnType<typeof startItemMachine>

export class ItemLifecycle {
  private readonly service: ItemService

  /**
   * @param onChange Called after every transition with the state entered.
   */
  constructor(onChange: (state: ItemState) => void) {
    this.service = startItemMachine(onChange)
  }

  get state(): ItemState {
    return toItemState(this.service.machine.current)
  }

  /**
   * Send `event`. Returns whether the machine moved.
   */
  send(event: ItemEvent): boolean {
    const before = this.state
    this.service.send(event)
    return this.state !== before
  }
}
