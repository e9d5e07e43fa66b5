/**
 * @fileoverview Explorer session
 *
 * Owns the single {@link AppState} and applies messages to it strictly in
 * arrival order. A message dispatched while another is being applied (for
 * example from a render listener) waits in the queue.
 *
 * @module tui/session
 */

import { mapKey } from './key-bindings'
import type { KeyboardEvent } from './keys'
import type { Message } from './message'
import type { AppState } from './model'
import type { ServiceContainer } from './services/service-container'
import { update } from './update'
import { render, type Frame } from './view'

export type FrameListener = (frame: Frame) => void

export class ExplorerSession {
  private current: AppState
  private readonly queue: Message[] = []
  private draining = false
  private readonly listeners: FrameListener[] = []

  constructor(
    private readonly services: ServiceContainer,
    initial: AppState
  ) {
    this.current = initial
  }

  get state(): AppState {
    return this.current
  }

  get finished(): boolean {
    return this.current.shouldQuit
  }

  frame(): Frame {
    return render(this.current)
  }

  onFrame(listener: FrameListener): void {
    this.listeners.push(listener)
  }

  /**
   * Maps a key for the active view and dispatches the result.
   *
   * @returns whether the key was bound
   */
  handleKey(event: KeyboardEvent): boolean {
    const message = mapKey(this.current.view.kind, event)
    if (!message) return false
    this.dispatch(message)
    return true
  }

  dispatch(message: Message): void {
    this.queue.push(message)
    if (this.draining) return

    this.draining = true
    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        this.services.logger.debug('Dispatch', { message: next.type })
        this.current = update(this.current, next, this.services.context)
        const frame = render(this.current)
        for (const listener of this.listeners) listener(frame)
      }
    } finally {
      this.draining = false
    }
  }
}
