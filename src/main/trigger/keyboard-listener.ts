import type { TaskDispatcher } from './dispatcher'
import type { TriggerEngine, TriggerKind } from './trigger-engine'

export interface KeyDownEvent {
  /** Logical key name such as `enter` or `shift`. Left/right variants share one name. */
  key: string
  /** Milliseconds since the epoch. */
  time: number
}

export interface KeySource {
  onKeyDown(listener: (event: KeyDownEvent) => void): void
  start(): void
  stop(): void
}

export type TriggerHandlers = Record<TriggerKind, () => Promise<void>>

export interface KeyBindings {
  captureKey: string
  sendKey: string
}

/**
 * Feeds key-downs into the trigger engine and hands fires to the dispatcher.
 * The key callback itself only does bookkeeping and returns immediately.
 */
export class KeyboardListener {
  private readonly keyToKind = new Map<string, TriggerKind>()
  private handlers: TriggerHandlers | null = null
  private source: KeySource | null = null
  private running = false

  constructor(
    private readonly engine: TriggerEngine,
    private readonly dispatcher: TaskDispatcher,
    private readonly bindings: KeyBindings
  ) {
    if (bindings.captureKey === bindings.sendKey) {
      throw new RangeError(`capture and send triggers cannot share the key ${bindings.captureKey}`)
    }
    this.keyToKind.set(bindings.captureKey, 'capture')
    this.keyToKind.set(bindings.sendKey, 'send')
  }

  setHandlers(handlers: TriggerHandlers): void {
    this.handlers = handlers
  }

  handleKeyDown(event: KeyDownEvent): void {
    const kind = this.keyToKind.get(event.key)
    if (!kind) {
      return
    }

    const fired = this.engine.onEvent(kind, event.time / 1000)
    if (!fired) {
      return
    }

    console.log(`[KeyboardListener] ${kind} trigger fired`)
    const handler = this.handlers?.[kind]
    if (!handler) {
      console.warn(`[KeyboardListener] No handler registered for ${kind}`)
      return
    }
    this.dispatcher.dispatch(`${kind}-trigger`, handler)
  }

  start(source: KeySource): void {
    if (this.running) {
      return
    }

    if (this.source !== source) {
      source.onKeyDown((event) => this.handleKeyDown(event))
      this.source = source
    }
    source.start()
    this.running = true

    console.log('[KeyboardListener] Listening for key events')
    console.log(`[KeyboardListener] Capture trigger: ${this.bindings.captureKey}, send trigger: ${this.bindings.sendKey}`)
  }

  stop(): void {
    if (!this.running || !this.source) {
      return
    }
    this.source.stop()
    this.running = false
    console.log('[KeyboardListener] Stopped')
  }

  isRunning(): boolean {
    return this.running
  }
}
