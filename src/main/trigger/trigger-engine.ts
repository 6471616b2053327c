export type TriggerKind = 'capture' | 'send'

export interface TriggerWindowConfig {
  requiredCount: number
  windowSeconds: number
}

interface TriggerWindow extends TriggerWindowConfig {
  timestamps: number[]
}

/**
 * Counts repeated key presses per trigger kind over a sliding time window.
 *
 * Every call runs purge, append and count check in that order against the
 * caller-supplied event time. Callers deliver events one at a time; nothing
 * here awaits, so a window is never observed half-updated.
 */
export class TriggerEngine {
  private readonly windows: Record<TriggerKind, TriggerWindow>

  constructor(config: Record<TriggerKind, TriggerWindowConfig>) {
    this.windows = {
      capture: TriggerEngine.createWindow(config.capture),
      send: TriggerEngine.createWindow(config.send)
    }
  }

  static withSharedWindow(requiredCount: number, windowSeconds: number): TriggerEngine {
    const window = { requiredCount, windowSeconds }
    return new TriggerEngine({ capture: window, send: window })
  }

  private static createWindow(config: TriggerWindowConfig): TriggerWindow {
    if (!Number.isInteger(config.requiredCount) || config.requiredCount < 1) {
      throw new RangeError(`requiredCount must be a positive integer, got ${config.requiredCount}`)
    }
    if (!(config.windowSeconds > 0)) {
      throw new RangeError(`windowSeconds must be positive, got ${config.windowSeconds}`)
    }
    return { ...config, timestamps: [] }
  }

  /** Records one key-down at `eventTime` (seconds) and reports whether the trigger fired. */
  onEvent(kind: TriggerKind, eventTime: number): boolean {
    if (!Number.isFinite(eventTime)) {
      return false
    }

    const window = this.windows[kind]
    window.timestamps = window.timestamps.filter((t) => eventTime - t <= window.windowSeconds)
    window.timestamps.push(eventTime)

    if (window.timestamps.length >= window.requiredCount) {
      window.timestamps = []
      return true
    }
    return false
  }

  pendingCount(kind: TriggerKind): number {
    return this.windows[kind].timestamps.length
  }

  reset(kind?: TriggerKind): void {
    if (kind) {
      this.windows[kind].timestamps = []
      return
    }
    this.windows.capture.timestamps = []
    this.windows.send.timestamps = []
  }
}
