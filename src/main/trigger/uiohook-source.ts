import { uIOhook, UiohookKey, type UiohookKeyboardEvent } from 'uiohook-napi'
import type { KeyDownEvent, KeySource } from './keyboard-listener'

const KEY_NAMES = new Map<number, string>([
  [UiohookKey.Enter, 'enter'],
  [UiohookKey.NumpadEnter, 'enter'],
  [UiohookKey.Shift, 'shift'],
  [UiohookKey.ShiftRight, 'shift'],
  [UiohookKey.Ctrl, 'ctrl'],
  [UiohookKey.CtrlRight, 'ctrl'],
  [UiohookKey.Alt, 'alt'],
  [UiohookKey.AltRight, 'alt'],
  [UiohookKey.Space, 'space'],
  [UiohookKey.Tab, 'tab'],
  [UiohookKey.Escape, 'escape']
])

export const SUPPORTED_KEYS = [...new Set(KEY_NAMES.values())]

/** Global keyboard hook backed by libuiohook. */
export class UiohookKeySource implements KeySource {
  onKeyDown(listener: (event: KeyDownEvent) => void): void {
    uIOhook.on('keydown', (event: UiohookKeyboardEvent) => {
      const key = KEY_NAMES.get(event.keycode)
      if (key) {
        listener({ key, time: Date.now() })
      }
    })
  }

  start(): void {
    uIOhook.start()
  }

  stop(): void {
    uIOhook.stop()
  }
}
