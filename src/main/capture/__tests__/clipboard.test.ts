import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ClipboardManager, clipboardReadCommands } from '../clipboard'
import type { CommandRunner } from '../../utils'

function returning(stdout: string) {
  return vi.fn<CommandRunner>(async () => ({ stdout, stderr: '' }))
}

describe('ClipboardManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  it('returns the clipboard text unchanged', async () => {
    const run = returning('  line one\nline two\n')
    const clipboard = new ClipboardManager(run, 'darwin')

    await expect(clipboard.getClipboardContent()).resolves.toBe('  line one\nline two\n')
    expect(clipboard.getLastContent()).toBe('  line one\nline two\n')
    expect(run).toHaveBeenCalledWith('pbpaste', [], { timeoutMs: 5_000 })
  })

  it('drops the line break PowerShell appends', async () => {
    const clipboard = new ClipboardManager(returning('copied text\r\n'), 'win32')

    await expect(clipboard.getClipboardContent()).resolves.toBe('copied text')
  })

  it('treats whitespace as empty', async () => {
    const clipboard = new ClipboardManager(returning(' \n\t'), 'darwin')

    await expect(clipboard.getClipboardContent()).resolves.toBeNull()
    expect(clipboard.getLastContent()).toBe('')
  })

  it('falls back to the next Linux tool', async () => {
    const run = vi.fn<CommandRunner>(async (file) => {
      if (file === 'wl-paste') {
        throw new Error('spawn wl-paste ENOENT')
      }
      return { stdout: 'from xclip', stderr: '' }
    })

    await expect(new ClipboardManager(run, 'linux').getClipboardContent()).resolves.toBe('from xclip')
    expect(run.mock.calls.map(([file]) => file)).toEqual(['wl-paste', 'xclip'])
  })

  it('returns null when nothing can read the clipboard', async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error('not found')
    })

    await expect(new ClipboardManager(run, 'linux').getClipboardContent()).resolves.toBeNull()
    expect(run).toHaveBeenCalledTimes(clipboardReadCommands('linux').length)
  })
})
