import os from 'os'
import path from 'path'
import fs from 'fs/promises'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ScreenshotManager, captureCommands } from '../screenshot'
import type { CommandRunner } from '../../utils'

const CAPTURED_AT = new Date(2024, 4, 17, 9, 5, 3)

// Writes a small file to the path the capture tool was given
const writingRunner: CommandRunner = async (_file, args) => {
  const target = args[args.length - 1]
  if (target) {
    await fs.writeFile(target, 'image-bytes')
  }
  return { stdout: '', stderr: '' }
}

describe('captureCommands', () => {
  it('uses screencapture on macOS', () => {
    expect(captureCommands('darwin', '/tmp/a.png', 'png')).toEqual([
      { file: 'screencapture', args: ['-x', '-t', 'png', '/tmp/a.png'] }
    ])
  })

  it('falls back through several tools on Linux', () => {
    expect(captureCommands('linux', '/tmp/a.jpg', 'jpg').map((command) => command.file)).toEqual([
      'gnome-screenshot',
      'grim',
      'import'
    ])
  })

  it('quotes the target path for PowerShell', () => {
    const [command] = captureCommands('win32', "C:\\shots\\it's.png", 'png')
    expect(command?.file).toBe('powershell.exe')
    expect(command?.args[3]).toContain("$bmp.Save('C:\\shots\\it''s.png', [System.Drawing.Imaging.ImageFormat]::Png)")
  })
})

describe('ScreenshotManager', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'screenshots-'))
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  function manager(run: CommandRunner, keepCount = 10): ScreenshotManager {
    return new ScreenshotManager({ savePath: dir, imageFormat: 'png', keepCount }, run, 'linux')
  }

  it('names files after the capture time', () => {
    expect(manager(writingRunner).generateFilename(CAPTURED_AT)).toBe('screenshot_20240517_090503.png')
  })

  it('saves a screenshot and returns its path', async () => {
    const run = vi.fn(writingRunner)

    const saved = await manager(run).takeScreenshot(CAPTURED_AT)

    expect(saved).toBe(path.join(dir, 'screenshot_20240517_090503.png'))
    expect(run).toHaveBeenCalledTimes(1)
    expect(run).toHaveBeenCalledWith('gnome-screenshot', ['-f', path.join(dir, 'screenshot_20240517_090503.png')])
  })

  it('does not overwrite a capture from the same second', async () => {
    const screenshots = manager(writingRunner)

    const first = await screenshots.takeScreenshot(CAPTURED_AT)
    const second = await screenshots.takeScreenshot(CAPTURED_AT)

    expect(first).toBe(path.join(dir, 'screenshot_20240517_090503.png'))
    expect(second).toBe(path.join(dir, 'screenshot_20240517_090503_1.png'))
  })

  it('gives concurrent captures in the same second distinct files', async () => {
    const slowRunner: CommandRunner = async (file, args, options) => {
      await new Promise((resolve) => setTimeout(resolve, 20))
      return writingRunner(file, args, options)
    }
    const screenshots = manager(slowRunner)

    const [first, second] = await Promise.all([
      screenshots.takeScreenshot(CAPTURED_AT),
      screenshots.takeScreenshot(CAPTURED_AT)
    ])

    expect([first, second].sort()).toEqual([
      path.join(dir, 'screenshot_20240517_090503.png'),
      path.join(dir, 'screenshot_20240517_090503_1.png')
    ])
    expect((await fs.readdir(dir)).sort()).toEqual(['screenshot_20240517_090503.png', 'screenshot_20240517_090503_1.png'])
  })

  it('releases the name of a failed capture', async () => {
    let toolsWork = false
    const screenshots = manager(async (file, args, options) =>
      toolsWork ? writingRunner(file, args, options) : { stdout: '', stderr: '' }
    )

    await expect(screenshots.takeScreenshot(CAPTURED_AT)).resolves.toBeNull()
    toolsWork = true

    await expect(screenshots.takeScreenshot(CAPTURED_AT)).resolves.toBe(
      path.join(dir, 'screenshot_20240517_090503.png')
    )
  })

  it('tries the next tool when one fails', async () => {
    const run = vi.fn<CommandRunner>(async (file, args, options) => {
      if (file === 'gnome-screenshot') {
        throw new Error('spawn gnome-screenshot ENOENT')
      }
      return writingRunner(file, args, options)
    })

    const saved = await manager(run).takeScreenshot(CAPTURED_AT)

    expect(saved).toBe(path.join(dir, 'screenshot_20240517_090503.png'))
    expect(run.mock.calls.map(([file]) => file)).toEqual(['gnome-screenshot', 'grim'])
  })

  it('returns null when no tool produces a file', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '', stderr: '' }))

    await expect(manager(run).takeScreenshot(CAPTURED_AT)).resolves.toBeNull()
    expect(run).toHaveBeenCalledTimes(3)
  })

  it('keeps only the newest screenshots', async () => {
    const names = ['screenshot_a.png', 'screenshot_b.png', 'screenshot_c.png']
    for (const [index, name] of names.entries()) {
      const file = path.join(dir, name)
      await fs.writeFile(file, 'x')
      const mtime = new Date(2024, 0, 1, 0, 0, index)
      await fs.utimes(file, mtime, mtime)
    }
    await fs.writeFile(path.join(dir, 'notes.png'), 'x')
    await fs.writeFile(path.join(dir, 'screenshot_d.jpg'), 'x')

    const screenshots = manager(writingRunner, 1)
    await expect(screenshots.cleanupOldScreenshots()).resolves.toBe(2)

    expect((await fs.readdir(dir)).sort()).toEqual(['notes.png', 'screenshot_c.png', 'screenshot_d.jpg'])
    await expect(screenshots.getLatestScreenshot()).resolves.toBe(path.join(dir, 'screenshot_c.png'))
  })

  it('reports no latest screenshot for an empty directory', async () => {
    await expect(manager(writingRunner).getLatestScreenshot()).resolves.toBeNull()
  })
})
