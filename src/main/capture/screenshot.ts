import fs from 'fs/promises'
import path from 'path'
import type { ScreenshotConfig } from '../config'
import { compactTimestamp, errorMessage, runCommand, type CommandRunner } from '../utils'

interface CaptureCommand {
  file: string
  args: string[]
}

function powershellCaptureScript(filePath: string, format: ScreenshotConfig['imageFormat']): string {
  const quoted = filePath.replace(/'/g, "''")
  const imageFormat = format === 'png' ? 'Png' : 'Jpeg'
  return [
    'Add-Type -AssemblyName System.Windows.Forms,System.Drawing',
    '$b = [System.Windows.Forms.SystemInformation]::VirtualScreen',
    '$bmp = New-Object System.Drawing.Bitmap $b.Width, $b.Height',
    '$g = [System.Drawing.Graphics]::FromImage($bmp)',
    '$g.CopyFromScreen($b.Left, $b.Top, 0, 0, $bmp.Size)',
    `$bmp.Save('${quoted}', [System.Drawing.Imaging.ImageFormat]::${imageFormat})`,
    '$g.Dispose()',
    '$bmp.Dispose()'
  ].join('; ')
}

export function captureCommands(
  platform: NodeJS.Platform,
  filePath: string,
  format: ScreenshotConfig['imageFormat']
): CaptureCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ file: 'screencapture', args: ['-x', '-t', format, filePath] }]
    case 'win32':
      return [
        {
          file: 'powershell.exe',
          args: ['-NoProfile', '-NonInteractive', '-Command', powershellCaptureScript(filePath, format)]
        }
      ]
    default:
      return [
        { file: 'gnome-screenshot', args: ['-f', filePath] },
        { file: 'grim', args: ['-t', format === 'png' ? 'png' : 'jpeg', filePath] },
        { file: 'import', args: ['-window', 'root', filePath] }
      ]
  }
}

export class ScreenshotManager {
  // Names handed to a capture still in flight; the tool has not written them yet
  private readonly pendingPaths = new Set<string>()

  constructor(
    private readonly config: ScreenshotConfig,
    private readonly run: CommandRunner = runCommand,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async initialize(): Promise<void> {
    await fs.mkdir(this.config.savePath, { recursive: true })
    console.log(`[ScreenshotManager] Saving screenshots to ${path.resolve(this.config.savePath)}`)
  }

  generateFilename(date: Date = new Date()): string {
    return `screenshot_${compactTimestamp(date)}.${this.config.imageFormat}`
  }

  private async reservePath(date: Date): Promise<string> {
    const base = this.generateFilename(date)
    const ext = path.extname(base)
    for (let suffix = 0; ; suffix++) {
      const name = suffix === 0 ? base : `${path.basename(base, ext)}_${suffix}${ext}`
      const candidate = path.join(this.config.savePath, name)
      if ((await fileExists(candidate)) || this.pendingPaths.has(candidate)) {
        continue
      }
      this.pendingPaths.add(candidate)
      return candidate
    }
  }

  /** Captures the full screen and returns the saved file path, or null on failure. */
  async takeScreenshot(capturedAt: Date = new Date()): Promise<string | null> {
    let filePath: string | null = null
    try {
      await fs.mkdir(this.config.savePath, { recursive: true })
      filePath = await this.reservePath(capturedAt)

      for (const command of captureCommands(this.platform, filePath, this.config.imageFormat)) {
        try {
          await this.run(command.file, command.args)
        } catch (error) {
          console.warn(`[ScreenshotManager] ${command.file} failed: ${errorMessage(error)}`)
          continue
        }

        const stat = await fs.stat(filePath).catch(() => null)
        if (stat && stat.size > 0) {
          console.log(`[ScreenshotManager] Screenshot saved: ${filePath}`)
          return filePath
        }
      }

      console.error('[ScreenshotManager] No capture tool produced a screenshot')
      return null
    } catch (error) {
      console.error('[ScreenshotManager] Screenshot failed:', error)
      return null
    } finally {
      if (filePath) {
        this.pendingPaths.delete(filePath)
      }
    }
  }

  private async listScreenshots(): Promise<Array<{ path: string; mtime: number }>> {
    const suffix = `.${this.config.imageFormat}`
    let names: string[]
    try {
      names = await fs.readdir(this.config.savePath)
    } catch {
      return []
    }

    const files = await Promise.all(
      names
        .filter((name) => name.startsWith('screenshot_') && name.toLowerCase().endsWith(suffix))
        .map(async (name) => {
          const filePath = path.join(this.config.savePath, name)
          const stat = await fs.stat(filePath)
          return { path: filePath, mtime: stat.mtimeMs }
        })
    )
    return files.sort((a, b) => b.mtime - a.mtime)
  }

  async getLatestScreenshot(): Promise<string | null> {
    const files = await this.listScreenshots()
    return files[0]?.path ?? null
  }

  /** Deletes all but the newest `keepCount` screenshots and returns how many were removed. */
  async cleanupOldScreenshots(keepCount: number = this.config.keepCount): Promise<number> {
    try {
      const files = await this.listScreenshots()
      const stale = files.slice(keepCount)
      for (const file of stale) {
        await fs.unlink(file.path)
        console.log(`[ScreenshotManager] Deleted old screenshot: ${file.path}`)
      }
      return stale.length
    } catch (error) {
      console.error('[ScreenshotManager] Cleanup failed:', error)
      return 0
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}
