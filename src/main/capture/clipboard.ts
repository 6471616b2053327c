import { errorMessage, preview, runCommand, type CommandRunner } from '../utils'

interface ReadCommand {
  file: string
  args: string[]
}

export function clipboardReadCommands(platform: NodeJS.Platform): ReadCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ file: 'pbpaste', args: [] }]
    case 'win32':
      return [{ file: 'powershell.exe', args: ['-NoProfile', '-NonInteractive', '-Command', 'Get-Clipboard -Raw'] }]
    default:
      return [
        { file: 'wl-paste', args: ['--no-newline'] },
        { file: 'xclip', args: ['-selection', 'clipboard', '-o'] },
        { file: 'xsel', args: ['--clipboard', '--output'] }
      ]
  }
}

export class ClipboardManager {
  private lastContent = ''

  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  /** Current clipboard text, or null when it is empty or cannot be read. */
  async getClipboardContent(): Promise<string | null> {
    for (const command of clipboardReadCommands(this.platform)) {
      let content: string
      try {
        content = (await this.run(command.file, command.args, { timeoutMs: 5_000 })).stdout
      } catch (error) {
        console.warn(`[ClipboardManager] ${command.file} failed: ${errorMessage(error)}`)
        continue
      }

      if (this.platform === 'win32') {
        // Get-Clipboard -Raw appends a line break
        content = content.replace(/\r?\n$/, '')
      }

      if (!content.trim()) {
        console.log('[ClipboardManager] Clipboard is empty')
        return null
      }

      this.lastContent = content
      console.log(`[ClipboardManager] Read clipboard: ${preview(content)}`)
      return content
    }

    console.error('[ClipboardManager] No clipboard tool could be run')
    return null
  }

  getLastContent(): string {
    return this.lastContent
  }
}
