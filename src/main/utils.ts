import { execFile } from 'child_process'
import { promisify } from 'util'

const execFileAsync = promisify(execFile)

export interface CommandResult {
  stdout: string
  stderr: string
}

export type CommandRunner = (file: string, args: string[], options?: { timeoutMs?: number }) => Promise<CommandResult>

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: options.timeoutMs ?? 15_000,
    encoding: 'utf8',
    maxBuffer: 16 * 1024 * 1024,
    windowsHide: true
  })
  return { stdout, stderr }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function compactTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/** Local time as `YYYY-MM-DD HH:MM:SS`, for message subjects and bodies. */
export function displayTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

export function preview(text: string, limit = 100): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text
}
