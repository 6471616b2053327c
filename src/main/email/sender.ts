import fs from 'fs/promises'
import path from 'path'
import nodemailer, { type Transporter } from 'nodemailer'
import type { EmailConfig } from '../config'
import { displayTimestamp, errorMessage } from '../utils'

const REQUIRED_FIELDS = ['smtpServer', 'smtpPort', 'senderEmail', 'senderPassword', 'receiverEmail'] as const

function analysisBlock(analysis: string): string {
  return `=== AI analysis ===\n${analysis}\n=== End of analysis ===`
}

export function buildScreenshotBody(fileName: string, analysis: string | null, capturedAt: Date): string {
  const lines = ['Automatic screenshot', '', `Captured at: ${displayTimestamp(capturedAt)}`, `File: ${fileName}`]
  if (analysis) {
    lines.push('', analysisBlock(analysis))
  }
  lines.push('', 'This email was sent automatically by capture-relay.')
  return lines.join('\n')
}

export function buildClipboardBody(content: string, analysis: string | null): string {
  if (!analysis) {
    return content
  }
  return `Original content:\n${content}\n\n${analysisBlock(analysis)}`
}

export class EmailSender {
  private transporter: Transporter | null

  constructor(
    private readonly config: EmailConfig,
    transporter?: Transporter
  ) {
    this.transporter = transporter ?? null
  }

  validateConfig(): boolean {
    for (const field of REQUIRED_FIELDS) {
      if (!this.config[field]) {
        console.error(`[EmailSender] Missing email setting: ${field}`)
        return false
      }
    }
    return true
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: this.config.smtpServer,
        port: this.config.smtpPort,
        secure: true,
        auth: {
          user: this.config.senderEmail,
          pass: this.config.senderPassword
        }
      })
    }
    return this.transporter
  }

  async sendScreenshotEmail(screenshotPath: string, analysis: string | null, capturedAt: Date): Promise<boolean> {
    const fileName = path.basename(screenshotPath)
    try {
      await fs.access(screenshotPath)
    } catch {
      console.error(`[EmailSender] Screenshot not found: ${screenshotPath}`)
      return false
    }

    try {
      await this.getTransporter().sendMail({
        from: this.config.senderEmail,
        to: this.config.receiverEmail,
        subject: `Screenshot - ${displayTimestamp(capturedAt)}`,
        text: buildScreenshotBody(fileName, analysis, capturedAt),
        attachments: [{ filename: fileName, path: screenshotPath }]
      })
      console.log(`[EmailSender] Screenshot email sent: ${fileName}`)
      return true
    } catch (error) {
      console.error(`[EmailSender] Failed to send screenshot email: ${errorMessage(error)}`)
      return false
    }
  }

  async sendClipboardEmail(content: string, analysis: string | null, capturedAt: Date): Promise<boolean> {
    if (!content.trim()) {
      console.warn('[EmailSender] Clipboard content is empty, nothing to send')
      return false
    }

    try {
      await this.getTransporter().sendMail({
        from: this.config.senderEmail,
        to: this.config.receiverEmail,
        subject: `Clipboard content - ${displayTimestamp(capturedAt)}`,
        text: buildClipboardBody(content, analysis)
      })
      console.log(`[EmailSender] Clipboard email sent (${content.length} characters)`)
      return true
    } catch (error) {
      console.error(`[EmailSender] Failed to send clipboard email: ${errorMessage(error)}`)
      return false
    }
  }

  async sendTestEmail(): Promise<boolean> {
    try {
      await this.getTransporter().sendMail({
        from: this.config.senderEmail,
        to: this.config.receiverEmail,
        subject: `Test email - ${displayTimestamp(new Date())}`,
        text: 'This is a test email confirming that the email settings work.'
      })
      console.log('[EmailSender] Test email sent')
      return true
    } catch (error) {
      console.error(`[EmailSender] Failed to send test email: ${errorMessage(error)}`)
      return false
    }
  }
}
