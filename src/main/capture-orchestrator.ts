import type { AnalysisGateway } from './llm'
import type { ResultSink } from './results/client'
import { errorMessage } from './utils'

export interface ScreenshotSource {
  takeScreenshot(capturedAt?: Date): Promise<string | null>
  cleanupOldScreenshots(): Promise<number>
}

export interface ClipboardSource {
  getClipboardContent(): Promise<string | null>
}

export interface CaptureMailer {
  sendScreenshotEmail(screenshotPath: string, analysis: string | null, capturedAt: Date): Promise<boolean>
  sendClipboardEmail(content: string, analysis: string | null, capturedAt: Date): Promise<boolean>
}

export interface CaptureOrchestratorDeps {
  screenshots: ScreenshotSource
  clipboard: ClipboardSource
  analysis: AnalysisGateway
  results?: ResultSink | null
  mailer?: CaptureMailer | null
}

export interface ScreenshotOutcome {
  kind: 'screenshot'
  capturedAt: Date
  imagePath: string
  analysis: string | null
}

export interface ClipboardOutcome {
  kind: 'clipboard'
  capturedAt: Date
  text: string
  analysis: string | null
}

/**
 * Runs one capture end to end: capture, analyze once, then hand the result to
 * every delivery sink. Analysis and delivery failures are logged and never stop
 * the remaining steps.
 */
export class CaptureOrchestrator {
  constructor(private readonly deps: CaptureOrchestratorDeps) {}

  async onScreenshotTrigger(): Promise<ScreenshotOutcome | null> {
    console.log('[CaptureOrchestrator] Screenshot trigger received')
    const capturedAt = new Date()

    const imagePath = await this.deps.screenshots.takeScreenshot(capturedAt)
    if (!imagePath) {
      console.error('[CaptureOrchestrator] Screenshot failed')
      return null
    }

    const analysis = await this.analyze('image', () => this.deps.analysis.analyzeImage(imagePath))

    await this.deliver('results service', () =>
      this.deps.results ? this.deps.results.submitScreenshot({ imagePath, analysis, capturedAt }) : null
    )
    await this.deliver('email', () =>
      this.deps.mailer ? this.deps.mailer.sendScreenshotEmail(imagePath, analysis, capturedAt) : null
    )

    await this.deps.screenshots.cleanupOldScreenshots()
    return { kind: 'screenshot', capturedAt, imagePath, analysis }
  }

  async onClipboardTrigger(): Promise<ClipboardOutcome | null> {
    console.log('[CaptureOrchestrator] Clipboard trigger received')
    const capturedAt = new Date()

    const text = await this.deps.clipboard.getClipboardContent()
    if (!text) {
      console.log('[CaptureOrchestrator] Clipboard is empty, nothing to send')
      return null
    }

    const analysis = await this.analyze('text', () => this.deps.analysis.analyzeText(text))

    await this.deliver('results service', () =>
      this.deps.results ? this.deps.results.submitClipboard({ text, analysis, capturedAt }) : null
    )
    await this.deliver('email', () =>
      this.deps.mailer ? this.deps.mailer.sendClipboardEmail(text, analysis, capturedAt) : null
    )

    return { kind: 'clipboard', capturedAt, text, analysis }
  }

  private async analyze(label: string, run: () => Promise<string | null>): Promise<string | null> {
    try {
      const analysis = await run()
      console.log(`[CaptureOrchestrator] AI ${label} analysis ${analysis ? 'complete' : 'unavailable'}`)
      return analysis
    } catch (error) {
      console.error(`[CaptureOrchestrator] AI ${label} analysis failed: ${errorMessage(error)}`)
      return null
    }
  }

  private async deliver(label: string, send: () => Promise<boolean> | null): Promise<void> {
    try {
      const sent = send()
      if (sent === null) {
        return
      }
      if (await sent) {
        console.log(`[CaptureOrchestrator] Delivered to ${label}`)
      } else {
        console.warn(`[CaptureOrchestrator] Delivery to ${label} failed`)
      }
    } catch (error) {
      console.error(`[CaptureOrchestrator] Delivery to ${label} failed: ${errorMessage(error)}`)
    }
  }
}
