#!/usr/bin/env node
import type { Server } from 'http'
import { config as dotenvConfig } from 'dotenv'
import { DEFAULT_CONFIG_PATH, loadConfig, type AppConfig } from './config'
import { CaptureOrchestrator } from './capture-orchestrator'
import { ClipboardManager } from './capture/clipboard'
import { ScreenshotManager } from './capture/screenshot'
import { EmailSender } from './email/sender'
import { LLMService } from './llm'
import { ResultsClient } from './results/client'
import { createServer, startServer } from './results/server'
import { ResultsStore } from './results/store'
import { TaskDispatcher } from './trigger/dispatcher'
import { KeyboardListener } from './trigger/keyboard-listener'
import { TriggerEngine } from './trigger/trigger-engine'
import { SUPPORTED_KEYS, UiohookKeySource } from './trigger/uiohook-source'

// Load .env for API keys and local overrides
dotenvConfig()

// In-flight captures get this long to finish on shutdown
const SHUTDOWN_GRACE_MS = 5_000

let keyboardListener: KeyboardListener | null = null
let dispatcher: TaskDispatcher | null = null
let resultsServer: Server | null = null

function checkKeyBindings(config: AppConfig): void {
  for (const key of [config.hotkeys.captureKey, config.hotkeys.sendKey]) {
    if (!SUPPORTED_KEYS.includes(key)) {
      throw new Error(`Unsupported trigger key "${key}". Supported keys: ${SUPPORTED_KEYS.join(', ')}`)
    }
  }
}

async function main(): Promise<void> {
  const configPath = process.argv[2] || process.env.CAPTURE_RELAY_CONFIG || DEFAULT_CONFIG_PATH
  const config = loadConfig(configPath)
  checkKeyBindings(config)

  console.log('[Main] Initializing components...')

  const screenshots = new ScreenshotManager(config.screenshot)
  await screenshots.initialize()

  const clipboard = new ClipboardManager()

  let mailer: EmailSender | null = null
  if (config.email.enabled) {
    mailer = new EmailSender(config.email)
    if (!mailer.validateConfig()) {
      throw new Error('Email configuration is incomplete, check the email section of the config file')
    }
  } else {
    console.log('[Main] Email delivery disabled, skipping validation')
  }

  const llmService = new LLMService(config.llm)
  const analysisAvailable = await llmService.initialize()
  if (!analysisAvailable) {
    console.warn('[Main] AI analysis unavailable; captures will be delivered without annotation')
  }

  let results: ResultsClient | null = null
  if (config.webService.enabled) {
    const store = new ResultsStore(config.webService.dataDir)
    await store.initialize()
    resultsServer = await startServer(createServer(store), config.webService.host, config.webService.port)
    results = new ResultsClient(config.webService)
  }

  if (mailer) {
    if (await mailer.sendTestEmail()) {
      console.log('[Main] Test email sent, email settings look correct')
    } else {
      console.warn('[Main] Test email failed, check the email settings')
    }
  }

  const orchestrator = new CaptureOrchestrator({ screenshots, clipboard, analysis: llmService, results, mailer })

  const engine = TriggerEngine.withSharedWindow(config.hotkeys.triggerCount, config.hotkeys.triggerTimeoutSeconds)
  dispatcher = new TaskDispatcher({
    maxConcurrent: config.hotkeys.maxConcurrent,
    maxQueued: config.hotkeys.maxQueued
  })
  keyboardListener = new KeyboardListener(engine, dispatcher, {
    captureKey: config.hotkeys.captureKey,
    sendKey: config.hotkeys.sendKey
  })
  keyboardListener.setHandlers({
    capture: async () => {
      await orchestrator.onScreenshotTrigger()
    },
    send: async () => {
      await orchestrator.onClipboardTrigger()
    }
  })
  keyboardListener.start(new UiohookKeySource())

  console.log(
    `[Main] Running. Press ${config.hotkeys.captureKey} ${config.hotkeys.triggerCount} times within ` +
      `${config.hotkeys.triggerTimeoutSeconds}s to capture the screen, ` +
      `${config.hotkeys.sendKey} ${config.hotkeys.triggerCount} times to send the clipboard. Ctrl+C to exit.`
  )
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[Main] Received ${signal}, shutting down`)
  keyboardListener?.stop()
  if (dispatcher && dispatcher.activeCount + dispatcher.queuedCount > 0) {
    console.log(`[Main] Waiting for ${dispatcher.activeCount + dispatcher.queuedCount} capture(s) to finish`)
    if (!(await dispatcher.drain(SHUTDOWN_GRACE_MS))) {
      console.warn(`[Main] Captures still running after ${SHUTDOWN_GRACE_MS}ms, exiting anyway`)
    }
  }
  if (resultsServer) {
    const server = resultsServer
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }
  process.exit(0)
}

process.on('SIGINT', () => {
  void shutdown('SIGINT')
})

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})

main().catch((error) => {
  console.error('[Main] Startup failed:', error instanceof Error ? error.message : error)
  keyboardListener?.stop()
  process.exit(1)
})
