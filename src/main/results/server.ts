import type { Server } from 'http'
import express, { type Express, type Request, type Response } from 'express'
import { z } from 'zod'
import type { ResultsStore, StoredResult } from './store'

const SERVICE_NAME = 'capture-relay results'

const screenshotSchema = z.object({
  image_base64: z.string().min(1),
  analysis: z.string().nullable().default(null),
  timestamp: z.string().optional()
})

const clipboardSchema = z.object({
  text: z.string().min(1),
  analysis: z.string().nullable().default(null),
  timestamp: z.string().optional()
})

function sendError(res: Response, status: number, error: unknown): void {
  res.status(status).json({ error: error instanceof Error ? error.message : String(error) })
}

function validationMessage(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
}

// Results are exposed in the snake_case shape the browser view reads
function toWire(result: StoredResult) {
  return {
    id: result.id,
    type: result.type,
    content: result.content,
    image_path: result.imagePath,
    analysis: result.analysis,
    timestamp: result.timestamp
  }
}

export function createServer(store: ResultsStore): Express {
  const app = express()
  app.use(express.json({ limit: '50mb' }))

  app.use((_req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*')
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS')
    res.header('Access-Control-Allow-Headers', 'Content-Type')
    next()
  })

  app.use('/web_data', express.static(store.dataDir))

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: SERVICE_NAME })
  })

  app.get('/api/results', async (_req: Request, res: Response) => {
    try {
      const results = await store.list()
      res.json({ results: results.map(toWire) })
    } catch (error) {
      sendError(res, 500, error)
    }
  })

  app.get('/api/results/latest', async (_req: Request, res: Response) => {
    try {
      const latest = await store.latest()
      res.json({ result: latest ? toWire(latest) : null })
    } catch (error) {
      sendError(res, 500, error)
    }
  })

  app.post('/api/screenshot', async (req: Request, res: Response) => {
    const parsed = screenshotSchema.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) })
      return
    }

    try {
      const result = await store.addScreenshot({
        imageBase64: parsed.data.image_base64,
        analysis: parsed.data.analysis,
        timestamp: parsed.data.timestamp
      })
      res.json({ status: 'success', id: result.id })
    } catch (error) {
      console.error('[Server] Failed to store screenshot:', error)
      sendError(res, 500, error)
    }
  })

  app.post('/api/clipboard', async (req: Request, res: Response) => {
    const parsed = clipboardSchema.safeParse(req.body)
    if (!parsed.success) {
      res.status(400).json({ error: validationMessage(parsed.error) })
      return
    }

    try {
      const result = await store.addClipboard({
        text: parsed.data.text,
        analysis: parsed.data.analysis,
        timestamp: parsed.data.timestamp
      })
      res.json({ status: 'success', id: result.id })
    } catch (error) {
      console.error('[Server] Failed to store clipboard result:', error)
      sendError(res, 500, error)
    }
  })

  app.delete('/api/results/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await store.delete(req.params.id)
      if (!deleted) {
        res.status(404).json({ error: 'Result not found' })
        return
      }
      res.json({ status: 'success', message: 'Result deleted' })
    } catch (error) {
      sendError(res, 500, error)
    }
  })

  return app
}

/** Starts listening; resolves null instead of failing when the port is taken. */
export function startServer(app: Express, host: string, port: number): Promise<Server | null> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host)
    server.once('listening', () => {
      console.log(`[Server] Results service listening on http://${host}:${port}`)
      resolve(server)
    })
    server.once('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        console.warn(`[Server] Port ${port} is already in use, skipping results service`)
        resolve(null)
        return
      }
      reject(error)
    })
  })
}
