import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigError } from './llm/types'

export interface HotkeyConfig {
  readonly triggerCount: number
  readonly triggerTimeoutSeconds: number
  readonly captureKey: string
  readonly sendKey: string
  readonly maxConcurrent: number
  readonly maxQueued: number
}

export interface ScreenshotConfig {
  readonly savePath: string
  readonly imageFormat: 'png' | 'jpg'
  readonly keepCount: number
}

export interface EmailConfig {
  readonly enabled: boolean
  readonly smtpServer: string
  readonly smtpPort: number
  readonly senderEmail: string
  readonly senderPassword: string
  readonly receiverEmail: string
}

export interface RoleConfig {
  readonly provider: string
  readonly model: string
  readonly prompt?: string
}

export interface OllamaConfig {
  readonly baseUrl: string
  readonly timeoutMs: number
}

export interface OpenAIConfig {
  readonly apiKey: string
  readonly baseUrl: string
  readonly timeoutMs: number
}

export interface ClaudeConfig {
  readonly apiKey: string
  readonly timeoutMs: number
}

export interface DoubaoConfig {
  readonly apiKey: string
  readonly baseUrl: string
  readonly timeoutMs: number
  readonly extraHeaders: Readonly<Record<string, string>>
}

export interface CustomProviderConfig {
  readonly apiUrl: string
  readonly apiKey: string
  readonly timeoutMs: number
}

export interface LLMConfig {
  readonly enabled: boolean
  readonly textModel: RoleConfig
  readonly visionModel: RoleConfig
  readonly ollama: OllamaConfig
  readonly openai: OpenAIConfig
  readonly claude: ClaudeConfig
  readonly doubao: DoubaoConfig
  readonly custom: Readonly<Record<string, CustomProviderConfig>>
}

export interface WebServiceConfig {
  readonly enabled: boolean
  readonly host: string
  readonly port: number
  readonly dataDir: string
}

export interface AppConfig {
  readonly hotkeys: HotkeyConfig
  readonly screenshot: ScreenshotConfig
  readonly email: EmailConfig
  readonly llm: LLMConfig
  readonly webService: WebServiceConfig
}

export const DEFAULT_CONFIG_PATH = 'config.json'

const BUILTIN_LLM_SECTIONS = ['enabled', 'text_model', 'vision_model', 'ollama', 'openai', 'claude', 'doubao']

// Timeouts are written in seconds in the config file
const timeoutSeconds = z.number().positive().default(60)

const roleSchema = z
  .object({
    provider: z.string().trim().default(''),
    model: z.string().trim().default(''),
    prompt: z.string().optional()
  })
  .default({})

const customProviderSchema = z.object({
  api_url: z.string().trim().default(''),
  api_key: z.string().trim().default(''),
  timeout: timeoutSeconds
})

const rawConfigSchema = z.object({
  hotkeys: z
    .object({
      trigger_count: z.number().int().min(1).default(3),
      trigger_timeout: z.number().positive().default(2),
      capture_key: z.string().trim().toLowerCase().default('enter'),
      send_key: z.string().trim().toLowerCase().default('shift'),
      max_concurrent: z.number().int().min(1).default(2),
      max_queued: z.number().int().min(0).default(4)
    })
    .default({}),
  screenshot: z
    .object({
      save_path: z.string().default('screenshots'),
      image_format: z
        .string()
        .trim()
        .toLowerCase()
        .transform((value) => (value === 'jpeg' ? 'jpg' : value))
        .pipe(z.enum(['png', 'jpg']))
        .default('png'),
      keep_count: z.number().int().min(1).default(10)
    })
    .default({}),
  email: z
    .object({
      enabled: z.boolean().default(true),
      smtp_server: z.string().default(''),
      smtp_port: z.number().int().positive().default(465),
      sender_email: z.string().default(''),
      sender_password: z.string().default(''),
      receiver_email: z.string().default('')
    })
    .default({}),
  llm: z
    .object({
      enabled: z.boolean().default(false),
      text_model: roleSchema,
      vision_model: roleSchema,
      ollama: z
        .object({
          base_url: z.string().default('http://localhost:11434'),
          timeout: timeoutSeconds
        })
        .default({}),
      openai: z
        .object({
          api_key: z.string().default(''),
          base_url: z.string().default('https://api.openai.com/v1'),
          timeout: timeoutSeconds
        })
        .default({}),
      claude: z
        .object({
          api_key: z.string().default(''),
          timeout: timeoutSeconds
        })
        .default({}),
      doubao: z
        .object({
          api_key: z.string().default(''),
          base_url: z.string().default('https://ark.cn-beijing.volces.com/api/v3'),
          timeout: timeoutSeconds,
          extra_headers: z.record(z.string()).default({ 'x-is-encrypted': 'true' })
        })
        .default({})
    })
    .catchall(z.unknown())
    .default({}),
  web_service: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(8000),
      data_dir: z.string().default('web_data')
    })
    .default({})
})

type RawConfig = z.infer<typeof rawConfigSchema>

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '')
}

// Environment variable takes precedence over the file
function envKey(env: NodeJS.ProcessEnv, name: string, fileValue: string): string {
  const envValue = env[name]?.trim()
  return envValue ? envValue : fileValue.trim()
}

function parseCustomProviders(llm: RawConfig['llm']): Record<string, CustomProviderConfig> {
  const custom: Record<string, CustomProviderConfig> = {}
  for (const [id, value] of Object.entries(llm)) {
    if (BUILTIN_LLM_SECTIONS.includes(id)) continue
    const parsed = customProviderSchema.safeParse(value)
    if (!parsed.success) {
      console.warn(`[Config] Ignoring llm.${id}: not a custom provider section`)
      continue
    }
    custom[id] = {
      apiUrl: parsed.data.api_url,
      apiKey: parsed.data.api_key,
      timeoutMs: parsed.data.timeout * 1000
    }
  }
  return custom
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = rawConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }

  const { hotkeys, screenshot, email, llm, web_service: web } = parsed.data

  const config: AppConfig = {
    hotkeys: {
      triggerCount: hotkeys.trigger_count,
      triggerTimeoutSeconds: hotkeys.trigger_timeout,
      captureKey: hotkeys.capture_key,
      sendKey: hotkeys.send_key,
      maxConcurrent: hotkeys.max_concurrent,
      maxQueued: hotkeys.max_queued
    },
    screenshot: {
      savePath: screenshot.save_path,
      imageFormat: screenshot.image_format,
      keepCount: screenshot.keep_count
    },
    email: {
      enabled: email.enabled,
      smtpServer: email.smtp_server,
      smtpPort: email.smtp_port,
      senderEmail: email.sender_email,
      senderPassword: email.sender_password,
      receiverEmail: email.receiver_email
    },
    llm: {
      enabled: llm.enabled,
      textModel: llm.text_model,
      visionModel: llm.vision_model,
      ollama: {
        baseUrl: stripTrailingSlash(llm.ollama.base_url),
        timeoutMs: llm.ollama.timeout * 1000
      },
      openai: {
        apiKey: envKey(env, 'OPENAI_API_KEY', llm.openai.api_key),
        baseUrl: stripTrailingSlash(llm.openai.base_url),
        timeoutMs: llm.openai.timeout * 1000
      },
      claude: {
        apiKey: envKey(env, 'ANTHROPIC_API_KEY', llm.claude.api_key),
        timeoutMs: llm.claude.timeout * 1000
      },
      doubao: {
        apiKey: envKey(env, 'ARK_API_KEY', llm.doubao.api_key),
        baseUrl: stripTrailingSlash(llm.doubao.base_url),
        timeoutMs: llm.doubao.timeout * 1000,
        extraHeaders: llm.doubao.extra_headers
      },
      custom: parseCustomProviders(llm)
    },
    webService: {
      enabled: web.enabled,
      host: web.host,
      port: web.port,
      dataDir: web.data_dir
    }
  }

  return deepFreeze(config)
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const resolved = path.resolve(configPath)
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file not found: ${resolved}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'))
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const config = parseConfig(raw, env)
  console.log(`[Config] Loaded ${resolved}`)
  return config
}
