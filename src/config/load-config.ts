import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

type LoadConfigOptions = {
  /** Directory to look for an rc file in; defaults to the working directory. */
  searchFrom?: string
  env?: NodeJS.ProcessEnv
}

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveInt(value?: string): number | undefined {
  const parsed = Number.parseInt(value ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function booleanFlag(value?: string): boolean | undefined {
  const raw = nonEmpty(value)?.toLowerCase()
  if (!raw) return undefined
  if (raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on') return true
  if (raw === '0' || raw === 'false' || raw === 'no' || raw === 'off') return false
  return undefined
}

function section(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? {...value} : {}
}

function withDefined(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged = {...base}
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value
  }
  return merged
}

/**
 * Resolves the rc file (JSON or YAML) found by cosmiconfig, lets environment
 * variables override it, and validates the result.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env
  const explorer = cosmiconfig('polyllm')
  const result = await explorer.search(options.searchFrom)
  const base = section(result?.config)

  const merged: Record<string, unknown> = {
    ...base,
    backend: withDefined(section(base.backend), {
      generation: nonEmpty(env.POLYLLM_GENERATION_BACKEND),
      embeddings: nonEmpty(env.POLYLLM_EMBEDDINGS_BACKEND)
    }),
    ollama: withDefined(section(base.ollama), {
      host: nonEmpty(env.OLLAMA_HOST),
      genModel: nonEmpty(env.OLLAMA_MODEL),
      embModel: nonEmpty(env.OLLAMA_EMBED_MODEL)
    }),
    openai: withDefined(section(base.openai), {
      apiKey: nonEmpty(env.OPENAI_API_KEY),
      baseURL: nonEmpty(env.OPENAI_BASE_URL),
      genModel: nonEmpty(env.OPENAI_MODEL),
      embModel: nonEmpty(env.OPENAI_EMBED_MODEL)
    }),
    runtime: withDefined(section(base.runtime), {
      requestTimeoutMs: positiveInt(env.POLYLLM_REQUEST_TIMEOUT_MS)
    }),
    logging: withDefined(section(base.logging), {
      enabled: booleanFlag(env.POLYLLM_LOG_ENABLED)
    }),
    ...(nonEmpty(env.POLYLLM_HOME) ? {homeDir: nonEmpty(env.POLYLLM_HOME)} : {})
  }

  return appConfigSchema.parse(merged)
}

export function maskSecret(value?: string): string | undefined {
  if (!value) return undefined
  if (value.length <= 8) return '****'
  return `${value.slice(0, 3)}...${value.slice(-4)}`
}
