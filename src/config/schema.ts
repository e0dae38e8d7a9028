import {z} from 'zod'
import {getLogPath, getPolyllmHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const backendKindSchema = z.enum(['ollama', 'openai', 'mock'])

export type BackendKind = z.infer<typeof backendKindSchema>

export const appConfigSchema = z
  .object({
    backend: z
      .object({
        generation: backendKindSchema.default('ollama'),
        embeddings: backendKindSchema.default('ollama')
      })
      .default({}),
    ollama: z
      .object({
        host: z.string().trim().url().default('http://localhost:11434'),
        genModel: z.string().trim().min(1).default('llama3.2'),
        embModel: z.string().trim().min(1).default('nomic-embed-text')
      })
      .default({}),
    openai: z
      .object({
        apiKey: optionalString,
        baseURL: optionalString,
        genModel: z.string().trim().min(1).default('gpt-4o-mini'),
        embModel: z.string().trim().min(1).default('text-embedding-3-small')
      })
      .default({}),
    runtime: z
      .object({
        requestTimeoutMs: positiveInt.default(30_000)
      })
      .default({}),
    logging: z
      .object({
        enabled: z.boolean().default(true),
        file: optionalString
      })
      .default({}),
    homeDir: z.string().default(getPolyllmHome())
  })
  .transform((config) => ({
    ...config,
    logging: {
      ...config.logging,
      file: config.logging.file ?? getLogPath(config.homeDir)
    }
  }))

export type AppConfig = z.infer<typeof appConfigSchema>
