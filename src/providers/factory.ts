import type {AppConfig, BackendKind} from '../config/schema.js'
import type {BackendEvent, EventBus} from '../core/event-bus.js'
import {MockProvider} from './mock-provider.js'
import {OllamaProvider} from './ollama-provider.js'
import {OpenAIProvider} from './openai-provider.js'
import type {Backend} from './types.js'

export type BackendPurpose = 'generation' | 'embeddings'

type CreateBackendOptions = {
  bus?: EventBus<BackendEvent>
}

export function createBackend(
  kind: BackendKind,
  purpose: BackendPurpose,
  config: AppConfig,
  options: CreateBackendOptions = {}
): Backend {
  const timeoutMs = config.runtime.requestTimeoutMs
  switch (kind) {
    case 'mock':
      return new MockProvider({bus: options.bus})
    case 'ollama':
      return new OllamaProvider({
        host: config.ollama.host,
        model: purpose === 'generation' ? config.ollama.genModel : config.ollama.embModel,
        timeoutMs,
        bus: options.bus
      })
    case 'openai': {
      const apiKey = config.openai.apiKey
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY is missing. Set it in your environment, .env file or openai.apiKey in config.')
      }
      return new OpenAIProvider({
        apiKey,
        model: purpose === 'generation' ? config.openai.genModel : config.openai.embModel,
        baseUrl: config.openai.baseURL,
        timeoutMs,
        bus: options.bus
      })
    }
  }
}

export function createConfiguredBackend(
  purpose: BackendPurpose,
  config: AppConfig,
  options: CreateBackendOptions = {}
): Backend {
  return createBackend(config.backend[purpose], purpose, config, options)
}
