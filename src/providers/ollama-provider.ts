import {z} from 'zod'
import type {Conversation, Parameters} from '../core/conversation.js'
import {jsonObjectSchema, type JsonObject} from '../core/json.js'
import {ChatBackend, type AttemptOptions, type ChatBackendOptions, type ModelReply} from './chat-backend.js'
import {decodeWith, joinUrl, postJson} from './http.js'
import type {RequestOptions} from './types.js'

export const OLLAMA_CHAT_ENDPOINT = '/api/chat'
export const OLLAMA_GENERATE_ENDPOINT = '/api/generate'
export const OLLAMA_EMBED_ENDPOINT = '/api/embeddings'

type OllamaProviderOptions = ChatBackendOptions & {
  host: string
  model: string
}

const ollamaToolCallSchema = z.object({
  function: z.object({
    name: z.string().min(1),
    arguments: jsonObjectSchema.default({})
  })
})

const ollamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string().default('assistant'),
    content: z.string().default(''),
    tool_calls: z.array(ollamaToolCallSchema).nullish()
  })
})

const ollamaGenerateResponseSchema = z.object({
  response: z.string()
})

const ollamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number())
})

function ollamaOptions(parameters: Parameters): JsonObject | undefined {
  const options: JsonObject = {}
  if (parameters.maxTokens !== undefined) options.num_predict = parameters.maxTokens
  if (parameters.temperature !== undefined) options.temperature = parameters.temperature
  if (parameters.topP !== undefined) options.top_p = parameters.topP
  if (parameters.frequencyPenalty !== undefined) options.frequency_penalty = parameters.frequencyPenalty
  if (parameters.presencePenalty !== undefined) options.presence_penalty = parameters.presencePenalty
  return Object.keys(options).length > 0 ? options : undefined
}

function toModelReply({message}: z.output<typeof ollamaChatResponseSchema>): ModelReply {
  return {
    content: message.content,
    toolCalls: (message.tool_calls ?? []).map((call) => ({
      name: call.function.name,
      arguments: call.function.arguments,
      envelope: {function: {name: call.function.name, arguments: call.function.arguments}}
    }))
  }
}

export class OllamaProvider extends ChatBackend {
  readonly name = 'ollama'
  private readonly host: string

  constructor(options: OllamaProviderOptions) {
    super(options.model, options)
    this.host = options.host.replace(/\/+$/, '')
  }

  async generate(conversation: Conversation, options: RequestOptions = {}): Promise<string> {
    const generationOptions = ollamaOptions(conversation.getParameters())
    return this.track(
      OLLAMA_GENERATE_ENDPOINT,
      {attempt: 1, toolsEnabled: false},
      () =>
        this.post(OLLAMA_GENERATE_ENDPOINT, {
          model: this.model,
          prompt: conversation.asPromptText(),
          stream: false,
          ...(generationOptions ? {options: generationOptions} : {})
        }, options),
      (data) => decodeWith(ollamaGenerateResponseSchema, data, 'ollama generate response').response
    )
  }

  async embed(input: string, options: RequestOptions = {}): Promise<number[]> {
    return this.track(
      OLLAMA_EMBED_ENDPOINT,
      {attempt: 1, toolsEnabled: false},
      () => this.post(OLLAMA_EMBED_ENDPOINT, {model: this.model, prompt: input}, options),
      (data) => decodeWith(ollamaEmbeddingResponseSchema, data, 'ollama embedding response').embedding
    )
  }

  protected async requestReply(conversation: Conversation, options: AttemptOptions): Promise<ModelReply> {
    const toolsEnabled = this.toolsEnabled(conversation, options)
    const generationOptions = ollamaOptions(conversation.getParameters())
    const body: JsonObject = {
      model: this.model,
      messages: conversation.asWireMessages(),
      stream: false,
      ...(toolsEnabled ? {tools: conversation.tools.describe()} : {}),
      ...(generationOptions ? {options: generationOptions} : {})
    }

    return this.track(
      OLLAMA_CHAT_ENDPOINT,
      {attempt: options.attempt, toolsEnabled},
      () => this.post(OLLAMA_CHAT_ENDPOINT, body, options),
      (data) => toModelReply(decodeWith(ollamaChatResponseSchema, data, 'ollama chat response'))
    )
  }

  protected toolResultFields(): JsonObject | undefined {
    return undefined
  }

  private post(endpoint: string, body: JsonObject, options: RequestOptions) {
    return postJson({
      backend: this.name,
      url: joinUrl(this.host, endpoint),
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal
    })
  }
}
