import {AsyncLocalStorage} from 'node:async_hooks'
import OpenAI, {APIConnectionError, APIError, APIUserAbortError} from 'openai'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions'
import {z} from 'zod'
import type {Conversation, Parameters, WireMessage} from '../core/conversation.js'
import {
  BackendError,
  BackendHTTPError,
  DecodeError,
  RequestMarshalError,
  TransportError,
  describeError
} from '../core/errors.js'
import {jsonObjectSchema, type JsonObject} from '../core/json.js'
import {ChatBackend, type AttemptOptions, type ChatBackendOptions, type ModelReply, type ModelToolCall} from './chat-backend.js'
import {decodeWith} from './http.js'
import type {RequestOptions} from './types.js'

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1'
export const OPENAI_CHAT_ENDPOINT = '/chat/completions'
export const OPENAI_EMBED_ENDPOINT = '/embeddings'

type OpenAIProviderOptions = ChatBackendOptions & {
  apiKey: string
  model: string
  baseUrl?: string
}

type SamplingParameters = Pick<
  ChatCompletionCreateParamsNonStreaming,
  'max_tokens' | 'temperature' | 'top_p' | 'frequency_penalty' | 'presence_penalty'
>

type FailedResponse = {
  status: number
  body: string
}

type ResponseSlot = {failure?: FailedResponse}

const failedResponses = new AsyncLocalStorage<ResponseSlot>()

// The SDK error only keeps the parsed error object; keep the raw body for BackendHTTPError.
async function fetchKeepingErrorBodies(input: string | URL | Request, init?: RequestInit): Promise<Response> {
  const response = await fetch(input, init)
  const slot = failedResponses.getStore()
  if (slot && !response.ok) {
    slot.failure = {status: response.status, body: await response.clone().text()}
  }
  return response
}

const toolCallEnvelopeSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string()
  })
})

const outgoingMessageSchema = z.discriminatedUnion('role', [
  z.object({role: z.literal('system'), content: z.string()}),
  z.object({role: z.literal('user'), content: z.string()}),
  z.object({role: z.literal('assistant'), content: z.string(), tool_calls: z.array(toolCallEnvelopeSchema).optional()}),
  z.object({role: z.literal('tool'), content: z.string(), tool_call_id: z.string().optional()})
])

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().default('assistant'),
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.literal('function').default('function'),
                function: z.object({
                  name: z.string().min(1),
                  arguments: z.string().default('{}')
                })
              })
            )
            .nullish()
        })
      })
    )
    .min(1)
})

const embeddingResponseSchema = z.object({
  data: z.array(z.object({embedding: z.array(z.number())})).min(1)
})

function samplingParameters(parameters: Parameters): SamplingParameters {
  const sampling: SamplingParameters = {}
  if (parameters.maxTokens !== undefined) sampling.max_tokens = parameters.maxTokens
  if (parameters.temperature !== undefined) sampling.temperature = parameters.temperature
  if (parameters.topP !== undefined) sampling.top_p = parameters.topP
  if (parameters.frequencyPenalty !== undefined) sampling.frequency_penalty = parameters.frequencyPenalty
  if (parameters.presencePenalty !== undefined) sampling.presence_penalty = parameters.presencePenalty
  return sampling
}

function toChatMessage(wire: WireMessage, index: number): ChatCompletionMessageParam {
  const parsed = outgoingMessageSchema.safeParse(wire)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
    throw new RequestMarshalError(`message ${index} is not a valid openai chat message: ${issues}`, {cause: parsed.error})
  }

  const message = parsed.data
  switch (message.role) {
    case 'system':
      return {role: 'system', content: message.content}
    case 'user':
      return {role: 'user', content: message.content}
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.tool_calls ? {tool_calls: message.tool_calls} : {})
      }
    case 'tool':
      // A tool result without a call id cannot be attached to a call; send it as user text.
      if (!message.tool_call_id) return {role: 'user', content: `[tool] ${message.content}`}
      return {role: 'tool', content: message.content, tool_call_id: message.tool_call_id}
  }
}

function parseArguments(toolName: string, raw: string): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw.trim() || '{}')
  } catch (error) {
    throw new DecodeError(`failed to unmarshal arguments for tool ${toolName}: ${describeError(error)}`, {cause: error})
  }
  return decodeWith(jsonObjectSchema, parsed, `arguments for tool ${toolName}`)
}

function toModelReply(data: unknown): ModelReply {
  const {message} = decodeWith(chatCompletionSchema, data, 'openai chat completion').choices[0]
  return {
    content: message.content ?? '',
    toolCalls: (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.name, call.function.arguments),
      envelope: {
        id: call.id,
        type: call.type,
        function: {name: call.function.name, arguments: call.function.arguments}
      }
    }))
  }
}

function errorBody(error: APIError): string {
  return error.error === undefined ? error.message : JSON.stringify(error.error)
}

export class OpenAIProvider extends ChatBackend {
  readonly name = 'openai'
  private readonly client: OpenAI

  constructor(options: OpenAIProviderOptions) {
    super(options.model, options)
    const rawBaseUrl = options.baseUrl ?? OPENAI_DEFAULT_BASE_URL
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: rawBaseUrl.replace(/\/+$/, ''),
      timeout: this.timeoutMs,
      maxRetries: 0,
      fetch: fetchKeepingErrorBodies
    })
  }

  async generate(conversation: Conversation, options: RequestOptions = {}): Promise<string> {
    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: conversation.asWireMessages().map(toChatMessage),
      stream: false,
      ...samplingParameters(conversation.getParameters())
    }

    const reply = await this.track(
      OPENAI_CHAT_ENDPOINT,
      {attempt: 1, toolsEnabled: false},
      () => this.send(() => this.client.chat.completions.create(request, {signal: options.signal})),
      toModelReply
    )
    return reply.content
  }

  async embed(input: string, options: RequestOptions = {}): Promise<number[]> {
    return this.track(
      OPENAI_EMBED_ENDPOINT,
      {attempt: 1, toolsEnabled: false},
      () =>
        this.send(() =>
          this.client.embeddings.create(
            {model: this.model, input, encoding_format: 'float'},
            {signal: options.signal}
          )
        ),
      (data) => decodeWith(embeddingResponseSchema, data, 'openai embedding response').data[0].embedding
    )
  }

  protected async requestReply(conversation: Conversation, options: AttemptOptions): Promise<ModelReply> {
    const toolsEnabled = this.toolsEnabled(conversation, options)
    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: conversation.asWireMessages().map(toChatMessage),
      stream: false,
      ...(toolsEnabled ? {tools: conversation.tools.describe()} : {}),
      ...samplingParameters(conversation.getParameters())
    }

    return this.track(
      OPENAI_CHAT_ENDPOINT,
      {attempt: options.attempt, toolsEnabled},
      () => this.send(() => this.client.chat.completions.create(request, {signal: options.signal})),
      toModelReply
    )
  }

  protected toolResultFields(call: ModelToolCall): JsonObject | undefined {
    return call.id ? {tool_call_id: call.id} : undefined
  }

  private async send<T>(
    request: () => {withResponse(): Promise<{data: T; response: Response}>}
  ): Promise<{status: number; data: T}> {
    const slot: ResponseSlot = {}
    try {
      const {data, response} = await failedResponses.run(slot, () => request().withResponse())
      return {status: response.status, data}
    } catch (error) {
      throw this.translateError(error, slot.failure)
    }
  }

  private translateError(error: unknown, failure?: FailedResponse): Error {
    if (error instanceof BackendError) return error
    if (error instanceof APIUserAbortError) {
      return new TransportError(`${this.name} request aborted`, {cause: error})
    }
    if (error instanceof APIConnectionError) {
      return new TransportError(`${this.name} request failed: ${error.message}`, {cause: error})
    }
    if (error instanceof APIError && typeof error.status === 'number') {
      const body = failure?.status === error.status ? failure.body : errorBody(error)
      return new BackendHTTPError(this.name, error.status, body)
    }
    if (error instanceof SyntaxError) {
      return new DecodeError(`failed to decode ${this.name} response: ${error.message}`, {cause: error})
    }
    return new TransportError(`${this.name} request failed: ${describeError(error)}`, {cause: error})
  }
}
