import type {Conversation, Message} from '../core/conversation.js'
import {ToolExecutionError, ToolNotFoundError, describeError} from '../core/errors.js'
import {InMemoryEventBus, type BackendEvent, type EventBus} from '../core/event-bus.js'
import type {JsonObject} from '../core/json.js'
import type {Backend, PromptResponse, RequestOptions, ToolCall} from './types.js'

export const DEFAULT_TIMEOUT_MS = 30_000

export type ChatBackendOptions = {
  /** Logging sink; every request, reply and tool run is published here. */
  bus?: EventBus<BackendEvent>
  timeoutMs?: number
}

export type ModelToolCall = {
  id?: string
  name: string
  arguments: JsonObject
  /** The provider's own tool_calls entry, echoed back on the assistant message. */
  envelope: JsonObject
}

export type ModelReply = {
  content: string
  toolCalls: ModelToolCall[]
}

export type AttemptOptions = RequestOptions & {
  attempt: number
  disableTools: boolean
}

/**
 * Shared conversation driver: ask the model, run the tools it asked for,
 * and re-ask once without tools when it named a tool that does not exist.
 * Providers only supply the wire round trip and their envelope fields.
 */
export abstract class ChatBackend implements Backend {
  abstract readonly name: string
  readonly model: string
  protected readonly bus: EventBus<BackendEvent>
  protected readonly timeoutMs: number

  protected constructor(model: string, options: ChatBackendOptions = {}) {
    this.model = model
    this.bus = options.bus ?? new InMemoryEventBus<BackendEvent>()
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  abstract generate(conversation: Conversation, options?: RequestOptions): Promise<string>

  abstract embed(input: string, options?: RequestOptions): Promise<number[]>

  protected abstract requestReply(conversation: Conversation, options: AttemptOptions): Promise<ModelReply>

  /** Extra fields for the tool-role message carrying a result, if the provider needs any. */
  protected abstract toolResultFields(call: ModelToolCall): JsonObject | undefined

  async converse(conversation: Conversation, options: RequestOptions = {}): Promise<PromptResponse> {
    try {
      return await this.roundTrip(conversation, {...options, attempt: 1, disableTools: false})
    } catch (error) {
      if (!(error instanceof ToolNotFoundError)) throw error
      this.bus.publish({type: 'tool_retry', backend: this.name, tool: error.toolName})
      return this.roundTrip(conversation, {...options, attempt: 2, disableTools: true})
    }
  }

  protected toolsEnabled(conversation: Conversation, options: AttemptOptions): boolean {
    return !options.disableTools && conversation.tools.size > 0
  }

  /**
   * Sends one request and decodes its payload, publishing request, response
   * and error events. Decode failures after a 2xx count as errors too.
   */
  protected async track<T>(
    endpoint: string,
    meta: {attempt: number; toolsEnabled: boolean},
    send: () => Promise<{status: number; data: unknown}>,
    decode: (data: unknown) => T
  ): Promise<T> {
    const startedAt = Date.now()
    this.bus.publish({type: 'request', backend: this.name, endpoint, ...meta})
    try {
      const {status, data} = await send()
      this.bus.publish({
        type: 'response',
        backend: this.name,
        endpoint,
        status,
        durationMs: Date.now() - startedAt
      })
      return decode(data)
    } catch (error) {
      this.bus.publish({
        type: 'error',
        backend: this.name,
        endpoint,
        error: describeError(error),
        errorName: error instanceof Error ? error.name : 'Error'
      })
      throw error
    }
  }

  private async roundTrip(conversation: Conversation, options: AttemptOptions): Promise<PromptResponse> {
    const reply = await this.requestReply(conversation, options)

    if (reply.toolCalls.length === 0) {
      conversation.addMessage('assistant', reply.content)
      this.bus.publish({type: 'reply', backend: this.name, content: reply.content})
      return {role: 'assistant', content: reply.content, toolCalls: []}
    }

    // Nothing reaches the conversation until every call in the batch succeeded.
    const staged: Message[] = []
    const toolCalls: ToolCall[] = []
    for (const [index, call] of reply.toolCalls.entries()) {
      this.bus.publish({type: 'tool_call', backend: this.name, tool: call.name, arguments: call.arguments})
      let output: string
      try {
        output = await conversation.tools.execute(call.name, call.arguments)
      } catch (error) {
        this.bus.publish({
          type: 'tool_result',
          backend: this.name,
          tool: call.name,
          ok: false,
          output: describeError(error)
        })
        if (error instanceof ToolNotFoundError) throw error
        throw new ToolExecutionError(call.name, error)
      }

      this.bus.publish({type: 'tool_result', backend: this.name, tool: call.name, ok: true, output})
      const resultFields = this.toolResultFields(call)
      staged.push({
        role: 'assistant',
        content: index === 0 ? reply.content : '',
        fields: {tool_calls: [call.envelope]}
      })
      staged.push({role: 'tool', content: output, ...(resultFields ? {fields: resultFields} : {})})
      toolCalls.push({name: call.name, arguments: call.arguments, result: output})
    }

    for (const message of staged) conversation.appendMessage(message)
    return {role: 'tool', content: '', toolCalls}
  }
}
