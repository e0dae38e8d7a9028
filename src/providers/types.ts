import type {Conversation} from '../core/conversation.js'
import type {JsonObject} from '../core/json.js'

export type RequestOptions = {
  /** Aborts the in-flight request; the conversation is left untouched. */
  signal?: AbortSignal
}

export type ToolCall = {
  name: string
  arguments: JsonObject
  result: string
}

export type PromptResponse = {
  role: 'assistant' | 'tool'
  content: string
  toolCalls: ToolCall[]
}

export interface Backend {
  readonly name: string
  readonly model: string
  generate(conversation: Conversation, options?: RequestOptions): Promise<string>
  converse(conversation: Conversation, options?: RequestOptions): Promise<PromptResponse>
  embed(input: string, options?: RequestOptions): Promise<number[]>
}
