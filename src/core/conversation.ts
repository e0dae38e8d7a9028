import {cloneJson, type JsonObject} from './json.js'
import {ToolRegistry} from '../tools/registry.js'

export type Role = 'system' | 'user' | 'assistant' | 'tool'

export type Message = {
  role: Role
  content: string
  /** Provider envelope data (tool-call ids, echoed tool_calls) sent back verbatim. */
  fields?: JsonObject
}

export type Parameters = {
  maxTokens?: number
  temperature?: number
  topP?: number
  frequencyPenalty?: number
  presencePenalty?: number
}

/** `{role, content}` with the message's extra fields spread over it. */
export type WireMessage = JsonObject

/**
 * Ordered message log, generation parameters and the tool registry for one
 * dialogue. Not safe for concurrent converse calls: backends append to it.
 */
export class Conversation {
  readonly tools: ToolRegistry
  private readonly messages: Message[] = []
  private parameters: Parameters = {}

  constructor(tools: ToolRegistry = new ToolRegistry()) {
    this.tools = tools
  }

  addMessage(role: Role, content: string): this {
    this.messages.push({role, content})
    return this
  }

  appendMessage(message: Message): this {
    this.messages.push(message.fields ? {...message, fields: cloneJson(message.fields)} : {...message})
    return this
  }

  setParameters(parameters: Parameters): this {
    this.parameters = {...parameters}
    return this
  }

  getParameters(): Parameters {
    return {...this.parameters}
  }

  get messageCount(): number {
    return this.messages.length
  }

  lastMessage(): Message | undefined {
    const last = this.messages.at(-1)
    return last ? copyMessage(last) : undefined
  }

  snapshot(): Message[] {
    return this.messages.map(copyMessage)
  }

  asWireMessages(): WireMessage[] {
    return this.messages.map((message) => ({
      role: message.role,
      content: message.content,
      ...(message.fields ? cloneJson(message.fields) : {})
    }))
  }

  /** Flattens the log into `role: content` lines for completion-style endpoints. */
  asPromptText(): string {
    return this.messages.map((message) => `${message.role}: ${message.content}\n`).join('')
  }
}

function copyMessage(message: Message): Message {
  return message.fields ? {...message, fields: cloneJson(message.fields)} : {...message}
}
