import type {Conversation} from '../core/conversation.js'
import {InMemoryEventBus, type BackendEvent, type EventBus} from '../core/event-bus.js'
import type {Backend, PromptResponse} from './types.js'

const MOCK_EMBEDDING_DIMENSIONS = 8

/** Offline backend: echoes the last message and never asks for tools. */
export class MockProvider implements Backend {
  readonly name = 'mock'
  readonly model = 'mock'
  private readonly bus: EventBus<BackendEvent>

  constructor(options: {bus?: EventBus<BackendEvent>} = {}) {
    this.bus = options.bus ?? new InMemoryEventBus<BackendEvent>()
  }

  async generate(conversation: Conversation): Promise<string> {
    return this.replyTo(conversation)
  }

  async converse(conversation: Conversation): Promise<PromptResponse> {
    const content = this.replyTo(conversation)
    conversation.addMessage('assistant', content)
    this.bus.publish({type: 'reply', backend: this.name, content})
    return {role: 'assistant', content, toolCalls: []}
  }

  async embed(input: string): Promise<number[]> {
    const vector = new Array<number>(MOCK_EMBEDDING_DIMENSIONS).fill(0)
    for (let i = 0; i < input.length; i += 1) {
      vector[i % MOCK_EMBEDDING_DIMENSIONS] += input.charCodeAt(i)
    }
    const norm = Math.hypot(...vector)
    return norm === 0 ? vector : vector.map((value) => value / norm)
  }

  private replyTo(conversation: Conversation): string {
    const last = conversation.lastMessage()
    if (!last) return 'No input provided.'
    return `Mock response: ${last.content}`
  }
}
