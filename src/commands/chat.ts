import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {Conversation} from '../core/conversation.js'
import {formatEvent} from '../core/format-event.js'
import {startRuntime} from '../core/runtime.js'
import {createConfiguredBackend} from '../providers/factory.js'
import type {PromptResponse} from '../providers/types.js'
import {weatherTool} from '../tools/weather.js'

function now(): string {
  return new Date().toISOString()
}

function renderToolResults(response: PromptResponse): string {
  return response.toolCalls.map((call) => `${call.name}(${JSON.stringify(call.arguments)}) => ${call.result}`).join('\n')
}

export default class Chat extends Command {
  static override description = 'Converse with the generation backend; the model may call the example weather tool'

  static override flags = {
    system: Flags.string({description: 'system prompt', default: 'You are a helpful assistant.'}),
    noTools: Flags.boolean({description: 'do not offer the weather tool to the model'}),
    quiet: Flags.boolean({description: 'hide request logs and print only the answer'})
  }

  static override args = {
    prompt: Args.string({description: 'user message', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Chat)
    const config = await loadConfig()
    const runtime = startRuntime(config, flags.quiet ? undefined : (event) => this.log(`[${now()}] ${formatEvent(event)}`))

    try {
      const backend = createConfiguredBackend('generation', config, {bus: runtime.bus})
      const conversation = new Conversation()
      if (!flags.noTools) conversation.tools.register(weatherTool())
      conversation.addMessage('system', flags.system).addMessage('user', args.prompt)

      let response = await backend.converse(conversation)
      if (response.role === 'tool') {
        // Second turn turns the tool output into a natural-language answer.
        response = await backend.converse(conversation)
      }

      this.log(response.role === 'tool' ? renderToolResults(response) : response.content)
    } finally {
      await runtime.close()
    }
  }
}
