import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {Conversation} from '../core/conversation.js'
import {formatEvent} from '../core/format-event.js'
import {startRuntime} from '../core/runtime.js'
import {createConfiguredBackend} from '../providers/factory.js'

export default class Generate extends Command {
  static override description = 'Single-shot generation without tools'

  static override flags = {
    system: Flags.string({description: 'system prompt'}),
    maxTokens: Flags.integer({description: 'maximum tokens to generate'}),
    temperature: Flags.string({description: 'sampling temperature'}),
    verbose: Flags.boolean({description: 'show request logs'})
  }

  static override args = {
    prompt: Args.string({description: 'prompt text', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Generate)
    const config = await loadConfig()
    const runtime = startRuntime(config, flags.verbose ? (event) => this.log(formatEvent(event)) : undefined)

    try {
      const backend = createConfiguredBackend('generation', config, {bus: runtime.bus})
      const conversation = new Conversation()
      if (flags.system) conversation.addMessage('system', flags.system)
      conversation.addMessage('user', args.prompt)

      const temperature = flags.temperature === undefined ? undefined : Number.parseFloat(flags.temperature)
      if (temperature !== undefined && !Number.isFinite(temperature)) {
        this.error(`Invalid temperature: ${flags.temperature}`)
      }
      conversation.setParameters({maxTokens: flags.maxTokens, temperature})

      this.log(await backend.generate(conversation))
    } finally {
      await runtime.close()
    }
  }
}
