import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {startRuntime} from '../core/runtime.js'
import {createConfiguredBackend} from '../providers/factory.js'

export default class Embed extends Command {
  static override description = 'Embed text with the embeddings backend'

  static override flags = {
    json: Flags.boolean({description: 'print the full vector as JSON'})
  }

  static override args = {
    text: Args.string({description: 'text to embed', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Embed)
    const config = await loadConfig()
    const runtime = startRuntime(config)

    try {
      const backend = createConfiguredBackend('embeddings', config, {bus: runtime.bus})
      const vector = await backend.embed(args.text)
      if (flags.json) {
        this.log(JSON.stringify(vector))
        return
      }

      const preview = vector.slice(0, 5).map((value) => value.toFixed(4)).join(', ')
      this.log(`backend=${backend.name} model=${backend.model} dimensions=${vector.length}`)
      this.log(`[${preview}${vector.length > 5 ? ', ...' : ''}]`)
    } finally {
      await runtime.close()
    }
  }
}
