import {Command} from '@oclif/core'
import {loadConfig, maskSecret} from '../config/load-config.js'

export default class Config extends Command {
  static override description = 'Print resolved config'

  public async run(): Promise<void> {
    const config = await loadConfig()
    const printable = {...config, openai: {...config.openai, apiKey: maskSecret(config.openai.apiKey)}}
    this.log(JSON.stringify(printable, null, 2))
  }
}
