import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getPolyllmHome} from '../config/paths.js'

const RC_TEMPLATE = `# polyllm configuration; environment variables override these values.
backend:
  generation: ollama
  embeddings: ollama
ollama:
  host: http://localhost:11434
  genModel: llama3.2
  embModel: nomic-embed-text
openai:
  genModel: gpt-4o-mini
  embModel: text-embedding-3-small
runtime:
  requestTimeoutMs: 30000
logging:
  enabled: true
`

const ENV_TEMPLATE = 'OPENAI_API_KEY=\nOPENAI_BASE_URL=\nOLLAMA_HOST=\nPOLYLLM_GENERATION_BACKEND=\nPOLYLLM_EMBEDDINGS_BACKEND=\n'

export default class Init extends Command {
  static override description = 'Create a project rc file and the global polyllm home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing files'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const homeDir = getPolyllmHome()
    const configPath = resolve(process.cwd(), '.polyllmrc.yaml')
    const envExamplePath = resolve(homeDir, '.env.example')
    const flag = flags.force ? 'w' : 'wx'

    await mkdir(homeDir, {recursive: true})
    await writeFile(configPath, RC_TEMPLATE, {flag})
    await writeFile(envExamplePath, ENV_TEMPLATE, {flag})

    this.log(`Created ${configPath}`)
    this.log(`Created ${envExamplePath}`)
  }
}
