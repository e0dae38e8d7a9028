import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig, maskSecret} from '../config/load-config.js'
import {getGlobalEnvPath} from '../config/paths.js'
import type {AppConfig, BackendKind} from '../config/schema.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  polyllmHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  env: {
    hasOpenAIKey: boolean
    hasOpenAIBaseURL: boolean
    hasOllamaHost: boolean
  }
  backends: {
    generation: string
    embeddings: string
  }
  problems: string[]
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const config = await loadConfig()

    const problems: string[] = []
    const usesOpenAI = config.backend.generation === 'openai' || config.backend.embeddings === 'openai'
    if (usesOpenAI && !config.openai.apiKey) {
      problems.push('openai backend selected but OPENAI_API_KEY is not set')
    }

    const localEnvPath = `${process.cwd()}/.env`
    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      polyllmHome: config.homeDir,
      globalEnvPath: getGlobalEnvPath(config.homeDir),
      globalEnvExists: existsSync(getGlobalEnvPath(config.homeDir)),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      env: {
        hasOpenAIKey: Boolean(process.env.OPENAI_API_KEY),
        hasOpenAIBaseURL: Boolean(process.env.OPENAI_BASE_URL),
        hasOllamaHost: Boolean(process.env.OLLAMA_HOST)
      },
      backends: {
        generation: config.backend.generation,
        embeddings: config.backend.embeddings
      },
      problems
    }

    if (flags.json) {
      this.log(JSON.stringify({...report, openaiKey: maskSecret(config.openai.apiKey)}, null, 2))
      return
    }

    this.log(`polyllm version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`polyllm home: ${report.polyllmHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(
      `env flags: OPENAI_API_KEY=${report.env.hasOpenAIKey} OPENAI_BASE_URL=${report.env.hasOpenAIBaseURL} OLLAMA_HOST=${report.env.hasOllamaHost}`
    )
    this.log(`generation backend: ${report.backends.generation} (${modelFor(config.backend.generation, 'gen', config)})`)
    this.log(`embeddings backend: ${report.backends.embeddings} (${modelFor(config.backend.embeddings, 'emb', config)})`)
    this.log(`log file: ${config.logging.enabled ? config.logging.file : '(disabled)'}`)
    if (problems.length === 0) {
      this.log('no problems found')
      return
    }
    for (const problem of problems) this.warn(problem)
  }
}

function modelFor(kind: BackendKind, purpose: 'gen' | 'emb', config: AppConfig): string {
  if (kind === 'mock') return 'mock'
  const section = config[kind]
  return purpose === 'gen' ? section.genModel : section.embModel
}
