import {mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join, resolve} from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {loadConfig, maskSecret} from '../src/config/load-config.js'
import {appConfigSchema} from '../src/config/schema.js'
import {createBackend, createConfiguredBackend} from '../src/providers/factory.js'
import {MockProvider} from '../src/providers/mock-provider.js'
import {OllamaProvider} from '../src/providers/ollama-provider.js'
import {OpenAIProvider} from '../src/providers/openai-provider.js'

let workDir: string

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'polyllm-config-'))
})

afterEach(async () => {
  await rm(workDir, {recursive: true, force: true})
})

describe('loadConfig', () => {
  it('fills defaults when no rc file exists', async () => {
    const home = resolve(workDir, 'home')
    const config = await loadConfig({searchFrom: workDir, env: {POLYLLM_HOME: home}})

    expect(config).toEqual({
      backend: {generation: 'ollama', embeddings: 'ollama'},
      ollama: {host: 'http://localhost:11434', genModel: 'llama3.2', embModel: 'nomic-embed-text'},
      openai: {genModel: 'gpt-4o-mini', embModel: 'text-embedding-3-small'},
      runtime: {requestTimeoutMs: 30_000},
      logging: {enabled: true, file: resolve(home, 'logs', 'polyllm.jsonl')},
      homeDir: home
    })
  })

  it('reads a YAML rc file and lets the environment override it', async () => {
    await writeFile(
      join(workDir, '.polyllmrc.yaml'),
      [
        'backend:',
        '  generation: openai',
        'openai:',
        '  apiKey: test-key',
        '  genModel: gpt-4o',
        'runtime:',
        '  requestTimeoutMs: 5000',
        ''
      ].join('\n'),
      'utf8'
    )

    const config = await loadConfig({
      searchFrom: workDir,
      env: {OPENAI_MODEL: 'gpt-4.1-mini', POLYLLM_LOG_ENABLED: 'off', OLLAMA_HOST: 'http://gpu-box:11434'}
    })

    expect(config.backend).toEqual({generation: 'openai', embeddings: 'ollama'})
    expect(config.openai).toEqual({apiKey: 'test-key', genModel: 'gpt-4.1-mini', embModel: 'text-embedding-3-small'})
    expect(config.ollama.host).toBe('http://gpu-box:11434')
    expect(config.runtime.requestTimeoutMs).toBe(5000)
    expect(config.logging.enabled).toBe(false)
  })

  it('ignores blank and unparsable environment values', async () => {
    const config = await loadConfig({
      searchFrom: workDir,
      env: {OPENAI_API_KEY: '   ', POLYLLM_REQUEST_TIMEOUT_MS: 'soon', POLYLLM_LOG_ENABLED: 'maybe'}
    })

    expect(config.openai.apiKey).toBeUndefined()
    expect(config.runtime.requestTimeoutMs).toBe(30_000)
    expect(config.logging.enabled).toBe(true)
  })

  it('rejects an unknown backend kind', async () => {
    await expect(
      loadConfig({searchFrom: workDir, env: {POLYLLM_GENERATION_BACKEND: 'telepathy'}})
    ).rejects.toThrow()
  })
})

describe('maskSecret', () => {
  it('hides short secrets entirely and keeps the ends of long ones', () => {
    expect(maskSecret(undefined)).toBeUndefined()
    expect(maskSecret('short')).toBe('****')
    expect(maskSecret('test-key-123456')).toBe('tes...3456')
  })
})

describe('createBackend', () => {
  const config = appConfigSchema.parse({homeDir: '/tmp/polyllm-test-home'})

  it('requires an API key for openai', () => {
    expect(() => createBackend('openai', 'generation', config)).toThrow(/^OPENAI_API_KEY is missing/)
  })

  it('picks the model for the purpose', () => {
    const withKey = appConfigSchema.parse({homeDir: '/tmp/polyllm-test-home', openai: {apiKey: 'test-key'}})

    const openai = createBackend('openai', 'embeddings', withKey)
    expect(openai).toBeInstanceOf(OpenAIProvider)
    expect(openai.model).toBe('text-embedding-3-small')

    const ollama = createConfiguredBackend('generation', config)
    expect(ollama).toBeInstanceOf(OllamaProvider)
    expect(ollama.model).toBe('llama3.2')
  })

  it('builds the offline mock backend', () => {
    const backend = createBackend('mock', 'generation', config)
    expect(backend).toBeInstanceOf(MockProvider)
    expect(backend.name).toBe('mock')
  })
})
