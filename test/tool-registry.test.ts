import {describe, expect, it, vi} from 'vitest'
import {ToolNotFoundError} from '../src/core/errors.js'
import {ToolRegistry} from '../src/tools/registry.js'
import {weatherReport, weatherTool} from '../src/tools/weather.js'

describe('ToolRegistry', () => {
  it('describes registered tools in the function schema shape', () => {
    const registry = new ToolRegistry()
    registry.register(weatherTool())

    expect(registry.describe()).toEqual([
      {
        type: 'function',
        function: {
          name: 'weather',
          description: 'Get weather report for a city',
          parameters: {
            type: 'object',
            properties: {
              city: {type: 'string', description: 'The city for which to get the weather report'}
            },
            required: ['city']
          }
        }
      }
    ])
  })

  it('describe is stable across repeated calls', () => {
    const registry = new ToolRegistry()
    registry.register(weatherTool())
    registry.register({name: 'echo', description: 'Echo input', parameters: {type: 'object'}, execute: () => 'ok'})

    expect(registry.describe()).toEqual(registry.describe())
    expect(registry.size).toBe(2)
  })

  it('last registration under a name wins', async () => {
    const registry = new ToolRegistry()
    registry.register({name: 'echo', description: 'first', parameters: {}, execute: () => 'first'})
    registry.register({name: 'echo', description: 'second', parameters: {}, execute: () => 'second'})

    expect(registry.size).toBe(1)
    expect(registry.describe()[0].function.description).toBe('second')
    await expect(registry.execute('echo', {})).resolves.toBe('second')
  })

  it('rejects unknown tools without running any registered tool', async () => {
    const registry = new ToolRegistry()
    const execute = vi.fn(() => 'should not run')
    registry.register({name: 'echo', description: 'Echo input', parameters: {}, execute})

    const error = await registry.execute('missing-tool', {}).catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(ToolNotFoundError)
    expect(error).toMatchObject({toolName: 'missing-tool', message: 'tool not found: missing-tool'})
    expect(execute).not.toHaveBeenCalled()
  })

  it('passes arguments through and awaits async executors', async () => {
    const registry = new ToolRegistry()
    registry.register({
      name: 'sum',
      description: 'Add two numbers',
      parameters: {type: 'object'},
      execute: async (args) => String(Number(args.a) + Number(args.b))
    })

    await expect(registry.execute('sum', {a: 2, b: 3})).resolves.toBe('5')
  })

  it('propagates executor errors unchanged', async () => {
    const registry = new ToolRegistry()
    registry.register(weatherTool())

    await expect(registry.execute('weather', {city: 'Atlantis'})).rejects.toThrow('city not found')
    await expect(registry.execute('weather', {city: 42})).rejects.toThrow('city must be a string')
  })

  it('unregisters tools', () => {
    const registry = new ToolRegistry()
    registry.register(weatherTool())

    expect(registry.unregister('weather')).toBe(true)
    expect(registry.has('weather')).toBe(false)
    expect(registry.unregister('weather')).toBe(false)
  })
})

describe('weatherReport', () => {
  it('returns the canned report for a known city', () => {
    expect(weatherReport({city: 'Stockholm'})).toBe('{"city":"Stockholm","temperature":"10°C","conditions":"Sunny"}')
  })

  it('does not treat inherited object keys as cities', () => {
    expect(() => weatherReport({city: 'constructor'})).toThrow('city not found')
    expect(() => weatherReport({city: 'toString'})).toThrow('city not found')
    expect(() => weatherReport({city: '__proto__'})).toThrow('city not found')
  })
})
