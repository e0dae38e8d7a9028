import {ToolNotFoundError} from '../core/errors.js'
import type {JsonObject} from '../core/json.js'

export type ToolExecutor = (args: JsonObject) => string | Promise<string>

export type Tool = {
  name: string
  description: string
  /** JSON schema describing the arguments object. */
  parameters: JsonObject
  execute: ToolExecutor
}

export type ToolDescriptor = {
  type: 'function'
  function: {
    name: string
    description: string
    parameters: JsonObject
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>()

  register(tool: Tool): void {
    this.tools.set(tool.name, tool)
  }

  unregister(name: string): boolean {
    return this.tools.delete(name)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  get size(): number {
    return this.tools.size
  }

  describe(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters
      }
    }))
  }

  async execute(name: string, args: JsonObject): Promise<string> {
    const tool = this.tools.get(name)
    if (!tool) throw new ToolNotFoundError(name)
    return tool.execute(args)
  }
}
