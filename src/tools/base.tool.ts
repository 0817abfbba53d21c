import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { z } from 'zod'

import type { StoredMCPTool, ToolContent } from '../types/base.types.js'

export interface MCPTool<Args extends object = object> {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  argsSchema: z.ZodSchema<Args, z.ZodTypeDef, object>
  handler: (args: Args) => Promise<{ content: ToolContent[] }>
}

export abstract class BaseTool<Args extends object> implements MCPTool<Args> {
  abstract name: string
  abstract description: string
  abstract inputSchema: Tool['inputSchema']
  abstract get argsSchema(): z.ZodType<Args, z.ZodTypeDef, object>
  protected abstract toolHandler(args: Args): Promise<{ content: ToolContent[] }>

  async handler(args: Args): Promise<{ content: ToolContent[] }> {
    try {
      return await this.toolHandler(args)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err)
      return this.createErrorResponse(`Unexpected error: ${errorMessage}`)
    }
  }

  protected createErrorResponse(message: string): { content: ToolContent[] } {
    return {
      content: [
        {
          type: 'text' as const,
          text: message,
        },
      ],
    }
  }

  protected createSuccessResponse(text: string): { content: ToolContent[] } {
    return {
      content: [
        {
          type: 'text' as const,
          text,
        },
      ],
    }
  }
}

export class ToolRegistry {
  private tools = new Map<string, StoredMCPTool>()

  register<T extends object>(tool: MCPTool<T>): void {
    // Store as type-erased version
    const storedTool: StoredMCPTool = {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      handler: (args: unknown) => tool.handler(tool.argsSchema.parse(args)),
    }
    this.tools.set(tool.name, storedTool)
  }

  getAll(): StoredMCPTool[] {
    return Array.from(this.tools.values())
  }

  get(name: string): StoredMCPTool | undefined {
    return this.tools.get(name)
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }
}
