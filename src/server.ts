import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import type { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { ToolRegistry } from './tools/base.tool.js'
import type { MCPTool } from './tools/base.tool.js'

export class MCPServer {
  private server: Server
  private toolRegistry = new ToolRegistry()

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      {
        capabilities: {
          tools: {},
        },
      },
    )
    this.setupHandlers()
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return this.getTools()
    })

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return await this.handleToolCall(request)
    })
  }

  getTools() {
    return {
      tools: this.toolRegistry.getAll().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    }
  }

  async handleToolCall(request: {
    params: { name: string; arguments?: unknown }
  }) {
    const toolName = request.params.name
    const tool = this.toolRegistry.get(toolName)

    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`)
    }

    try {
      // The stored handler validates arguments against the tool's schema
      return await tool.handler(request.params.arguments ?? {})
    } catch (err) {
      if (err instanceof z.ZodError) {
        throw new McpError(
          ErrorCode.InvalidParams,
          `Invalid arguments: ${err.message}`,
        )
      }
      throw err
    }
  }

  registerTool<T extends object>(tool: MCPTool<T>) {
    this.toolRegistry.register(tool)
  }

  async connect(transport: StdioServerTransport) {
    await this.server.connect(transport)
  }
}
