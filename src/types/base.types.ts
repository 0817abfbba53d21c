import type { TextContent, Tool } from '@modelcontextprotocol/sdk/types.js'

export type ToolContent = TextContent

export interface StoredMCPTool {
  name: string
  description: string
  inputSchema: Tool['inputSchema']
  // Validates raw arguments with the tool's argsSchema before calling it
  handler: (args: unknown) => Promise<{ content: ToolContent[] }>
}
