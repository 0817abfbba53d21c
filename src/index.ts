#!/usr/bin/env node
import dotenv from 'dotenv'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import { MCPServer } from './server.js'
import { getApiConfig } from './helpers/config.helper.js'
import { HmdaApiService } from './services/hmda-api.service.js'

import { GetAggregationsTool } from './tools/get-aggregations.tool.js'
import { GetInstitutionsTool } from './tools/get-institutions.tool.js'
import { GetLoansTool } from './tools/get-loans.tool.js'

dotenv.config()

const config = getApiConfig()

// stdout carries the MCP transport
if (!config.debugLogs) {
  console.log = () => {}
  console.info = () => {}
  console.warn = () => {}
}

// MCP Server Setup
async function main() {
  const mcpServer = new MCPServer('hmda-api', '0.1.0')
  const service = new HmdaApiService(config.baseUrl)

  // Register tools
  mcpServer.registerTool(new GetAggregationsTool(service))
  mcpServer.registerTool(new GetInstitutionsTool(service))
  mcpServer.registerTool(new GetLoansTool(service))

  const transport = new StdioServerTransport()
  await mcpServer.connect(transport)
}

main().catch(console.error)
