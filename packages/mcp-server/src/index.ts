#!/usr/bin/env node
/**
 * cadlink MCP Server
 *
 * Exposes the Fusion 360 tool catalog to LLM agents. Calls run live through
 * the executor bridge or come back as standalone scripts.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, loadConfig } from '@cadlink/protocol';
import { LiveConnection } from './live-connection.js';
import { ScriptSession } from './session.js';
import { ToolRouter } from './router.js';
import { registerTools } from './tools.js';
import { loadExamples, registerResources } from './resources.js';

const config = loadConfig();
const logger = createLogger('cadlink', { level: config.logLevel });

const server = new McpServer({
  name: 'cadlink',
  version: '0.1.0',
});

const connection = new LiveConnection({
  host: config.host,
  port: config.port,
  connectTimeoutMs: config.connectTimeoutMs,
  logger: logger.child('bridge'),
});
const session = new ScriptSession();
const router = new ToolRouter({
  mode: config.mode,
  connection,
  session,
  timeoutMs: config.timeoutMs,
  logger: logger.child('router'),
});

registerTools(server, { router, session, logger: logger.child('tools') });
registerResources(server, { mode: config.mode, connection, session }, loadExamples());

const shutdown = () => {
  connection.close();
  process.exit(0);
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`cadlink ready (mode: ${config.mode}, executor: ${config.host}:${config.port})`);
