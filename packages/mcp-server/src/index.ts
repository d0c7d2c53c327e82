#!/usr/bin/env node
/**
 * feedspeed MCP Server
 *
 * Exposes the speeds and feeds calculator as callable tools for LLM agents.
 * Runs over stdio transport. The machine setup is restored from the
 * settings file at start and written back when the session closes.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';
import * as registry from './registry.js';
import { loadSettings, saveSettings, settingsPath } from './settings.js';
import { log } from './log.js';

const settingsFile = settingsPath();
registry.setMachineSetup(loadSettings(settingsFile).machine);

const server = new McpServer({
  name: 'feedspeed',
  version: '0.1.0',
});

registerTools(server, { settingsPath: settingsFile });

let persisted = false;
function persist(): void {
  if (persisted) return;
  persisted = true;
  try {
    saveSettings(settingsFile, { version: 1, machine: registry.getMachineSetup() });
  } catch (err) {
    log.error({ path: settingsFile, err }, 'Unable to save settings');
  }
}

server.server.onclose = persist;
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    persist();
    process.exit(0);
  });
}

const transport = new StdioServerTransport();
await server.connect(transport);
log.info({ settings: settingsFile }, 'Server ready on stdio');
