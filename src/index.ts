#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall } from './tools/index.js';
import { getToolModeFromEnv } from './config.js';
import { SERVER_NAME } from './constants.js';
import { getPackageVersion } from './meta.js';
import { runParseCli } from './cli/parse.js';

const TOOL_MODE = getToolModeFromEnv();

const server = new Server(
  {
    name: SERVER_NAME,
    version: getPackageVersion(),
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: getTools(TOOL_MODE) };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
});

async function main() {
  if (process.argv[2] === 'parse') {
    await runParseCli(process.argv.slice(3));
    return;
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[tc-parse-mcp] Server started');
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    console.error('[tc-parse-mcp] Fatal:', err);
    process.exitCode = 1;
  });
}
