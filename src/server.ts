#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { logger } from './logger.js';
import { loadConfig } from './config/loader.js';
import { createSamtools } from './samtools.js';
import {
  USAGE_TOOL,
  callCommandTool,
  callUsageTool,
  commandInputShape,
  listCommandTools,
  usageInputShape,
} from './mcp/tools.js';

async function main(): Promise<void> {
  logger.info('Starting samtools-dispatch MCP server');

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile, binary: config.samtools.binary }, 'Configuration loaded');

  // ── Phase 2: Build command registry ───────────────────────────
  const registry = createSamtools({ config });

  // ── Phase 3: Create MCP server and register one tool per command ──
  const server = new McpServer({ name: 'samtools-dispatch', version: '0.1.0' });

  for (const tool of listCommandTools(registry)) {
    server.registerTool(
      tool.name,
      { title: tool.name, description: tool.description, inputSchema: commandInputShape },
      async (input) => callCommandTool(registry, tool.command, input),
    );
  }

  server.registerTool(
    USAGE_TOOL,
    {
      title: USAGE_TOOL,
      description: 'Return the usage text samtools prints for a subcommand.',
      inputSchema: usageInputShape,
      annotations: { readOnlyHint: true },
    },
    async (input) => callUsageTool(registry, input),
  );

  // ── Phase 4: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size + 1 }, 'samtools-dispatch server running on stdio');
}

main().catch((err) => {
  logger.fatal({ error: err }, 'Fatal startup error');
  process.exit(1);
});
