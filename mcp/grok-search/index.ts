#!/usr/bin/env node

/**
 * Grok Search MCP Server entry point
 *
 * Runs over stdio. stdout carries the MCP protocol, so every log line goes to
 * stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createGrokSearcher, openConnection } from './clients/grok.js';
import { loadSettings, toSearchOptions } from './config.js';
import { normalizeCredential, normalizeEndpoint } from './normalize.js';
import { createServer } from './server.js';

async function main() {
  const { settings, errors } = loadSettings();
  for (const error of errors) {
    console.error(`[grok-search] Config: ${error}`);
  }
  if (!normalizeEndpoint(settings.baseUrl)) {
    console.error('[grok-search] GROK_BASE_URL is not set; searches will fail until it is');
  }
  if (!normalizeCredential(settings.apiKey)) {
    console.error('[grok-search] GROK_API_KEY is not set; searches will fail until it is');
  }

  const connection = openConnection();
  const server = createServer({
    search: createGrokSearcher({
      endpoint: settings.baseUrl,
      credential: settings.apiKey,
      options: { ...toSearchOptions(settings), connection },
    }),
    formatOptions: {
      showSources: settings.showSources,
      maxSources: settings.maxSources,
    },
  });

  const shutdown = async () => {
    await connection.close();
    await server.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown().catch((error: unknown) => {
        console.error('[grok-search] Shutdown failed:', error);
        process.exit(1);
      });
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`[grok-search] MCP server started (model: ${settings.model})`);
}

main().catch((error: unknown) => {
  console.error('Failed to start Grok Search MCP Server:', error);
  process.exit(1);
});
