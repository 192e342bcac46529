#!/usr/bin/env node

/**
 * Poke MCP Server entry point
 * Supports multiple transport modes: STDIO, Streamable HTTP
 * Usage:
 *   poke-mcp-server --mode=stdio
 *   poke-mcp-server --mode=http --port=8000
 *   poke-mcp-server --mode=http --host=127.0.0.1 --port=8000
 */

import * as dotenv from 'dotenv';
import { PokeMCPServer, SERVER_INFO } from './server.js';
import { ExpressServer } from './core/express-server.js';
import { AppConfig, loadConfig } from './core/config.js';
import { CLIArgs } from './types/server.types.js';

export function parseArgs(argv: string[]): CLIArgs {
  const args: CLIArgs = {
    mode: 'stdio',
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('--mode=')) {
      const mode = arg.slice('--mode='.length);
      if (mode !== 'stdio' && mode !== 'http') {
        throw new Error(`Invalid mode "${mode}": expected stdio or http`);
      }
      args.mode = mode;
    } else if (arg.startsWith('--port=')) {
      const port = Number(arg.slice('--port='.length));
      if (!Number.isInteger(port) || port <= 0 || port >= 65536) {
        throw new Error(`Invalid port "${arg.slice('--port='.length)}"`);
      }
      args.port = port;
    } else if (arg.startsWith('--host=')) {
      args.host = arg.slice('--host='.length);
    }
  }

  return args;
}

function showHelp(): void {
  // stderr, so help never lands on an MCP client's stdout
  console.error(`
${SERVER_INFO.DISPLAY_NAME} v${SERVER_INFO.VERSION}

Usage:
  poke-mcp-server [options]

Options:
  --mode=<stdio|http>     Transport mode (default: stdio)
  --host=<host>           Host to bind (default: 0.0.0.0, HTTP mode only)
  --port=<port>           Port to listen (default: 8000, HTTP mode only)
  --help, -h              Show this help

Environment Variables:
  NODE_ENV                    development|production|test
  PORT, HOST                  HTTP listener (8000, 0.0.0.0)
  ALLOWED_ORIGINS             Comma separated CORS origins outside development
  HTTP_TIMEOUT_MS             Upstream request timeout (10000)
  NS_API_KEY                  Enables the ns_* tools
  NS_FUZZY_CUTOFF             Station fuzzy match threshold (0.6)
  NS_PREFERRED_CATEGORIES     Train categories ranked first (ICD,ICE,EST,THA)
  NS_STATION_CACHE_TTL_MS     Station directory cache lifetime, 0 disables (0)
  AIRLABS_API_KEY             Enables the airlabs_* tools
  GITHUB_PERSONAL_TOKEN       Together with OBSIDIAN_GITHUB_REPO enables the obsidian_* tools
  OBSIDIAN_GITHUB_REPO        Vault repository as owner/name
  OBSIDIAN_DAILY_NOTES_DIR    Folder holding YYYY-MM-DD.md daily notes
`);
}

/**
 * Command line host and port win over the environment
 */
export function applyArgs(config: AppConfig, args: CLIArgs): AppConfig {
  return {
    ...config,
    server: {
      ...config.server,
      host: args.host ?? config.server.host,
      port: args.port ?? config.server.port,
    },
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    return;
  }

  // stdout belongs to the MCP protocol in stdio mode; dotenv 16 stays silent unless debug is set
  dotenv.config();
  const config = applyArgs(loadConfig(), args);
  const mcpServer = new PokeMCPServer(config);
  mcpServer.getErrorHandler().logInfo(`${SERVER_INFO.DISPLAY_NAME} v${SERVER_INFO.VERSION} starting`, { mode: args.mode });

  if (args.mode === 'stdio') {
    await mcpServer.start();
  } else {
    const expressServer = new ExpressServer(config.server, mcpServer);
    await expressServer.start();
  }
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  main().catch((error: unknown) => {
    console.error('Failed to start server:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
