import { GENERATE_TOKEN_BYTES, generateToken, handleTokensRequest, isAppError } from '@tokensum/core';
import { loadConfig } from './config.js';
import { generateOpenApiSpec } from './openapi.js';
import { startServer } from './server.js';

export interface CliIO {
  out: (message: string) => void;
  err: (message: string) => void;
  env: Record<string, string | undefined>;
}

const defaultIO: CliIO = {
  out: (message) => console.log(message),
  err: (message) => console.error(message),
  env: process.env,
};

const HELP = `
tokensum — pseudorandom tokens and SHA-256 checksums

Usage:
  tokensum start            Start the HTTP server
  tokensum generate         Print a single 32-character token
  tokensum tokens <text>    Print the checksum of <text> and one token per word
  tokensum openapi          Print the OpenAPI document as JSON

Options:
  --host=<addr>             Bind address (default: 127.0.0.1, or HOST env)
  --port=<n>                Port (default: 8000, or PORT env)
  --help                    Show this help message

Environment:
  HOST, PORT, BASE_URL, WELCOME_MESSAGE, ACCESS_LOG (also read from .env)

Examples:
  tokensum start --port=3000
  tokensum tokens hello world
  curl -X POST localhost:8000/tokens -H 'Content-Type: application/json' -d '{"text":"hello world"}'
`;

/**
 * Run one CLI command. Resolves with the process exit code; `start`
 * resolves 0 once the server is listening and leaves it running.
 */
export async function runCli(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  const command = args[0] || 'start';
  const rest = args.slice(1);

  try {
    switch (command) {
      case 'start':
        await cmdStart(rest, io);
        return 0;
      case 'generate':
        io.out(generateToken(GENERATE_TOKEN_BYTES));
        return 0;
      case 'tokens':
        io.out(JSON.stringify(handleTokensRequest({ text: rest.join(' ') }), null, 2));
        return 0;
      case 'openapi': {
        const config = loadConfig(io.env, rest);
        io.out(JSON.stringify(generateOpenApiSpec(config.baseUrl), null, 2));
        return 0;
      }
      case 'help':
      case '--help':
      case '-h':
        io.out(HELP);
        return 0;
      default:
        io.err(`Unknown command: ${command}`);
        io.err(HELP);
        return 1;
    }
  } catch (err) {
    if (!isAppError(err, 'CONFIG_INVALID')) throw err;
    io.err('[tokensum] Invalid configuration:');
    for (const issue of err.issues) {
      io.err(`  - ${issue}`);
    }
    return 1;
  }
}

async function cmdStart(args: readonly string[], io: CliIO) {
  const config = loadConfig(io.env, args);
  const server = await startServer(config);

  const shutdown = (signal: string) => {
    io.out(`[tokensum] ${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        io.err(String(err));
        process.exit(1);
      }
      process.exit(0);
    });
    server.closeIdleConnections();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}
