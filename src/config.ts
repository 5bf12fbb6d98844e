// Runtime config - .env, environment variables, then CLI flags on top

import { parseArgs } from 'util';
import { ConfigError } from './errors';
import type { OutputFormat } from './types';

export interface StreamConfig {
  symbol: string;
  sandbox: boolean;
  format: OutputFormat;
  statusPort: number | null;
  validateSymbol: boolean;
  wsBaseUrl?: string;
  restBaseUrl?: string;
}

export const USAGE = `Usage: gemini-bbo-stream --symbol <symbol> [options]

Options:
  --symbol <symbol>      Gemini symbol to stream, e.g. btcusd (env GEMINI_SYMBOL)
  --sandbox              Use the Gemini sandbox (env GEMINI_SANDBOX=true)
  --format <text|json>   Output format (env OUTPUT_FORMAT, default text)
  --status-port <port>   Serve /health and /api/bbo on this port (env STATUS_PORT)
  --no-validate          Skip the symbol check against /v1/symbols
  -h, --help             Show this help`;

/**
 * Normalize a symbol the way Gemini lists them: lowercase, no separators
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toLowerCase().replace(/[/-]/g, '');
}

function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') return value;
  throw new ConfigError(`Invalid format "${value}" - expected text or json`);
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid status port "${value}"`);
  }
  return port;
}

function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

const OPTIONS = {
  symbol: { type: 'string' },
  sandbox: { type: 'boolean' },
  format: { type: 'string' },
  'status-port': { type: 'string' },
  'no-validate': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Build the stream config from argv and the environment
 *
 * Returns null when --help was asked for. Call dotenv.config() before this
 * so .env values show up in env.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): StreamConfig | null {
  const { values } = parseArgv(argv);

  if (values.help) return null;

  const rawSymbol = values.symbol ?? env.GEMINI_SYMBOL;
  if (!rawSymbol || !normalizeSymbol(rawSymbol)) {
    throw new ConfigError('No symbol given - pass --symbol or set GEMINI_SYMBOL');
  }

  const rawPort = values['status-port'] ?? env.STATUS_PORT;

  return {
    symbol: normalizeSymbol(rawSymbol),
    sandbox: values.sandbox ?? parseFlag(env.GEMINI_SANDBOX),
    format: parseFormat(values.format ?? env.OUTPUT_FORMAT ?? 'text'),
    statusPort: rawPort ? parsePort(rawPort) : null,
    validateSymbol: !values['no-validate'],
    wsBaseUrl: env.GEMINI_WS_URL || undefined,
    restBaseUrl: env.GEMINI_API_URL || undefined,
  };
}
