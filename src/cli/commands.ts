/**
 * memrelay command line front end
 *
 * Usage:
 *   memrelay read<8|16|32|64> <address> [options]
 *   memrelay write<8|16|32|64> <address> <value> [options]
 */

import type { MemoryClient, MemoryClientOptions } from '../api/client.js';
import { MemoryClientError } from '../api/errors.js';
import { isSupportedWidth, type Width } from '../protocol/opcodes.js';

export interface CLIArgs {
  _: string[];
  socket?: string;
  host?: string;
  port?: string;
  timeout?: string;
  json?: boolean;
  help?: boolean;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  createClient: (options: MemoryClientOptions) => Pick<MemoryClient, 'read' | 'write' | 'close'>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const VALUE_FLAGS = new Set(['socket', 'host', 'port', 'timeout']);
const BOOLEAN_FLAGS = new Set(['json', 'help']);

export const HELP_TEXT = `
memrelay - read and write emulated memory through the relay socket

Usage:
  memrelay read<8|16|32|64> <address>            Read a value
  memrelay write<8|16|32|64> <address> <value>   Write a value

Numbers accept decimal or 0x-prefixed hex.

Options:
  --socket <path>     Unix socket path of the relay
  --host <host>       TCP host (with --port, default 127.0.0.1)
  --port <port>       TCP port of the relay
  --timeout <ms>      Fail a request after this many milliseconds
  --json              Output as JSON
  --help              Show this help
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const key = arg.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      if (key === 'json') {
        result.json = true;
      } else {
        result.help = true;
      }
      continue;
    }
    if (!VALUE_FLAGS.has(key)) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    const nextArg = args[i + 1];
    if (nextArg === undefined || nextArg.startsWith('--')) {
      throw new UsageError(`Option ${arg} needs a value`);
    }
    i++;
    if (key === 'socket') {
      result.socket = nextArg;
    } else if (key === 'host') {
      result.host = nextArg;
    } else if (key === 'port') {
      result.port = nextArg;
    } else {
      result.timeout = nextArg;
    }
  }

  return result;
}

/**
 * Parse a decimal or 0x-prefixed hex integer, optionally negative.
 */
export function parseInteger(text: string): bigint {
  const negative = text.startsWith('-');
  const digits = negative ? text.slice(1) : text;
  if (!/^(0[xX][0-9a-fA-F]+|[0-9]+)$/.test(digits)) {
    throw new UsageError(`Not an integer: ${text}`);
  }
  const magnitude = BigInt(digits);
  return negative ? -magnitude : magnitude;
}

function toSafeNumber(value: bigint, label: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new UsageError(`${label} out of range: ${value}`);
  }
  return Number(value);
}

export function parseCommand(command: string): { kind: 'read' | 'write'; width: Width } {
  const match = /^(read|write)(8|16|32|64)$/.exec(command);
  if (!match) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  const kind = match[1] === 'read' ? 'read' : 'write';
  const width = Number(match[2]) / 8;
  if (!isSupportedWidth(width)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  return { kind, width };
}

export function clientOptionsFrom(args: CLIArgs): MemoryClientOptions {
  const options: MemoryClientOptions = {};
  if (args.socket !== undefined) {
    options.endpoint = { kind: 'unix', path: args.socket };
  } else if (args.port !== undefined) {
    options.endpoint = {
      kind: 'tcp',
      host: args.host ?? '127.0.0.1',
      port: toSafeNumber(parseInteger(args.port), 'Port'),
    };
  }
  if (args.timeout !== undefined) {
    options.timeoutMs = toSafeNumber(parseInteger(args.timeout), 'Timeout');
  }
  return options;
}

function formatHex(value: number | bigint, width: Width): string {
  const unsigned = typeof value === 'bigint' ? value : BigInt(value);
  return `0x${unsigned.toString(16).padStart(width * 2, '0')}`;
}

/**
 * Run one CLI invocation and return its exit code.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let args: CLIArgs;
  let command: { kind: 'read' | 'write'; width: Width };
  let address: number;
  let value: number | bigint | undefined;
  let options: MemoryClientOptions;

  try {
    args = parseArgs(argv);
    if (args.help || args._.length === 0) {
      io.out(HELP_TEXT);
      return args.help ? EXIT_OK : EXIT_USAGE;
    }

    const [name, addressText, valueText] = args._;
    command = parseCommand(name);
    address = toSafeNumber(parseInteger(addressText ?? ''), 'Address');

    if (command.kind === 'write') {
      if (valueText === undefined) {
        throw new UsageError(`${name} needs a value`);
      }
      const parsed = parseInteger(valueText);
      value = command.width === 8 ? parsed : toSafeNumber(parsed, 'Value');
    }
    options = clientOptionsFrom(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`Error: ${error.message}`);
      io.err('Run with --help for usage.');
      return EXIT_USAGE;
    }
    throw error;
  }

  let client: Pick<MemoryClient, 'read' | 'write' | 'close'> | undefined;
  try {
    client = io.createClient(options);
    if (command.kind === 'read') {
      const result = await client.read(address, command.width);
      if (args.json) {
        io.out(
          JSON.stringify({
            address: formatHex(address, 4),
            width: command.width,
            value: result.toString(),
          })
        );
      } else {
        io.out(`${result.toString()} (${formatHex(result, command.width)})`);
      }
    } else {
      await client.write(address, value ?? 0, command.width);
      if (args.json) {
        io.out(JSON.stringify({ address: formatHex(address, 4), width: command.width, written: true }));
      } else {
        io.out('OK');
      }
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof MemoryClientError) {
      if (args.json) {
        io.err(JSON.stringify(error.toObject()));
      } else {
        io.err(`Error [${error.code}]: ${error.message}`);
      }
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    client?.close();
  }
}
