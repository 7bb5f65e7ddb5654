#!/usr/bin/env node

import { createMemoryClient } from '../api/client.js';
import { runCli } from './commands.js';

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    createClient: (options) => createMemoryClient(options),
  });
  process.exit(code);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
