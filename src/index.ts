#!/usr/bin/env node
import 'dotenv/config';
import { buildCli } from './cli/commands.js';

const program = buildCli();
program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`cisaudit: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
