import { Command } from 'commander';
import { generateInvocationId } from '../utils/id.js';
import { loadConfig } from '../config.js';
import { loadCatalog } from '../checks/loader.js';
import { defaultDeps, runAudit } from '../control-plane/orchestrator.js';
import { terminalPrompter } from './prompt.js';
import type { AuditOptions } from '../control-plane/types.js';

interface AuditFlags {
  host?: string;
  port?: string;
  service?: string;
  user?: string;
  out: string;
  catalog?: string;
  raw?: boolean;
  ledger?: boolean;
  invocationId?: string;
}

export function buildCli(): Command {
  const config = loadConfig();
  const program = new Command();

  program
    .name('cisaudit')
    .description(
      'Read-only CIS benchmark audit for Oracle databases.\n\n' +
      'Runs a fixed list of catalog-view queries and writes the findings to a static HTML report.'
    )
    .version('0.1.0');

  program
    .command('audit')
    .description('Connect, run every check and write the HTML report')
    .option('--host <string>', 'Oracle host (prompted when omitted)', config.host)
    .option('--port <string>', 'Listener port (prompted when omitted)', config.port)
    .option('--service <string>', 'Service name or SID (prompted when omitted)', config.service)
    .option('--user <string>', 'Read-only username (prompted when omitted)', config.user)
    .option('--out <path>', 'Report directory', config.reportDir)
    .option('--catalog <path>', 'JSON file with the checks to run instead of the built-in list')
    .option('--raw', 'Also write the plain-text output of every check')
    .option('--ledger', 'Also write a JSON ledger of the run')
    .option('--invocation-id <string>', 'Explicit invocation ID')
    .action(async (opts: AuditFlags) => {
      const options: AuditOptions = {
        host: opts.host,
        port: opts.port,
        service: opts.service,
        user: opts.user,
        out: opts.out,
        catalogPath: opts.catalog,
        raw: opts.raw === true,
        ledger: opts.ledger === true,
        invocationId: opts.invocationId || generateInvocationId(),
      };

      process.exitCode = await runAudit(options, defaultDeps(terminalPrompter));
    });

  program
    .command('checks')
    .description('List the checks that an audit would run, without connecting')
    .option('--catalog <path>', 'JSON file with the checks to list')
    .action(async (opts: { catalog?: string }) => {
      const catalog = await loadCatalog(opts.catalog);
      for (const check of catalog) {
        console.log(`${check.id}\t${check.risk}\t${check.fixType}\t${check.description}`);
      }
    });

  return program;
}
