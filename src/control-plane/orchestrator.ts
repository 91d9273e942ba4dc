import { loadCatalog } from '../checks/loader.js';
import { collectCredentials } from '../session/credentials.js';
import { ConnectionError, connect } from '../session/oracle.js';
import { runChecks, isFailed } from '../runner/runner.js';
import { renderReport } from '../report/renderer.js';
import { writeReport } from '../report/writer.js';
import { writeRawOutput } from '../report/raw.js';
import { buildLedger, writeLedger } from '../ledger/ledger.js';
import type { Prompter } from '../session/credentials.js';
import type { AuditOptions, CheckResult, Credentials, DatabaseSession } from './types.js';

export interface AuditDeps {
  prompter: Prompter;
  connect: (credentials: Credentials) => Promise<DatabaseSession>;
  now: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_CONNECTION_FAILED = 1;

export async function runAudit(options: AuditOptions, deps: AuditDeps): Promise<number> {
  const catalog = await loadCatalog(options.catalogPath);

  console.log('[cisaudit] Oracle Database CIS Audit');
  const credentials = await collectCredentials(deps.prompter, {
    host: options.host,
    port: options.port,
    service: options.service,
    user: options.user,
  });

  console.log(
    `\n[cisaudit] id=${options.invocationId} target=${credentials.host}:${credentials.port}/${credentials.service} user=${credentials.user}`
  );
  console.log('[cisaudit] connecting to Oracle...');

  let session: DatabaseSession;
  try {
    session = await deps.connect(credentials);
  } catch (err) {
    if (err instanceof ConnectionError) {
      console.error(`[cisaudit] Connection failed: ${err.message}`);
      return EXIT_CONNECTION_FAILED;
    }
    throw err;
  }
  console.log(`[cisaudit] connected. running ${catalog.length} checks\n`);

  let results: CheckResult[];
  try {
    results = await runChecks(session, catalog);
  } finally {
    await session.close();
  }

  const generatedAt = deps.now();
  const reportPath = await writeReport(renderReport(results, generatedAt), options.out, generatedAt);

  if (options.raw) {
    const rawPath = await writeRawOutput(results, options.out, generatedAt);
    console.log(`[cisaudit] raw output saved to: ${rawPath}`);
  }

  if (options.ledger) {
    const ledger = buildLedger(options.invocationId, credentials, results, reportPath, generatedAt);
    const ledgerPath = await writeLedger(ledger, options.out);
    console.log(`[cisaudit] ledger saved to: ${ledgerPath}`);
  }

  const errored = results.filter(isFailed).length;
  console.log(
    `\n[cisaudit] done. ${results.length - errored} ok, ${errored} errored. Report saved to: ${reportPath}`
  );
  return EXIT_OK;
}

export function defaultDeps(prompter: Prompter): AuditDeps {
  return { prompter, connect, now: () => new Date() };
}
