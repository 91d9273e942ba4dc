import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ERROR_PREFIX, isFailed } from '../runner/runner.js';
import type { CheckResult, Target } from '../control-plane/types.js';
import type { CheckLedgerEntry, RunLedger } from './types.js';

function toEntry(result: CheckResult): CheckLedgerEntry {
  if (isFailed(result)) {
    const [line] = result.output;
    return {
      id: result.id,
      status: 'error',
      rowCount: 0,
      durationMs: result.durationMs,
      error: typeof line === 'string' ? line.slice(ERROR_PREFIX.length) : undefined,
    };
  }
  return {
    id: result.id,
    status: 'ok',
    rowCount: result.output.length,
    durationMs: result.durationMs,
  };
}

export function buildLedger(
  invocationId: string,
  target: Target,
  results: readonly CheckResult[],
  reportPath: string,
  generatedAt: Date
): RunLedger {
  const checks = results.map(toEntry);
  const errored = checks.filter((c) => c.status === 'error').length;

  return {
    invocationId,
    timestamp: generatedAt.toISOString(),
    target: { host: target.host, port: target.port, service: target.service, user: target.user },
    catalogSize: results.length,
    checks,
    succeeded: checks.length - errored,
    errored,
    reportPath,
  };
}

export async function writeLedger(ledger: RunLedger, outDir: string): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const path = join(outDir, `${ledger.invocationId}-ledger.json`);
  await writeFile(path, JSON.stringify(ledger, null, 2));
  return path;
}
