import { CheckTimer } from '../utils/timer.js';
import type {
  CheckDescriptor,
  CheckResult,
  DatabaseSession,
  OutputEntry,
} from '../control-plane/types.js';

export const ERROR_PREFIX = 'Error: ';

/**
 * Runs every check in catalog order against one session. A failed query
 * turns into a single error line for that check; the run carries on.
 */
export async function runChecks(
  session: DatabaseSession,
  catalog: readonly CheckDescriptor[]
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const timer = new CheckTimer();

  for (const check of catalog) {
    console.log(`  [run]  ${check.id} ${check.description}...`);
    timer.begin();

    const outcome = await session.execute(check.query);
    const durationMs = timer.elapsed();

    let output: readonly OutputEntry[];
    if (outcome.ok) {
      output = outcome.rows;
      console.log(`  [pass] ${check.id} (${durationMs}ms, ${outcome.rows.length} rows)`);
    } else {
      output = [`${ERROR_PREFIX}${outcome.error}`];
      console.error(`  [FAIL] ${check.id}: ${outcome.error}`);
    }

    results.push({
      id: check.id,
      description: check.description,
      risk: check.risk,
      fixType: check.fixType,
      remediation: check.remediation,
      output,
      durationMs,
    });
  }

  return results;
}

export function isFailed(result: CheckResult): boolean {
  if (result.output.length !== 1) return false;
  const first = result.output[0];
  return typeof first === 'string' && first.startsWith(ERROR_PREFIX);
}
