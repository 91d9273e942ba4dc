import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  CheckDescriptor,
  CheckResult,
  DatabaseSession,
  QueryOutcome,
} from '../control-plane/types.js';

/** In-process stand-in for an Oracle connection, answering by query text. */
export class FakeSession implements DatabaseSession {
  readonly executed: string[] = [];
  closeCalls = 0;

  constructor(private readonly responses: Map<string, QueryOutcome> = new Map()) {}

  async execute(query: string): Promise<QueryOutcome> {
    this.executed.push(query);
    return this.responses.get(query) ?? { ok: true, rows: [] };
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export function makeCheck(overrides: Partial<CheckDescriptor> = {}): CheckDescriptor {
  return {
    id: '1.1',
    description: 'Ensure auditing is enabled',
    query: 'SELECT 1 FROM DUAL',
    risk: 'High',
    fixType: 'Quick',
    remediation: 'Enable auditing',
    ...overrides,
  };
}

export function makeResult(overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    id: '1.1',
    description: 'Ensure auditing is enabled',
    risk: 'High',
    fixType: 'Quick',
    remediation: 'Enable auditing',
    output: [[1]],
    durationMs: 3,
    ...overrides,
  };
}

const tempDirs: string[] = [];

export async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'cisaudit-'));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
}
