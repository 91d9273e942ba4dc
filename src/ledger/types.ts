import type { Target } from '../control-plane/types.js';

export type CheckStatus = 'ok' | 'error';

export interface CheckLedgerEntry {
  id: string;
  status: CheckStatus;
  rowCount: number;
  durationMs: number;
  error?: string;
}

export interface RunLedger {
  invocationId: string;
  timestamp: string;
  target: Target;
  catalogSize: number;
  checks: CheckLedgerEntry[];
  succeeded: number;
  errored: number;
  reportPath: string;
}
