export type RiskLevel = 'Low' | 'Medium' | 'High';
export type FixType = 'Quick' | 'Planned' | 'Involved';

export interface CheckDescriptor {
  readonly id: string;
  readonly description: string;
  readonly query: string;
  readonly risk: RiskLevel;
  readonly fixType: FixType;
  readonly remediation: string;
}

export type Row = readonly unknown[];

/** One line of a check's output: a row tuple, or the error text of a failed query. */
export type OutputEntry = Row | string;

export type QueryOutcome =
  | { ok: true; rows: Row[] }
  | { ok: false; error: string };

export interface CheckResult {
  readonly id: string;
  readonly description: string;
  readonly risk: RiskLevel;
  readonly fixType: FixType;
  readonly remediation: string;
  readonly output: readonly OutputEntry[];
  readonly durationMs: number;
}

export interface Credentials {
  host: string;
  port: string;
  service: string;
  user: string;
  password: string;
}

export type Target = Omit<Credentials, 'password'>;

export interface DatabaseSession {
  execute(query: string): Promise<QueryOutcome>;
  close(): Promise<void>;
}

export interface AuditOptions {
  host?: string;
  port?: string;
  service?: string;
  user?: string;
  out: string;
  catalogPath?: string;
  raw: boolean;
  ledger: boolean;
  invocationId: string;
}
