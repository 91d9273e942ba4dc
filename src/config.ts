import { DEFAULT_REPORT_DIR } from './report/writer.js';

export interface EnvConfig {
  host?: string;
  port?: string;
  service?: string;
  user?: string;
  reportDir: string;
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    host: readEnv(env, 'ORACLE_HOST'),
    port: readEnv(env, 'ORACLE_PORT'),
    service: readEnv(env, 'ORACLE_SERVICE'),
    user: readEnv(env, 'ORACLE_USER'),
    reportDir: readEnv(env, 'CIS_REPORT_DIR') ?? DEFAULT_REPORT_DIR,
  };
}
