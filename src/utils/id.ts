import { randomBytes } from 'node:crypto';
import { fileTimestamp } from '../report/format.js';

export function generateInvocationId(now: Date = new Date()): string {
  const date = fileTimestamp(now).slice(0, 8);
  const rand = randomBytes(3).toString('hex');
  return `run_${date}_${rand}`;
}
