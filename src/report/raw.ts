import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileTimestamp, formatOutput } from './format.js';
import type { CheckResult } from '../control-plane/types.js';

const SEPARATOR = '-'.repeat(50);

export function renderRawOutput(results: readonly CheckResult[]): string {
  return results
    .map((result) => {
      const body = formatOutput(result.output);
      const lines = [`[${result.id}] ${result.description}`];
      if (body.length > 0) lines.push(body);
      lines.push(SEPARATOR, '', '');
      return lines.join('\n');
    })
    .join('');
}

export async function writeRawOutput(
  results: readonly CheckResult[],
  outDir: string,
  generatedAt: Date
): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const path = join(outDir, `sql_output_${fileTimestamp(generatedAt)}.txt`);
  await writeFile(path, renderRawOutput(results), 'utf-8');
  return path;
}
