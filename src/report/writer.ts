import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileTimestamp } from './format.js';

export const DEFAULT_REPORT_DIR = 'cis_html_reports';

export function reportFileName(generatedAt: Date): string {
  return `oracle_cis_report_${fileTimestamp(generatedAt)}.html`;
}

/** Writes the finished document in one call and returns its path. */
export async function writeReport(html: string, outDir: string, generatedAt: Date): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const path = join(outDir, reportFileName(generatedAt));
  await writeFile(path, html, 'utf-8');
  return path;
}
