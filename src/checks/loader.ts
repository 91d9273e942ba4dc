import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_CATALOG, freezeCatalog } from './catalog.js';
import type { CheckDescriptor } from '../control-plane/types.js';

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

const checkSchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().trim().min(1),
  query: z.string().trim().min(1),
  risk: z.enum(['Low', 'Medium', 'High']),
  fixType: z.enum(['Quick', 'Planned', 'Involved']),
  remediation: z.string().trim().min(1),
});

const catalogSchema = z
  .array(checkSchema)
  .min(1, 'catalog must contain at least one check')
  .superRefine((checks, ctx) => {
    const seen = new Set<string>();
    checks.forEach((check, index) => {
      if (seen.has(check.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `duplicate check id "${check.id}"`,
        });
      }
      seen.add(check.id);
    });
  });

export function parseCatalog(data: unknown, source = 'catalog'): readonly CheckDescriptor[] {
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n  - ');
    throw new CatalogError(`Invalid ${source}:\n  - ${details}`);
  }
  return freezeCatalog(parsed.data);
}

export async function loadCatalog(path?: string): Promise<readonly CheckDescriptor[]> {
  if (!path) return DEFAULT_CATALOG;

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new CatalogError(
      `Cannot read catalog ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new CatalogError(
      `Catalog ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseCatalog(data, `catalog ${path}`);
}
