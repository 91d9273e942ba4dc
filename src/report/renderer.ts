import * as cheerio from 'cheerio';
import { REPORT_TEMPLATE } from './template.js';
import { displayTimestamp, formatOutput } from './format.js';
import type { CheckResult } from '../control-plane/types.js';

/**
 * Renders the results into a standalone HTML document. Every value goes in
 * as a text node, so database output is escaped on serialization. The only
 * input besides the results is `generatedAt`; equal inputs give equal bytes.
 */
export function renderReport(results: readonly CheckResult[], generatedAt: Date): string {
  const $ = cheerio.load(REPORT_TEMPLATE);

  $('#generated').text(displayTimestamp(generatedAt));

  const tbody = $('tbody');
  const rowTemplate = tbody.children('tr').first().remove();

  for (const result of results) {
    const row = rowTemplate.clone();
    row.attr('class', result.risk);

    const cells = row.children('td');
    const columns = [
      result.id,
      result.description,
      result.risk,
      result.fixType,
      result.remediation,
    ];
    columns.forEach((text, index) => {
      cells.eq(index).text(text);
    });
    cells.last().children('pre').text(formatOutput(result.output));

    tbody.append(row);
  }

  return $.html();
}
