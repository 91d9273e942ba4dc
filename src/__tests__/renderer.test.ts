import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { renderReport } from '../report/renderer.js';
import { makeResult } from './helpers.js';

const GENERATED_AT = new Date(2024, 0, 5, 9, 3, 7);

describe('renderReport', () => {
  it('renders a single check as one High row with its output', () => {
    const html = renderReport([makeResult({ id: '1.1', risk: 'High', output: [[1]] })], GENERATED_AT);
    const $ = cheerio.load(html);

    const rows = $('tbody tr');
    expect(rows).toHaveLength(1);
    expect(rows.first().attr('class')).toBe('High');
    expect(rows.first().find('pre').text()).toBe('1');
  });

  it('fills the descriptor columns in order', () => {
    const html = renderReport(
      [
        makeResult({
          id: '2.1',
          description: 'Password complexity enforced',
          risk: 'Medium',
          fixType: 'Planned',
          remediation: 'Assign strong password functions to user profiles',
        }),
      ],
      GENERATED_AT
    );
    const $ = cheerio.load(html);

    const cells = $('tbody tr')
      .first()
      .children('td')
      .toArray()
      .map((td) => $(td).text());
    expect(cells.slice(0, 5)).toEqual([
      '2.1',
      'Password complexity enforced',
      'Medium',
      'Planned',
      'Assign strong password functions to user profiles',
    ]);
  });

  it('emits one row per result tagged with the risk class', () => {
    const results = [
      makeResult({ id: '1.1', risk: 'High' }),
      makeResult({ id: '2.1', risk: 'Medium' }),
      makeResult({ id: '5.1', risk: 'Low' }),
    ];
    const $ = cheerio.load(renderReport(results, GENERATED_AT));

    const rows = $('tbody tr').toArray();
    expect(rows).toHaveLength(3);
    expect(rows.map((tr) => $(tr).attr('class'))).toEqual(['High', 'Medium', 'Low']);
    expect(rows.map((tr) => $(tr).children('td').first().text())).toEqual(['1.1', '2.1', '5.1']);
  });

  it('writes each output row on its own line', () => {
    const output = [
      ['SCOTT', 'OPEN'],
      ['HR', 'LOCKED'],
    ];
    const $ = cheerio.load(renderReport([makeResult({ output })], GENERATED_AT));

    expect($('tbody pre').text()).toBe('SCOTT, OPEN\nHR, LOCKED');
  });

  it('shows a query error as the error line', () => {
    const $ = cheerio.load(
      renderReport(
        [makeResult({ output: ['Error: ORA-00942: table or view does not exist'] })],
        GENERATED_AT
      )
    );

    expect($('tbody pre').text()).toBe('Error: ORA-00942: table or view does not exist');
  });

  it('leaves the output cell empty when a query returns no rows', () => {
    const $ = cheerio.load(renderReport([makeResult({ output: [] })], GENERATED_AT));
    expect($('tbody pre').text()).toBe('');
  });

  it('escapes markup coming back from the database', () => {
    const payload = '<script>alert(1)</script>';
    const html = renderReport([makeResult({ output: [[payload]] })], GENERATED_AT);
    const $ = cheerio.load(html);

    expect($('script')).toHaveLength(0);
    expect($('tbody pre').text()).toBe(payload);
    expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
  });

  it('escapes markup in descriptor text', () => {
    const html = renderReport([makeResult({ remediation: 'Set <b>audit_trail</b> & restart' })], GENERATED_AT);
    const $ = cheerio.load(html);

    expect($('tbody b')).toHaveLength(0);
    expect($('tbody td').eq(4).text()).toBe('Set <b>audit_trail</b> & restart');
  });

  it('renders values that have no JSON form', () => {
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;
    const $ = cheerio.load(renderReport([makeResult({ output: [[circular, { n: 10n }]] })], GENERATED_AT));

    expect($('tbody pre').text()).toBe("<ref *1> { name: 'loop', self: [Circular *1] }, { n: 10n }");
  });

  it('prints the generation time', () => {
    const $ = cheerio.load(renderReport([], GENERATED_AT));
    expect($('#generated').text()).toBe('2024-01-05 09:03:07');
    expect($('title').text()).toBe('Oracle CIS Audit Report');
    expect($('tbody tr')).toHaveLength(0);
  });

  it('renders identical bytes for identical input', () => {
    const results = [makeResult(), makeResult({ id: '2.1', risk: 'Low', output: ['Error: boom'] })];
    expect(renderReport(results, GENERATED_AT)).toBe(renderReport(results, GENERATED_AT));
  });

  it('differs only in the timestamp when rendered at another time', () => {
    const results = [makeResult()];
    const first = renderReport(results, GENERATED_AT);
    const second = renderReport(results, new Date(2024, 0, 5, 9, 3, 8));

    expect(first.replace('2024-01-05 09:03:07', '2024-01-05 09:03:08')).toBe(second);
  });
});
