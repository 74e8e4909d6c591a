/**
 * Self-contained HTML report
 */

import type { AnalysisModel } from '../analyzer/model.js';
import { generateClassDiagram, generateFunctionDiagram } from './mermaid.js';
import { formatScore } from './text.js';

export function escapeHtml(value: string | number): string {
  return String(value)
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#39;');
}

function table(header: string[], rows: Array<Array<string | number>>): string {
  if (rows.length === 0) {
    return '<p class="empty">None</p>';
  }
  const head = header.map(h => `<th>${escapeHtml(h)}</th>`).join('');
  const body = rows
    .map(row => `<tr>${row.map(cell => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`)
    .join('\n');
  return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

function section(title: string, content: string): string {
  return `<section>\n<h2>${escapeHtml(title)}</h2>\n${content}\n</section>`;
}

export function generateHtml(model: AnalysisModel, title = 'Drafter site analysis'): string {
  const usage = model.getAttributeUsage();

  const records = table(
    ['Dataclass', 'Field', 'Type', 'Score', 'Usage'],
    model.getComplexity().flatMap(record =>
      record.fields.map(field => [
        record.record,
        field.field,
        field.type,
        formatScore(field.score),
        usage.get(record.record)?.get(field.field) ?? 0,
      ])
    )
  );

  const routes = table(
    ['Route', 'Components', 'Fields used', 'Calls'],
    model.getRoutes().map(route => [
      route.signature,
      Object.entries(route.componentUsage)
        .map(([component, count]) => `${component}: ${count}`)
        .join(', '),
      route.fieldsUsed.join(', '),
      route.calledNames.join(', '),
    ])
  );

  const complexity = table(
    ['Dataclass', 'Total'],
    [
      ...model.getComplexity().map(record => [record.record, formatScore(record.total)]),
      ['Grand total', formatScore(model.getTotalComplexity())],
    ]
  );

  const unused = table(
    ['Kind', 'Name'],
    [
      ...model.getUnusedRecords().map(name => ['Dataclass', name]),
      ...model.getUnusedFields().map(field => ['Field', `${field.record}.${field.field}`]),
    ]
  );

  const sections = table(
    ['Function', 'Lines', 'Advanced', 'Intermediate', 'Basic', 'Trivial', 'Drafter', 'Total'],
    model.getSectionComplexity().map(s => [
      s.name,
      `${s.startLine}-${s.endLine}`,
      s.counts.advanced,
      s.counts.intermediate,
      s.counts.basic,
      s.counts.trivial,
      s.counts.drafter,
      s.total,
    ])
  );

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    '<style>',
    'body { font-family: sans-serif; margin: 2rem; }',
    'table { border-collapse: collapse; margin-bottom: 1rem; }',
    'th, td { border: 1px solid #ccc; padding: 0.25rem 0.5rem; text-align: left; }',
    '.empty { color: #666; }',
    '</style>',
    '</head>',
    '<body>',
    `<h1>${escapeHtml(title)}</h1>`,
    section('Dataclasses', records),
    section('Routes', routes),
    section('Complexity', complexity),
    section('Unused', unused),
    section('Function complexity', sections),
    section('Class diagram', `<pre class="mermaid">\n${escapeHtml(generateClassDiagram(model))}</pre>`),
    section('Route diagram', `<pre class="mermaid">\n${escapeHtml(generateFunctionDiagram(model))}</pre>`),
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
