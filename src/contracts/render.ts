/**
 * Contract rendering for documentation tooling.
 *
 * Turns a function's metadata carrier into a plain summary and formats it
 * as text, Markdown or JSON.
 */

import { getContractMetadata } from './metadata.js';
import type { Callable } from './types.js';

export type ContractFormat = 'text' | 'markdown' | 'json';

export interface ContractSummary {
  name: string;
  specification?: string;
  preDescription?: string;
  postDescription?: string;
  invariantDescription?: string;
  raises: string[];
  preconditions: number;
  postconditions: number;
  invariants: number;
}

/**
 * Summarize the contract attached to `fn`, or `undefined` if it has none.
 */
export function summarizeContract(fn: Callable): ContractSummary | undefined {
  const metadata = getContractMetadata(fn);
  if (!metadata) return undefined;

  return {
    name: fn.name || '<anonymous>',
    specification: metadata.specification,
    preDescription: metadata.preDescription,
    postDescription: metadata.postDescription,
    invariantDescription: metadata.invariantDescription,
    raises: (metadata.raises ?? []).map((kind) => kind.name),
    preconditions: metadata.preconditions.length,
    postconditions: metadata.postconditions.length,
    invariants: metadata.invariants.length,
  };
}

export function renderContract(fn: Callable, format: ContractFormat = 'text'): string | undefined {
  const summary = summarizeContract(fn);
  if (!summary) return undefined;

  switch (format) {
    case 'json':
      return formatJSON(summary);
    case 'markdown':
      return formatMarkdown(summary);
    case 'text':
      return formatText(summary);
  }
}

// ─────────────────────────────────────────────────────────
// FORMAT: Text
// ─────────────────────────────────────────────────────────

function formatText(summary: ContractSummary): string {
  const lines: string[] = [`name: ${summary.name}`];

  if (summary.specification !== undefined) lines.push(`specification: ${summary.specification}`);
  if (summary.preDescription !== undefined) lines.push(`precondition: ${summary.preDescription}`);
  if (summary.postDescription !== undefined) lines.push(`postcondition: ${summary.postDescription}`);
  if (summary.invariantDescription !== undefined) lines.push(`invariant: ${summary.invariantDescription}`);
  if (summary.raises.length > 0) lines.push(`raises: ${summary.raises.join(', ')}`);
  lines.push(
    `conditions: ${summary.preconditions} pre, ${summary.postconditions} post, ${summary.invariants} invariant`,
  );

  return lines.join('\n');
}

// ─────────────────────────────────────────────────────────
// FORMAT: Markdown
// ─────────────────────────────────────────────────────────

function formatMarkdown(summary: ContractSummary): string {
  const lines: string[] = [];

  lines.push(`# ${summary.name}`);
  lines.push('');

  if (summary.specification !== undefined) {
    lines.push(summary.specification);
    lines.push('');
  }

  const sections: Array<[string, string | undefined]> = [
    ['Precondition', summary.preDescription],
    ['Postcondition', summary.postDescription],
    ['Invariant', summary.invariantDescription],
  ];
  for (const [title, content] of sections) {
    if (content === undefined) continue;
    lines.push(`## ${title}`);
    lines.push('');
    lines.push(content);
    lines.push('');
  }

  if (summary.raises.length > 0) {
    lines.push('## Raises');
    lines.push('');
    for (const kind of summary.raises) {
      lines.push(`- ${kind}`);
    }
    lines.push('');
  }

  lines.push('## Conditions');
  lines.push('');
  lines.push('| Kind | Count |');
  lines.push('|------|-------|');
  lines.push(`| Preconditions | ${summary.preconditions} |`);
  lines.push(`| Postconditions | ${summary.postconditions} |`);
  lines.push(`| Invariants | ${summary.invariants} |`);

  return lines.join('\n');
}

// ─────────────────────────────────────────────────────────
// FORMAT: JSON
// ─────────────────────────────────────────────────────────

function formatJSON(summary: ContractSummary): string {
  return JSON.stringify(summary, null, 2);
}
