/**
 * Result formatting for people (CLI text mode) and for LLM tool output.
 * Both are plain text; the LLM variant never uses Markdown.
 */

import type { SearchResult, Source } from './types.js';

export interface FormatOptions {
  showSources: boolean;
  /** Sources listed at most; 0 or less lists all of them */
  maxSources: number;
}

export const DEFAULT_FORMAT_OPTIONS: FormatOptions = {
  showSources: false,
  maxSources: 5,
};

function visibleSources(sources: Source[], options: FormatOptions): Source[] {
  if (!options.showSources) return [];
  return options.maxSources > 0 ? sources.slice(0, options.maxSources) : sources;
}

export function formatResult(
  result: SearchResult,
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS,
): string {
  if (!result.ok) {
    return `Search failed: ${result.error ?? 'Unknown error'}`;
  }

  const lines = [result.content];
  const sources = visibleSources(result.sources, options);
  if (sources.length > 0) {
    lines.push('\nSources:');
    sources.forEach((source, index) => {
      lines.push(
        source.title
          ? `  ${index + 1}. ${source.title}\n     ${source.url}`
          : `  ${index + 1}. ${source.url}`,
      );
    });
  }
  lines.push(`\n(elapsed: ${result.elapsedMs}ms)`);

  return lines.join('\n');
}

/**
 * Tool output handed back to a model. Failures carry the diagnostic detail
 * so the model can tell a bad key from an outage.
 */
export function formatResultForLlm(
  result: SearchResult,
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS,
): string {
  if (!result.ok) {
    const error = `Search failed: ${result.error ?? 'Unknown error'}`;
    return result.detail ? `${error}\n${result.detail}` : error;
  }

  const lines = [`Search results:\n${result.content}`];
  const sources = visibleSources(result.sources, options);
  if (sources.length > 0) {
    lines.push('\nReferences:');
    sources.forEach((source, index) => {
      if (source.title) {
        lines.push(`  ${index + 1}. ${source.title}`);
        lines.push(`     ${source.url}`);
      } else {
        lines.push(`  ${index + 1}. ${source.url}`);
      }
      if (source.snippet) {
        lines.push(`     ${source.snippet}`);
      }
    });
  }

  return lines.join('\n');
}

export function helpText(): string {
  return `Grok web search

Searches the live web through a Grok chat-completions endpoint and returns a
synthesized answer with its sources.

Usage:
  grok-search search --query "<question>" [--format text|json]
  grok-search config

Examples:
  grok-search search --query "What is new in TypeScript 5.6?"
  grok-search search --query "Latest Node.js LTS release" --format text`;
}
